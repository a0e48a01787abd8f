import type { BatchTransaction, BlockProposal } from '../../types/index.js';
import type { ValidatorKeys } from '../crypto/validatorKeys.js';
import { buildSignedProposal, type ChainTip, type ConsensusEngine } from './consensusEngine.js';
import { logger } from '../../utils/logger.js';

/**
 * This node is the only validator: every proposal it signs is approved
 */
export class SingleNodeConsensus implements ConsensusEngine {
  readonly mode = 'single' as const;

  constructor(
    private readonly chain: ChainTip,
    private readonly keys: ValidatorKeys,
    private readonly validatorId: string
  ) {}

  async proposeBlock(
    transactions: readonly BatchTransaction[],
    timestamp: number = Math.floor(Date.now() / 1000)
  ): Promise<BlockProposal | null> {
    if (transactions.length === 0) {
      return null;
    }

    const proposal = await buildSignedProposal(
      this.chain,
      this.keys,
      this.validatorId,
      transactions,
      timestamp
    );

    logger.debug(
      { blockHeight: proposal.height, transactions: transactions.length },
      'Block proposed'
    );
    return proposal;
  }

  // No peers to announce to or sync from
  async broadcastBlock(_proposal: BlockProposal): Promise<void> {}

  async syncWithPeers(): Promise<void> {}
}

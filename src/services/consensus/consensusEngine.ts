import type { ConsensusMode } from '../../config/index.js';
import type { BatchTransaction, Block, BlockProposal } from '../../types/index.js';
import {
  ZERO_HASH,
  blockSigningPayload,
  computeTransactionHash,
} from '../crypto/hashing.js';
import type { ValidatorKeys } from '../crypto/validatorKeys.js';

/**
 * Turns a validated set of transactions into an approved, signed block proposal
 */
export interface ConsensusEngine {
  readonly mode: ConsensusMode;

  /**
   * Null when there is nothing to propose.
   * Throws `ConsensusError` when the validators do not approve the block.
   */
  proposeBlock(
    transactions: readonly BatchTransaction[],
    timestamp?: number
  ): Promise<BlockProposal | null>;

  /**
   * Announce a committed block to the other validators
   */
  broadcastBlock(proposal: BlockProposal): Promise<void>;

  syncWithPeers(): Promise<void>;
}

export interface ChainTip {
  getLatestBlock(): Promise<Block | null>;
}

/**
 * Build and sign the next block on top of the current tip.
 * An empty chain gets the genesis position: height 0 on the all-zero hash.
 */
export async function buildSignedProposal(
  chain: ChainTip,
  keys: ValidatorKeys,
  validatorId: string,
  transactions: readonly BatchTransaction[],
  timestamp: number
): Promise<BlockProposal> {
  const latest = await chain.getLatestBlock();
  const height = latest ? latest.height + 1 : 0;
  const previousHash = latest ? latest.blockHash : ZERO_HASH;

  const transactionHashes = transactions.map((tx) =>
    computeTransactionHash(
      tx.imageHashes.map((hash) => hash.toLowerCase()),
      tx.timestamps,
      tx.submitterId
    )
  );

  const signature = keys.sign(
    blockSigningPayload(height, previousHash, timestamp, transactionHashes, validatorId)
  );

  return {
    height,
    previousHash,
    timestamp,
    validatorId,
    transactions: [...transactions],
    transactionHashes,
    signature,
  };
}

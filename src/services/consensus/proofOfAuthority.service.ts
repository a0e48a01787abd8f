import type { BatchTransaction, BlockProposal } from '../../types/index.js';
import { computeBlockHash } from '../crypto/hashing.js';
import type { ValidatorKeys } from '../crypto/validatorKeys.js';
import { buildSignedProposal, type ChainTip, type ConsensusEngine } from './consensusEngine.js';
import { ConfigurationError, ConsensusError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type RoundState =
  | 'proposing'
  | 'broadcasting'
  | 'collecting_votes'
  | 'committed'
  | 'rejected';

export interface VoteRequest {
  proposal: BlockProposal;
  blockHash: string;
  proposerId: string;
}

export interface BlockVote {
  validatorId: string;
  blockHash: string;
  approve: boolean;
}

/**
 * Carries proposals to the other validators and their votes back.
 * The node ships no implementation; one must be supplied to run PoA.
 */
export interface VoteTransport {
  requestVote(validatorId: string, request: VoteRequest): Promise<BlockVote>;
  announceBlock(validatorIds: readonly string[], proposal: BlockProposal): Promise<void>;
}

export interface ConsensusRound {
  height: number;
  blockHash: string;
  state: RoundState;
  approvals: string[];
  rejections: string[];
}

export interface ProofOfAuthorityOptions {
  validatorId: string;
  validators: readonly string[];
  roundTimeoutMs: number;
}

export function quorumSize(validatorCount: number): number {
  return Math.floor((2 * validatorCount) / 3) + 1;
}

/**
 * Proof-of-authority over a fixed validator set. Each proposal runs one round:
 * proposing → broadcasting → collecting_votes → committed | rejected.
 */
export class ProofOfAuthorityConsensus implements ConsensusEngine {
  readonly mode = 'poa' as const;
  readonly quorum: number;
  /** Distinct validator ids, in configured order */
  readonly validators: readonly string[];
  private round: ConsensusRound | null = null;

  constructor(
    private readonly chain: ChainTip,
    private readonly keys: ValidatorKeys,
    private readonly transport: VoteTransport,
    private readonly options: ProofOfAuthorityOptions
  ) {
    this.validators = [...new Set(options.validators)];
    if (this.validators.length === 0) {
      throw new ConfigurationError('Proof-of-authority requires at least one validator');
    }
    this.quorum = quorumSize(this.validators.length);
  }

  get currentRound(): Readonly<ConsensusRound> | null {
    return this.round;
  }

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
      this.options.validatorId,
      transactions,
      timestamp
    );
    const blockHash = computeBlockHash(
      proposal.height,
      proposal.previousHash,
      proposal.timestamp,
      proposal.transactionHashes,
      proposal.validatorId
    );

    const round: ConsensusRound = {
      height: proposal.height,
      blockHash,
      state: 'proposing',
      approvals: [],
      rejections: [],
    };
    this.round = round;

    if (this.validators.includes(this.options.validatorId)) {
      round.approvals.push(this.options.validatorId);
    }

    this.transition(round, 'broadcasting');
    const peers = this.validators.filter((id) => id !== this.options.validatorId);
    const request: VoteRequest = { proposal, blockHash, proposerId: this.options.validatorId };

    this.transition(round, 'collecting_votes');
    await this.collectVotes(round, peers, request);

    if (round.approvals.length >= this.quorum) {
      this.transition(round, 'committed');
      return proposal;
    }

    this.transition(round, 'rejected');
    throw new ConsensusError(
      `Block ${proposal.height} rejected: ${round.approvals.length}/${this.validators.length} approvals, quorum ${this.quorum}`
    );
  }

  async broadcastBlock(proposal: BlockProposal): Promise<void> {
    const peers = this.validators.filter((id) => id !== this.options.validatorId);
    await this.transport.announceBlock(peers, proposal);
  }

  async syncWithPeers(): Promise<void> {
    throw new ConsensusError('Peer synchronization is not supported');
  }

  private async collectVotes(
    round: ConsensusRound,
    peers: readonly string[],
    request: VoteRequest
  ): Promise<void> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        logger.warn({ blockHeight: round.height }, 'Consensus round timed out');
        resolve();
      }, this.options.roundTimeoutMs);
    });

    const decided = new Promise<void>((resolve) => {
      const settle = (): void => {
        if (this.isDecided(round)) {
          resolve();
        }
      };
      settle();

      for (const peer of peers) {
        void this.transport.requestVote(peer, request).then(
          (vote) => {
            this.recordVote(round, peer, vote);
            settle();
          },
          (error: unknown) => {
            logger.warn({ err: error, validatorId: peer }, 'Vote request failed');
            if (round.state === 'collecting_votes') {
              round.rejections.push(peer);
            }
            settle();
          }
        );
      }
    });

    try {
      await Promise.race([timedOut, decided]);
    } finally {
      clearTimeout(timer);
    }
  }

  private recordVote(round: ConsensusRound, peer: string, vote: BlockVote): void {
    // Votes arriving after the round closed are ignored
    if (round.state !== 'collecting_votes') {
      return;
    }
    if (round.approvals.includes(peer) || round.rejections.includes(peer)) {
      return;
    }
    if (vote.validatorId !== peer || vote.blockHash !== round.blockHash) {
      logger.warn({ validatorId: peer }, 'Discarding vote for a different block or validator');
      round.rejections.push(peer);
      return;
    }
    (vote.approve ? round.approvals : round.rejections).push(peer);
  }

  private isDecided(round: ConsensusRound): boolean {
    const outstanding =
      this.validators.length - round.approvals.length - round.rejections.length;
    return round.approvals.length >= this.quorum || round.approvals.length + outstanding < this.quorum;
  }

  private transition(round: ConsensusRound, next: RoundState): void {
    logger.debug({ blockHeight: round.height, from: round.state, to: next }, 'Consensus round');
    round.state = next;
  }
}

import type { ConsensusMode } from '../../config/index.js';
import type {
  BlockStorageRepository,
  MerkleProofWithRoot,
} from '../../db/repositories/blockStorage.repository.js';
import type { PendingSubmissionsRepository } from '../../db/repositories/pendingSubmissions.repository.js';
import type { BatchTransaction, Block, LedgerTransaction } from '../../types/index.js';
import type { ConsensusEngine } from '../consensus/consensusEngine.js';
import { normalizeHash } from '../crypto/hashing.js';
import type { ValidatorKeys } from '../crypto/validatorKeys.js';
import type { MerkleService } from '../merkle/merkle.service.js';
import type { TransactionValidator } from '../validation/transactionValidator.service.js';
import { ConsensusError, SubmissionRejectedError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface SubmitInput {
  imageHash: string;
  timestamp: number;
  submitterId: string;
  modificationLevel?: number;
  parentImageHash?: string | null;
  gpsHash?: string | null;
  ownerHash?: string | null;
}

export interface SubmitResult {
  txId: number;
  blockHeight: number;
}

export interface VerifyResult {
  verified: boolean;
  imageHash: string;
  timestamp?: number;
  blockHeight?: number;
  txId?: number;
  submitterId?: string;
  modificationLevel?: number;
  parentImageHash?: string | null;
  gpsHash?: string | null;
}

export interface BlockDetails extends Block {
  transactions: LedgerTransaction[];
}

export interface NodeStatus {
  nodeId: string;
  blockHeight: number;
  totalHashes: number;
  lastBlockTime: number | null;
  genesisHash: string | null;
  status: 'operational' | 'uninitialized';
  consensusMode: ConsensusMode;
  validatorNodes: string[];
  pendingSubmissions: number;
}

export interface ProofLookup extends MerkleProofWithRoot {
  /** Whether the stored path still hashes up to the stored root */
  valid: boolean;
}

export interface ProvenanceLink {
  imageHash: string;
  modificationLevel: number;
  timestamp: number;
  blockHeight: number;
  txId: number;
  parentImageHash: string | null;
}

export interface LedgerServiceOptions {
  nodeId: string;
  consensusMode: ConsensusMode;
  validatorNodes: readonly string[];
}

export const MAX_PROVENANCE_DEPTH = 10;

/**
 * The node's public operations: direct submission, verification and
 * block, proof and status lookups
 */
export class LedgerService {
  constructor(
    private readonly storage: BlockStorageRepository,
    private readonly submissions: Pick<PendingSubmissionsRepository, 'countAwaiting'>,
    private readonly validator: TransactionValidator,
    private readonly consensus: ConsensusEngine,
    private readonly merkle: MerkleService,
    private readonly keys: ValidatorKeys,
    private readonly options: LedgerServiceOptions
  ) {}

  /**
   * Commit one image hash as a single-entry batch in its own block
   */
  async submit(input: SubmitInput): Promise<SubmitResult> {
    const imageHash = normalizeHash(input.imageHash) ?? input.imageHash;
    const tx: BatchTransaction = {
      imageHashes: [imageHash],
      timestamps: [input.timestamp],
      submitterId: input.submitterId,
      signature: this.keys.sign(imageHash),
      modificationLevels: [input.modificationLevel ?? 0],
      parentImageHashes: [input.parentImageHash ?? null],
      gpsHashes: [input.gpsHash ?? null],
      ownerHashes: [input.ownerHash ?? null],
    };

    return this.storage.withWriteLock(async () => {
      const validation = await this.validator.validateTransaction(tx);
      if (!validation.isValid) {
        logger.info(
          { imageHash, rule: validation.rule, reason: validation.reason },
          'Submission rejected'
        );
        throw new SubmissionRejectedError(
          validation.reason ?? 'Submission rejected',
          validation.rule ?? 'unknown'
        );
      }

      const proposal = await this.consensus.proposeBlock([tx]);
      if (!proposal) {
        throw new ConsensusError('Consensus produced no block for a non-empty submission');
      }

      const stored = await this.storage.storeBlock(proposal);
      await this.consensus.broadcastBlock(proposal);

      return { txId: stored.txIds[0], blockHeight: stored.block.height };
    });
  }

  async verify(imageHash: string): Promise<VerifyResult> {
    const normalized = normalizeHash(imageHash);
    const record = normalized ? await this.storage.verifyImageHash(normalized) : null;

    if (!record) {
      return { verified: false, imageHash: normalized ?? imageHash };
    }

    return {
      verified: true,
      imageHash: record.imageHash,
      timestamp: record.timestamp,
      blockHeight: record.blockHeight,
      txId: record.txId,
      submitterId: record.submitterId,
      modificationLevel: record.modificationLevel,
      parentImageHash: record.parentImageHash,
      gpsHash: record.gpsHash,
    };
  }

  async getBlock(height: number): Promise<BlockDetails | null> {
    const block = await this.storage.getBlockByHeight(height);
    return block ? this.withTransactions(block) : null;
  }

  async getBlockByHash(blockHash: string): Promise<BlockDetails | null> {
    const block = await this.storage.getBlockByHash(blockHash);
    return block ? this.withTransactions(block) : null;
  }

  async getLatestBlock(): Promise<BlockDetails | null> {
    const block = await this.storage.getLatestBlock();
    return block ? this.withTransactions(block) : null;
  }

  async status(): Promise<NodeStatus> {
    const [nodeState, pendingSubmissions] = await Promise.all([
      this.storage.getNodeState(),
      this.submissions.countAwaiting(),
    ]);

    return {
      nodeId: this.options.nodeId,
      blockHeight: nodeState?.currentBlockHeight ?? 0,
      totalHashes: nodeState?.totalHashes ?? 0,
      lastBlockTime: nodeState?.lastBlockTime ?? null,
      genesisHash: nodeState?.genesisHash ?? null,
      status: nodeState ? 'operational' : 'uninitialized',
      consensusMode: this.options.consensusMode,
      validatorNodes: [...this.options.validatorNodes],
      pendingSubmissions,
    };
  }

  async getMerkleProof(imageHash: string): Promise<ProofLookup | null> {
    const proof = await this.storage.getMerkleProof(imageHash);
    if (!proof) {
      return null;
    }
    return {
      ...proof,
      valid: this.merkle.verifyProof(proof.imageHash, proof.path, proof.merkleRoot),
    };
  }

  /**
   * Follow parent links from `imageHash` back towards the original capture.
   * Stops at an unknown parent, a cycle or `maxDepth` links.
   */
  async getProvenance(
    imageHash: string,
    maxDepth: number = MAX_PROVENANCE_DEPTH
  ): Promise<ProvenanceLink[]> {
    const chain: ProvenanceLink[] = [];
    const visited = new Set<string>();
    let current = normalizeHash(imageHash);

    while (current && !visited.has(current) && chain.length < maxDepth) {
      visited.add(current);
      const record = await this.storage.verifyImageHash(current);
      if (!record) {
        break;
      }
      chain.push({
        imageHash: record.imageHash,
        modificationLevel: record.modificationLevel,
        timestamp: record.timestamp,
        blockHeight: record.blockHeight,
        txId: record.txId,
        parentImageHash: record.parentImageHash,
      });
      current = record.parentImageHash;
    }

    return chain;
  }

  private async withTransactions(block: Block): Promise<BlockDetails> {
    const transactions = await this.storage.getTransactionsForBlock(block.height);
    return { ...block, transactions };
  }
}

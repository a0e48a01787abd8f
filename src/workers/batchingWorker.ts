import type { PendingSubmissionsRepository } from '../db/repositories/pendingSubmissions.repository.js';
import type { BlockStorageRepository } from '../db/repositories/blockStorage.repository.js';
import type { ConsensusEngine } from '../services/consensus/consensusEngine.js';
import type { ValidatorKeys } from '../services/crypto/validatorKeys.js';
import type { TransactionValidator } from '../services/validation/transactionValidator.service.js';
import type { BatchTransaction, PendingSubmission } from '../types/index.js';
import { IntervalTask } from '../utils/intervalTask.js';
import { logger, withContext } from '../utils/logger.js';
import { PerformanceTracker } from '../utils/performance.js';

export interface BatchingWorkerOptions {
  nodeId: string;
  batchSizeMin: number;
  batchSizeMax: number;
  intervalSeconds: number;
}

export type BatchCycleStatus = 'idle' | 'waiting' | 'committed' | 'rejected';

export interface BatchCycleResult {
  status: BatchCycleStatus;
  /** Entries that made it into the batch (or would have, when waiting or rejected) */
  count: number;
  blockHeight?: number;
  txId?: number;
  reason?: string;
}

/**
 * Build the batch transaction for a set of screened submissions. The node
 * signs the sorted image hashes joined by ','.
 */
export function buildBatchTransaction(
  entries: readonly PendingSubmission[],
  submitterId: string,
  keys: ValidatorKeys
): BatchTransaction {
  const imageHashes = entries.map((entry) => entry.imageHash.toLowerCase());
  return {
    imageHashes,
    timestamps: entries.map((entry) => entry.timestamp),
    submitterId,
    signature: keys.sign([...imageHashes].sort().join(',')),
    modificationLevels: entries.map((entry) => entry.modificationLevel),
    parentImageHashes: entries.map((entry) => entry.parentImageHash ?? null),
    gpsHashes: entries.map((entry) => entry.gpsHash ?? null),
    ownerHashes: entries.map((entry) => entry.ownerHash ?? null),
  };
}

/**
 * Moves validated submissions onto the ledger, one block per cycle
 */
export class BatchingWorker {
  private readonly task: IntervalTask<BatchCycleResult>;

  constructor(
    private readonly submissions: PendingSubmissionsRepository,
    private readonly storage: BlockStorageRepository,
    private readonly validator: TransactionValidator,
    private readonly consensus: ConsensusEngine,
    private readonly keys: ValidatorKeys,
    private readonly options: BatchingWorkerOptions
  ) {
    this.task = new IntervalTask('batching', options.intervalSeconds * 1000, () =>
      this.runCycle()
    );
  }

  start(): void {
    this.task.start();
    logger.info(
      { batchSizeMin: this.options.batchSizeMin, batchSizeMax: this.options.batchSizeMax },
      'Batching worker started'
    );
  }

  async stop(): Promise<void> {
    logger.info('Stopping batching worker...');
    await this.task.stop();
  }

  /**
   * Run one cycle now unless one is already running (then null)
   */
  async trigger(): Promise<BatchCycleResult | null> {
    return this.task.runOnce();
  }

  async runCycle(now: number = Math.floor(Date.now() / 1000)): Promise<BatchCycleResult> {
    return withContext({ worker: 'batching' }, async () => {
      const tracker = new PerformanceTracker('batching.cycle');
      try {
        const result = await this.assembleAndCommit(now);
        tracker.end('success', { status: result.status, count: result.count });
        return result;
      } catch (error) {
        tracker.end('error');
        logger.error({ err: error }, 'Batching cycle failed');
        throw error;
      }
    });
  }

  private async assembleAndCommit(now: number): Promise<BatchCycleResult> {
    const candidates = await this.submissions.findReadyForBatching(this.options.batchSizeMax);
    if (candidates.length === 0) {
      logger.debug('No validated submissions to batch');
      return { status: 'idle', count: 0 };
    }

    const accepted = await this.screen(candidates, now);
    if (accepted.length < this.options.batchSizeMin) {
      logger.debug(
        { ready: accepted.length, batchSizeMin: this.options.batchSizeMin },
        'Waiting for more submissions'
      );
      return { status: accepted.length === 0 ? 'idle' : 'waiting', count: accepted.length };
    }

    const tx = buildBatchTransaction(accepted, this.options.nodeId, this.keys);
    const ids = accepted.map((entry) => entry.id);

    return this.storage.withWriteLock(async (): Promise<BatchCycleResult> => {
      const validation = await this.validator.validateTransaction(tx, now);
      if (!validation.isValid) {
        logger.warn(
          { rule: validation.rule, reason: validation.reason, count: ids.length },
          'Batch failed validation'
        );
        return {
          status: 'rejected',
          count: ids.length,
          reason: validation.reason ?? undefined,
        };
      }

      const proposal = await this.consensus.proposeBlock([tx], now);
      if (!proposal) {
        return { status: 'idle', count: 0 };
      }

      const stored = await this.storage.storeBlock(proposal, async (trx, block) => {
        await this.submissions.markBatched(trx, ids, block.txIds[0]);
      });
      await this.consensus.broadcastBlock(proposal);

      logger.info(
        { blockHeight: stored.block.height, txId: stored.txIds[0], count: ids.length },
        'Batch committed'
      );
      return {
        status: 'committed',
        count: ids.length,
        blockHeight: stored.block.height,
        txId: stored.txIds[0],
      };
    });
  }

  /**
   * Reject entries already on the ledger, repeated within this batch or
   * failing per-entry checks; return the rest in submission order
   */
  private async screen(
    candidates: readonly PendingSubmission[],
    now: number
  ): Promise<PendingSubmission[]> {
    const onChain = await this.storage.findExistingHashes(
      candidates.map((entry) => entry.imageHash)
    );
    const seen = new Set<string>();
    const accepted: PendingSubmission[] = [];

    for (const entry of candidates) {
      const imageHash = entry.imageHash.toLowerCase();
      let reason: string | null = null;

      if (onChain.has(imageHash)) {
        reason = 'Image hash already on blockchain';
      } else if (seen.has(imageHash)) {
        reason = 'Duplicate image hash in batch';
      } else {
        reason = this.validator.screenEntry(entry, now).reason;
      }

      if (reason) {
        logger.warn({ receiptId: entry.receiptId, reason }, 'Dropping submission from batch');
        await this.submissions.markRejected(entry.id, reason);
        continue;
      }

      seen.add(imageHash);
      accepted.push(entry);
    }

    return accepted;
  }
}

import type { PendingSubmissionsRepository } from '../db/repositories/pendingSubmissions.repository.js';
import type { AuthorityClient } from '../services/authority/authorityClient.service.js';
import type { PendingSubmission, TokenValidationResult } from '../types/index.js';
import { IntervalTask } from '../utils/intervalTask.js';
import { logger, withContext } from '../utils/logger.js';
import { PerformanceTracker } from '../utils/performance.js';

export interface ValidationWorkerOptions {
  intervalSeconds: number;
  maxAttempts: number;
  /** Submissions handled per cycle */
  batchLimit?: number;
}

export interface ValidationCycleResult {
  processed: number;
  validated: number;
  rejected: number;
  retrying: number;
  failed: number;
}

type AttemptOutcome = 'validated' | 'rejected' | 'retrying';

const QUICK_RETRIES = 3;
const SLOW_RETRY_DELAY_SECONDS = 30 * 60;
const DEFAULT_BATCH_LIMIT = 100;

/**
 * Seconds to wait after a failed attempt: 2, 4, 8, then 30 minutes
 */
export function retryDelaySeconds(attempt: number): number {
  return attempt <= QUICK_RETRIES ? 2 ** attempt : SLOW_RETRY_DELAY_SECONDS;
}

/**
 * Drives pending submissions through manufacturer authority validation
 */
export class ValidationWorker {
  private readonly task: IntervalTask<ValidationCycleResult>;

  constructor(
    private readonly submissions: PendingSubmissionsRepository,
    private readonly authority: AuthorityClient,
    private readonly options: ValidationWorkerOptions
  ) {
    this.task = new IntervalTask('validation', options.intervalSeconds * 1000, () =>
      this.runCycle()
    );
  }

  start(): void {
    this.task.start();
    logger.info({ maxAttempts: this.options.maxAttempts }, 'Validation worker started');
  }

  async stop(): Promise<void> {
    logger.info('Stopping validation worker...');
    await this.task.stop();
  }

  async runCycle(now: number = Math.floor(Date.now() / 1000)): Promise<ValidationCycleResult> {
    return withContext({ worker: 'validation' }, async () => {
      const tracker = new PerformanceTracker('validation.cycle');
      const due = await this.submissions.findDueForValidation(
        this.options.maxAttempts,
        this.options.batchLimit ?? DEFAULT_BATCH_LIMIT,
        now
      );

      const result: ValidationCycleResult = {
        processed: 0,
        validated: 0,
        rejected: 0,
        retrying: 0,
        failed: 0,
      };

      for (const submission of due) {
        result.processed++;
        try {
          const outcome = await this.attempt(submission, now);
          result[outcome]++;
        } catch (error) {
          // One broken submission must not hold up the rest
          result.failed++;
          logger.error(
            { err: error, receiptId: submission.receiptId },
            'Validation attempt failed'
          );
        }
      }

      tracker.end('success', { ...result });
      return result;
    });
  }

  private async attempt(submission: PendingSubmission, now: number): Promise<AttemptOutcome> {
    const attempt = submission.retryCount + 1;
    const verdict = await this.requestVerdict(submission);

    if (verdict.valid) {
      await this.submissions.recordValidationAttempt(submission.id, {
        status: 'validated',
        message: verdict.message,
        retryCount: attempt,
        nextRetryAt: null,
      });
      logger.info(
        { receiptId: submission.receiptId, kind: submission.kind, attempt },
        'Submission validated'
      );
      return 'validated';
    }

    if (!verdict.retryable) {
      await this.submissions.recordValidationAttempt(submission.id, {
        status: 'rejected',
        message: verdict.message,
        retryCount: attempt,
        nextRetryAt: null,
      });
      logger.warn(
        { receiptId: submission.receiptId, reason: verdict.message },
        'Submission rejected by authority'
      );
      return 'rejected';
    }

    if (attempt >= this.options.maxAttempts) {
      await this.submissions.recordValidationAttempt(submission.id, {
        status: 'rejected',
        message: `Authority unreachable after ${attempt} attempts: ${verdict.message}`,
        retryCount: attempt,
        nextRetryAt: null,
      });
      logger.error(
        { receiptId: submission.receiptId, authorityId: submission.authorityId, attempt },
        'Authority unreachable, giving up on submission'
      );
      return 'rejected';
    }

    const delay = retryDelaySeconds(attempt);
    await this.submissions.recordValidationAttempt(submission.id, {
      status: 'pending',
      message: verdict.message,
      retryCount: attempt,
      nextRetryAt: now + delay,
    });
    logger.warn(
      { receiptId: submission.receiptId, attempt, retryInSeconds: delay },
      'Authority validation failed, retry scheduled'
    );
    return 'retrying';
  }

  private requestVerdict(submission: PendingSubmission): Promise<TokenValidationResult> {
    switch (submission.kind) {
      case 'camera_token':
        return this.authority.validateToken({
          ciphertext: submission.ciphertext,
          authTag: submission.authTag,
          nonce: submission.nonce,
          tableId: submission.tableId,
          keyIndex: submission.keyIndex,
          authorityId: submission.authorityId,
        });
      case 'certificate':
        return this.authority.validateCertificate({
          cameraCert: submission.cameraCert,
          bundleSignature: submission.bundleSignature,
          imageHash: submission.imageHash,
          timestamp: submission.timestamp,
          gpsHash: submission.gpsHash ?? null,
          authorityId: submission.authorityId,
        });
    }
  }
}

import { randomUUID } from 'crypto';
import type { Knex } from 'knex';
import type { DatabaseAdapter } from '../adapters/DatabaseAdapter.js';
import type { CreatePendingSubmissionInput, PendingSubmissionRow } from '../types.js';
import type { PendingSubmission, ValidationStatus } from '../../types/index.js';

export interface ValidationAttemptUpdate {
  status: ValidationStatus;
  message: string | null;
  retryCount: number;
  nextRetryAt: number | null;
}

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

const toPendingSubmission = (row: PendingSubmissionRow): PendingSubmission => {
  const base = {
    id: row.id,
    receiptId: row.receipt_id,
    imageHash: row.image_hash,
    timestamp: row.timestamp,
    modificationLevel: row.modification_level,
    parentImageHash: row.parent_image_hash,
    gpsHash: row.gps_hash,
    ownerHash: row.owner_hash,
    submitterId: row.submitter_id,
    authorityId: row.authority_id,
    validationStatus: row.validation_status,
    validationMessage: row.validation_message,
    retryCount: row.retry_count,
    nextRetryAt: row.next_retry_at,
    batched: Boolean(row.batched),
    txId: row.tx_id,
    createdAt: row.created_at,
  };

  if (row.kind === 'certificate') {
    if (row.camera_cert === null || row.bundle_signature === null) {
      throw new Error(`Certificate submission ${row.receipt_id} has no certificate bundle`);
    }
    return {
      ...base,
      kind: 'certificate',
      cameraCert: row.camera_cert,
      bundleSignature: row.bundle_signature,
    };
  }

  const { ciphertext, auth_tag, nonce, table_id, key_index } = row;
  if (
    ciphertext === null ||
    auth_tag === null ||
    nonce === null ||
    table_id === null ||
    key_index === null
  ) {
    throw new Error(`Token submission ${row.receipt_id} has no camera token`);
  }
  return {
    ...base,
    kind: 'camera_token',
    ciphertext,
    authTag: auth_tag,
    nonce,
    tableId: table_id,
    keyIndex: key_index,
  };
};

const credentialColumns = (input: CreatePendingSubmissionInput) =>
  input.kind === 'certificate'
    ? {
        kind: 'certificate',
        camera_cert: input.cameraCert,
        bundle_signature: input.bundleSignature,
      }
    : {
        kind: 'camera_token',
        ciphertext: input.ciphertext,
        auth_tag: input.authTag,
        nonce: input.nonce,
        table_id: input.tableId,
        key_index: input.keyIndex,
      };

/**
 * Staging area for authenticated submissions (camera token or certificate
 * bundle) on their way to the ledger
 */
export class PendingSubmissionsRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  async create(input: CreatePendingSubmissionInput): Promise<PendingSubmission> {
    const receiptId = randomUUID();
    const now = nowSeconds();

    await this.db.getKnex()('pending_submissions').insert({
      receipt_id: receiptId,
      image_hash: input.imageHash,
      timestamp: input.timestamp,
      modification_level: input.modificationLevel,
      parent_image_hash: input.parentImageHash ?? null,
      gps_hash: input.gpsHash ?? null,
      owner_hash: input.ownerHash ?? null,
      submitter_id: input.submitterId,
      ...credentialColumns(input),
      authority_id: input.authorityId,
      validation_status: 'pending',
      retry_count: 0,
      next_retry_at: now,
      batched: false,
      created_at: now,
      updated_at: now,
    });

    const created = await this.findByReceiptId(receiptId);
    if (!created) {
      throw new Error(`Submission ${receiptId} was not found after insert`);
    }
    return created;
  }

  async findByReceiptId(receiptId: string): Promise<PendingSubmission | null> {
    const row = await this.db
      .getKnex()<PendingSubmissionRow>('pending_submissions')
      .where('receipt_id', receiptId)
      .first();
    return row ? toPendingSubmission(row) : null;
  }

  /**
   * True if the hash is already staged and not rejected
   */
  async isStaged(imageHash: string): Promise<boolean> {
    const row = await this.db
      .getKnex()<PendingSubmissionRow>('pending_submissions')
      .where('image_hash', imageHash)
      .whereNot('validation_status', 'rejected')
      .first();
    return row !== undefined;
  }

  /**
   * Pending submissions whose next attempt is due
   */
  async findDueForValidation(
    maxAttempts: number,
    limit: number,
    now: number = nowSeconds()
  ): Promise<PendingSubmission[]> {
    const rows = await this.db
      .getKnex()<PendingSubmissionRow>('pending_submissions')
      .where('validation_status', 'pending')
      .where('retry_count', '<', maxAttempts)
      .where((query) => query.whereNull('next_retry_at').orWhere('next_retry_at', '<=', now))
      .orderBy('id', 'asc')
      .limit(limit);
    return rows.map(toPendingSubmission);
  }

  async recordValidationAttempt(id: number, update: ValidationAttemptUpdate): Promise<void> {
    await this.db.getKnex()('pending_submissions').where('id', id).update({
      validation_status: update.status,
      validation_message: update.message,
      retry_count: update.retryCount,
      next_retry_at: update.nextRetryAt,
      updated_at: nowSeconds(),
    });
  }

  /**
   * Validated submissions not yet in a block, oldest first
   */
  async findReadyForBatching(limit: number): Promise<PendingSubmission[]> {
    const rows = await this.db
      .getKnex()<PendingSubmissionRow>('pending_submissions')
      .where('validation_status', 'validated')
      .where('batched', false)
      .orderBy('id', 'asc')
      .limit(limit);
    return rows.map(toPendingSubmission);
  }

  async markRejected(id: number, message: string): Promise<void> {
    await this.db.getKnex()('pending_submissions').where('id', id).update({
      validation_status: 'rejected',
      validation_message: message,
      updated_at: nowSeconds(),
    });
  }

  /**
   * Mark submissions as committed; runs inside the block's database transaction
   */
  async markBatched(trx: Knex.Transaction, ids: readonly number[], txId: number): Promise<void> {
    await trx('pending_submissions')
      .whereIn('id', ids)
      .update({ batched: true, tx_id: txId, updated_at: nowSeconds() });
  }

  /**
   * Submissions not yet on the ledger and not rejected
   */
  async countAwaiting(): Promise<number> {
    const result = await this.db
      .getKnex()('pending_submissions')
      .where('batched', false)
      .whereNot('validation_status', 'rejected')
      .count<{ count: number | string }[]>('* as count');
    return Number(result[0]?.count ?? 0);
  }

  async getStatusCounts(): Promise<Record<ValidationStatus, number>> {
    const rows = await this.db
      .getKnex()('pending_submissions')
      .select('validation_status')
      .count<{ validation_status: ValidationStatus; count: number | string }[]>('* as count')
      .groupBy('validation_status');

    const counts: Record<ValidationStatus, number> = { pending: 0, validated: 0, rejected: 0 };
    for (const row of rows) {
      counts[row.validation_status] = Number(row.count);
    }
    return counts;
  }
}

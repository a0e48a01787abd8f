import type {
  BatchEntry,
  BatchTransaction,
  ValidationResult,
  ValidationRule,
} from '../../types/index.js';
import { verifyHashFormat } from '../crypto/hashing.js';
import type { BlockStorageRepository } from '../../db/repositories/blockStorage.repository.js';

export const MAX_TIMESTAMP_AGE_SECONDS = 365 * 24 * 60 * 60;
export const MAX_TIMESTAMP_SKEW_SECONDS = 5 * 60;

const MODIFICATION_LEVELS = new Set([0, 1, 2]);

export interface TransactionValidatorOptions {
  /** null accepts every submitter */
  authorizedSubmitters: readonly string[] | null;
  batchSizeMin: number;
  batchSizeMax: number;
}

type LedgerLookup = Pick<BlockStorageRepository, 'findExistingHashes'>;

const VALID: ValidationResult = { isValid: true, reason: null, rule: null };

const reject = (rule: ValidationRule, reason: string): ValidationResult => ({
  isValid: false,
  reason,
  rule,
});

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

function checkTimestamp(timestamp: number, now: number): ValidationResult {
  if (!Number.isFinite(timestamp)) {
    return reject('timestamp_range', `Invalid timestamp: ${timestamp}`);
  }
  if (timestamp > now + MAX_TIMESTAMP_SKEW_SECONDS) {
    return reject('timestamp_range', `Timestamp in future: ${timestamp}`);
  }
  if (timestamp < now - MAX_TIMESTAMP_AGE_SECONDS) {
    return reject('timestamp_range', `Timestamp too old: ${timestamp}`);
  }
  return VALID;
}

function checkOptionalHash(label: string, value: string | null | undefined): ValidationResult {
  if (value === null || value === undefined || verifyHashFormat(value)) {
    return VALID;
  }
  return reject('entry_format', `Invalid ${label} format: ${value}`);
}

function checkModificationLevel(level: number): ValidationResult {
  return MODIFICATION_LEVELS.has(level)
    ? VALID
    : reject('entry_format', `Invalid modification level: ${level}`);
}

/**
 * Business rules every batch must pass before it can enter a block.
 * Checks run in a fixed order and stop at the first failure; a batch is
 * accepted or rejected as a whole.
 */
export class TransactionValidator {
  constructor(
    private readonly ledger: LedgerLookup,
    private readonly options: TransactionValidatorOptions
  ) {}

  async validateTransaction(
    tx: BatchTransaction,
    now: number = nowSeconds()
  ): Promise<ValidationResult> {
    const { authorizedSubmitters, batchSizeMin, batchSizeMax } = this.options;

    if (authorizedSubmitters && !authorizedSubmitters.includes(tx.submitterId)) {
      return reject('submitter_authorization', `Unauthorized submitter: ${tx.submitterId}`);
    }

    for (const imageHash of tx.imageHashes) {
      if (!verifyHashFormat(imageHash)) {
        return reject('hash_format', `Invalid hash format: ${imageHash}`);
      }
    }

    const count = tx.imageHashes.length;
    if (tx.timestamps.length !== count) {
      return reject('array_length', 'Image hashes and timestamps length mismatch');
    }
    const optionalArrays: [string, readonly unknown[] | undefined][] = [
      ['Modification levels', tx.modificationLevels],
      ['Parent hashes', tx.parentImageHashes],
      ['GPS hashes', tx.gpsHashes],
      ['Owner hashes', tx.ownerHashes],
    ];
    for (const [label, values] of optionalArrays) {
      if (values !== undefined && values.length !== count) {
        return reject('array_length', `${label} length mismatch`);
      }
    }

    for (let i = 0; i < count; i++) {
      const result = this.checkEntryFields({
        imageHash: tx.imageHashes[i],
        timestamp: tx.timestamps[i],
        modificationLevel: tx.modificationLevels?.[i] ?? 0,
        parentImageHash: tx.parentImageHashes?.[i],
        gpsHash: tx.gpsHashes?.[i],
        ownerHash: tx.ownerHashes?.[i],
      });
      if (!result.isValid) {
        return result;
      }
    }

    const normalized = tx.imageHashes.map((hash) => hash.toLowerCase());
    if (new Set(normalized).size !== normalized.length) {
      return reject('duplicate_in_transaction', 'Duplicate hashes within transaction');
    }

    const onChain = await this.ledger.findExistingHashes(normalized);
    if (onChain.size > 0) {
      return reject(
        'duplicate_on_chain',
        `Duplicate hash(es) already on blockchain: ${[...onChain].sort().join(', ')}`
      );
    }

    for (const timestamp of tx.timestamps) {
      const result = checkTimestamp(timestamp, now);
      if (!result.isValid) {
        return result;
      }
    }

    if (count < batchSizeMin) {
      return reject('batch_size', `Batch too small: ${count} < ${batchSizeMin}`);
    }
    if (count > batchSizeMax) {
      return reject('batch_size', `Batch too large: ${count} > ${batchSizeMax}`);
    }

    return VALID;
  }

  /**
   * Stateless checks for a single entry, so a batch can be assembled
   * from entries that will not sink it
   */
  screenEntry(entry: BatchEntry, now: number = nowSeconds()): ValidationResult {
    if (!verifyHashFormat(entry.imageHash)) {
      return reject('hash_format', `Invalid hash format: ${entry.imageHash}`);
    }
    const fields = this.checkEntryFields(entry);
    if (!fields.isValid) {
      return fields;
    }
    return checkTimestamp(entry.timestamp, now);
  }

  private checkEntryFields(entry: BatchEntry): ValidationResult {
    const checks = [
      () => checkModificationLevel(entry.modificationLevel),
      () => checkOptionalHash('parent hash', entry.parentImageHash),
      () => checkOptionalHash('GPS hash', entry.gpsHash),
      () => checkOptionalHash('owner hash', entry.ownerHash),
    ];
    for (const check of checks) {
      const result = check();
      if (!result.isValid) {
        return result;
      }
    }
    return VALID;
  }
}

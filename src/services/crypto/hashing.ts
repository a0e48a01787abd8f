import { createHash } from 'crypto';

export const ZERO_HASH = '0'.repeat(64);

const HASH_PATTERN = /^[0-9a-fA-F]{64}$/;

type CanonicalValue = string | number | boolean | null | CanonicalValue[] | CanonicalObject;
interface CanonicalObject {
  [key: string]: CanonicalValue;
}

export function sha256Hex(data: Buffer | string): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * Key-sorted JSON without whitespace and with every non-ASCII code unit escaped
 * as \uXXXX, so independent implementations hash identical bytes
 */
export function canonicalJson(value: CanonicalValue): string {
  return serialize(value).replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

function serialize(value: CanonicalValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(serialize).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${serialize(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * Deterministic block hash; transaction hashes are sorted before hashing
 */
export function computeBlockHash(
  blockHeight: number,
  previousHash: string,
  timestamp: number,
  transactionHashes: readonly string[],
  validatorId: string
): string {
  const blockData = {
    block_height: blockHeight,
    previous_hash: previousHash,
    timestamp,
    transaction_hashes: [...transactionHashes].sort(),
    validator_id: validatorId,
  };
  return sha256Hex(canonicalJson(blockData));
}

/**
 * Deterministic batch transaction hash. Image hashes are sorted, timestamps keep
 * submission order, and the submitter is recorded under `aggregator_id`.
 */
export function computeTransactionHash(
  imageHashes: readonly string[],
  timestamps: readonly number[],
  submitterId: string
): string {
  const txData = {
    image_hashes: [...imageHashes].sort(),
    timestamps: [...timestamps],
    aggregator_id: submitterId,
  };
  return sha256Hex(canonicalJson(txData));
}

/**
 * True for a 64-character hexadecimal string, either case
 */
export function verifyHashFormat(value: unknown): value is string {
  return typeof value === 'string' && HASH_PATTERN.test(value);
}

/**
 * Lowercased hash, or null when the input is not a well-formed SHA-256 hex digest
 */
export function normalizeHash(value: unknown): string | null {
  return verifyHashFormat(value) ? value.toLowerCase() : null;
}

// Ledger records keep capture time at minute resolution
export function roundToMinute(timestamp: number): number {
  return timestamp - (timestamp % 60);
}

/**
 * The byte string a validator signs for a block
 */
export function blockSigningPayload(
  blockHeight: number,
  previousHash: string,
  timestamp: number,
  transactionHashes: readonly string[],
  validatorId: string
): string {
  return `${blockHeight}${previousHash}${timestamp}${transactionHashes.join(',')}${validatorId}`;
}

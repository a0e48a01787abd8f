/**
 * One image hash with its provenance fields, as it enters a batch
 */
export interface BatchEntry {
  imageHash: string;
  timestamp: number;
  /** 0 raw capture, 1 processed, 2 significantly modified */
  modificationLevel: number;
  parentImageHash?: string | null;
  gpsHash?: string | null;
  ownerHash?: string | null;
}

/**
 * A batch of image hashes submitted as one ledger transaction.
 * Optional arrays, when present, are parallel to `imageHashes`.
 */
export interface BatchTransaction {
  imageHashes: string[];
  timestamps: number[];
  submitterId: string;
  signature: string;
  modificationLevels?: number[];
  parentImageHashes?: (string | null)[];
  gpsHashes?: (string | null)[];
  ownerHashes?: (string | null)[];
}

/**
 * Signed block produced by a consensus engine, not yet persisted
 */
export interface BlockProposal {
  height: number;
  previousHash: string;
  timestamp: number;
  validatorId: string;
  transactions: BatchTransaction[];
  transactionHashes: string[];
  signature: string;
}

export interface Block {
  height: number;
  blockHash: string;
  previousHash: string;
  timestamp: number;
  validatorId: string;
  transactionCount: number;
  signature: string;
}

export interface LedgerTransaction {
  txId: number;
  txHash: string;
  blockHeight: number;
  submitterId: string;
  batchSize: number;
  signature: string;
  merkleRoot: string | null;
  treeDepth: number | null;
}

export interface ImageHashRecord {
  imageHash: string;
  txId: number;
  blockHeight: number;
  timestamp: number;
  modificationLevel: number;
  parentImageHash: string | null;
  submitterId: string;
  gpsHash: string | null;
  ownerHash: string | null;
}

export interface NodeState {
  nodeId: string;
  currentBlockHeight: number;
  totalHashes: number;
  genesisHash: string | null;
  lastBlockTime: number | null;
}

export type ProofPosition = 'left' | 'right';

export interface MerkleProofStep {
  siblingHash: string;
  position: ProofPosition;
}

export interface MerkleProof {
  txId: number;
  imageHash: string;
  leafIndex: number;
  path: MerkleProofStep[];
}

export type ValidationRule =
  | 'submitter_authorization'
  | 'hash_format'
  | 'array_length'
  | 'entry_format'
  | 'duplicate_in_transaction'
  | 'duplicate_on_chain'
  | 'timestamp_range'
  | 'batch_size';

export interface ValidationResult {
  isValid: boolean;
  reason: string | null;
  rule: ValidationRule | null;
}

export type ValidationStatus = 'pending' | 'validated' | 'rejected';

/**
 * Encrypted camera token material, checked by the manufacturer authority
 */
export interface CameraToken {
  ciphertext: string;
  authTag: string;
  nonce: string;
  tableId: number;
  keyIndex: number;
}

export interface TokenValidationRequest extends CameraToken {
  authorityId: string;
}

/**
 * Device certificate and the device's signature over the image fields
 */
export interface CertificateBundle {
  /** Base64-encoded PEM certificate */
  cameraCert: string;
  /** Base64-encoded ECDSA signature */
  bundleSignature: string;
}

/**
 * The certificate path sends the image hash to the authority, since the
 * bundle signature covers it
 */
export interface CertificateValidationRequest extends CertificateBundle {
  imageHash: string;
  timestamp: number;
  gpsHash: string | null;
  authorityId: string;
}

export interface TokenValidationResult {
  valid: boolean;
  message: string;
  retryable: boolean;
}

export type SubmissionKind = 'camera_token' | 'certificate';

interface PendingSubmissionBase extends BatchEntry {
  id: number;
  receiptId: string;
  submitterId: string;
  authorityId: string;
  validationStatus: ValidationStatus;
  validationMessage: string | null;
  retryCount: number;
  nextRetryAt: number | null;
  batched: boolean;
  txId: number | null;
  createdAt: number;
}

export interface TokenSubmission extends PendingSubmissionBase, CameraToken {
  kind: 'camera_token';
}

export interface CertificateSubmission extends PendingSubmissionBase, CertificateBundle {
  kind: 'certificate';
}

export type PendingSubmission = TokenSubmission | CertificateSubmission;

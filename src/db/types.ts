import type {
  CameraToken,
  CertificateBundle,
  SubmissionKind,
  ValidationStatus,
} from '../types/index.js';

// Row shapes as stored. Integer columns come back as numbers from both drivers;
// SQLite returns booleans as 0/1.

export interface BlockRow {
  height: number;
  block_hash: string;
  previous_hash: string;
  timestamp: number;
  validator_id: string;
  transaction_count: number;
  signature: string;
}

export interface TransactionRow {
  tx_id: number;
  tx_hash: string;
  block_height: number;
  submitter_id: string;
  batch_size: number;
  signature: string;
  merkle_root: string | null;
  tree_depth: number | null;
}

export interface ImageHashRow {
  image_hash: string;
  tx_id: number;
  block_height: number;
  timestamp: number;
  modification_level: number;
  parent_image_hash: string | null;
  submitter_id: string;
  gps_hash: string | null;
  owner_hash: string | null;
}

export interface NodeStateRow {
  node_id: string;
  current_block_height: number;
  total_hashes: number;
  genesis_hash: string | null;
  last_block_time: number | null;
}

export interface MerkleProofRow {
  id: number;
  tx_id: number;
  image_hash: string;
  leaf_index: number;
  proof_path: string;
}

export interface PendingSubmissionRow {
  id: number;
  receipt_id: string;
  kind: SubmissionKind;
  image_hash: string;
  timestamp: number;
  modification_level: number;
  parent_image_hash: string | null;
  gps_hash: string | null;
  owner_hash: string | null;
  submitter_id: string;
  ciphertext: string | null;
  auth_tag: string | null;
  nonce: string | null;
  table_id: number | null;
  key_index: number | null;
  camera_cert: string | null;
  bundle_signature: string | null;
  authority_id: string;
  validation_status: ValidationStatus;
  validation_message: string | null;
  retry_count: number;
  next_retry_at: number | null;
  batched: boolean | number;
  tx_id: number | null;
  created_at: number;
  updated_at: number;
}

interface CreateSubmissionFields {
  imageHash: string;
  timestamp: number;
  modificationLevel: number;
  parentImageHash?: string | null;
  gpsHash?: string | null;
  ownerHash?: string | null;
  submitterId: string;
  authorityId: string;
}

/**
 * Input for staging a token-authenticated submission; `kind` defaults to a camera token
 */
export interface CreateTokenSubmissionInput extends CreateSubmissionFields, CameraToken {
  kind?: 'camera_token';
}

export interface CreateCertificateSubmissionInput
  extends CreateSubmissionFields,
    CertificateBundle {
  kind: 'certificate';
}

export type CreatePendingSubmissionInput =
  | CreateTokenSubmissionInput
  | CreateCertificateSubmissionInput;

import type { Knex } from 'knex';
import type { DatabaseAdapter } from '../adapters/DatabaseAdapter.js';
import type {
  BlockRow,
  ImageHashRow,
  MerkleProofRow,
  NodeStateRow,
  TransactionRow,
} from '../types.js';
import type {
  BatchTransaction,
  Block,
  BlockProposal,
  ImageHashRecord,
  LedgerTransaction,
  MerkleProof,
  MerkleProofStep,
  NodeState,
} from '../../types/index.js';
import {
  ZERO_HASH,
  blockSigningPayload,
  computeBlockHash,
  computeTransactionHash,
  normalizeHash,
  roundToMinute,
} from '../../services/crypto/hashing.js';
import type { ValidatorKeys } from '../../services/crypto/validatorKeys.js';
import type { MerkleService } from '../../services/merkle/merkle.service.js';
import { ChainConflictError, InvalidInputError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Extra writes committed in the same database transaction as a block
 */
export type AfterBlockWrite = (trx: Knex.Transaction, block: StoredBlock) => Promise<void>;

export interface StoredBlock {
  block: Block;
  txIds: number[];
}

export interface MerkleProofWithRoot extends MerkleProof {
  merkleRoot: string;
  blockHeight: number;
}

// Keeps IN lists under SQLite's bound-parameter limit
const LOOKUP_CHUNK_SIZE = 500;
const INSERT_CHUNK_SIZE = 100;

const toBlock = (row: BlockRow): Block => ({
  height: row.height,
  blockHash: row.block_hash,
  previousHash: row.previous_hash,
  timestamp: row.timestamp,
  validatorId: row.validator_id,
  transactionCount: row.transaction_count,
  signature: row.signature,
});

const toTransaction = (row: TransactionRow): LedgerTransaction => ({
  txId: row.tx_id,
  txHash: row.tx_hash,
  blockHeight: row.block_height,
  submitterId: row.submitter_id,
  batchSize: row.batch_size,
  signature: row.signature,
  merkleRoot: row.merkle_root,
  treeDepth: row.tree_depth,
});

const toImageHashRecord = (row: ImageHashRow): ImageHashRecord => ({
  imageHash: row.image_hash,
  txId: row.tx_id,
  blockHeight: row.block_height,
  timestamp: row.timestamp,
  modificationLevel: row.modification_level,
  parentImageHash: row.parent_image_hash,
  submitterId: row.submitter_id,
  gpsHash: row.gps_hash,
  ownerHash: row.owner_hash,
});

const toNodeState = (row: NodeStateRow): NodeState => ({
  nodeId: row.node_id,
  currentBlockHeight: row.current_block_height,
  totalHashes: row.total_hashes,
  genesisHash: row.genesis_hash,
  lastBlockTime: row.last_block_time,
});

function parseProofPath(raw: string): MerkleProofStep[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new InvalidInputError('Stored Merkle proof is not a list');
  }
  return parsed.map((step: unknown) => {
    if (
      typeof step !== 'object' ||
      step === null ||
      !('sibling_hash' in step) ||
      !('position' in step) ||
      typeof step.sibling_hash !== 'string' ||
      (step.position !== 'left' && step.position !== 'right')
    ) {
      throw new InvalidInputError('Stored Merkle proof step is malformed');
    }
    return { siblingHash: step.sibling_hash, position: step.position };
  });
}

// Insert ids come back as a bare number (older drivers) or a row object
function insertedTxId(row: unknown): number {
  if (typeof row === 'number') {
    return row;
  }
  if (typeof row === 'object' && row !== null && 'tx_id' in row && typeof row.tx_id === 'number') {
    return row.tx_id;
  }
  throw new Error('Insert did not return tx_id');
}

/**
 * Append-only ledger storage: blocks, their transactions, image hash records,
 * Merkle proofs and node state. The only writer of those tables.
 */
export class BlockStorageRepository {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly db: DatabaseAdapter,
    private readonly merkle: MerkleService,
    private readonly nodeId: string
  ) {}

  /**
   * Serialize "read tip, build block, store block" sequences within this process
   */
  async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(fn);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Persist a proposal and everything derived from it in one database transaction.
   * Block and transaction hashes are recomputed from the raw payloads.
   */
  async storeBlock(proposal: BlockProposal, afterWrite?: AfterBlockWrite): Promise<StoredBlock> {
    const transactionHashes = proposal.transactions.map((tx) =>
      computeTransactionHash(this.normalizeAll(tx.imageHashes), tx.timestamps, tx.submitterId)
    );

    const declared = [...proposal.transactionHashes].sort().join(',');
    if (declared !== [...transactionHashes].sort().join(',')) {
      throw new InvalidInputError('Proposal transaction hashes do not match its transactions');
    }

    const blockHash = computeBlockHash(
      proposal.height,
      proposal.previousHash,
      proposal.timestamp,
      transactionHashes,
      proposal.validatorId
    );

    const stored = await this.db.transaction(async (trx) => {
      await this.assertExtendsTip(trx, proposal);

      const blockRow: BlockRow = {
        height: proposal.height,
        block_hash: blockHash,
        previous_hash: proposal.previousHash,
        timestamp: proposal.timestamp,
        validator_id: proposal.validatorId,
        transaction_count: proposal.transactions.length,
        signature: proposal.signature,
      };
      await trx('blocks').insert(blockRow);

      const txIds: number[] = [];
      for (const [index, tx] of proposal.transactions.entries()) {
        txIds.push(await this.insertTransaction(trx, proposal.height, tx, transactionHashes[index]));
      }

      await this.writeNodeState(trx, proposal.height, blockHash, proposal.timestamp);

      const result: StoredBlock = { block: toBlock(blockRow), txIds };
      if (afterWrite) {
        await afterWrite(trx, result);
      }
      return result;
    });

    logger.info(
      {
        blockHeight: proposal.height,
        blockHash,
        transactions: stored.txIds.length,
      },
      'Block stored'
    );
    return stored;
  }

  /**
   * Store the height-0 block if the chain is empty; returns the genesis block either way
   */
  async initializeGenesis(
    keys: ValidatorKeys,
    validatorId: string,
    timestamp: number = Math.floor(Date.now() / 1000)
  ): Promise<Block> {
    return this.withWriteLock(async () => {
      const existing = await this.getBlockByHeight(0);
      if (existing) {
        logger.info({ blockHash: existing.blockHash }, 'Genesis block already exists');
        return existing;
      }

      const signature = keys.sign(blockSigningPayload(0, ZERO_HASH, timestamp, [], validatorId));
      const { block } = await this.storeBlock({
        height: 0,
        previousHash: ZERO_HASH,
        timestamp,
        validatorId,
        transactions: [],
        transactionHashes: [],
        signature,
      });

      logger.info({ blockHash: block.blockHash, timestamp }, 'Genesis block created');
      return block;
    });
  }

  async getLatestBlock(): Promise<Block | null> {
    const row = await this.db.getKnex()<BlockRow>('blocks').orderBy('height', 'desc').first();
    return row ? toBlock(row) : null;
  }

  async getBlockByHeight(height: number): Promise<Block | null> {
    const row = await this.db.getKnex()<BlockRow>('blocks').where('height', height).first();
    return row ? toBlock(row) : null;
  }

  async getBlockByHash(blockHash: string): Promise<Block | null> {
    const normalized = normalizeHash(blockHash);
    if (!normalized) {
      return null;
    }
    const row = await this.db
      .getKnex()<BlockRow>('blocks')
      .where('block_hash', normalized)
      .first();
    return row ? toBlock(row) : null;
  }

  async getTransactionsForBlock(height: number): Promise<LedgerTransaction[]> {
    const rows = await this.db
      .getKnex()<TransactionRow>('transactions')
      .where('block_height', height)
      .orderBy('tx_id', 'asc');
    return rows.map(toTransaction);
  }

  /**
   * Ledger record for an image hash, or null when it was never committed
   */
  async verifyImageHash(imageHash: string): Promise<ImageHashRecord | null> {
    const normalized = normalizeHash(imageHash);
    if (!normalized) {
      return null;
    }
    const row = await this.db
      .getKnex()<ImageHashRow>('image_hashes')
      .where('image_hash', normalized)
      .first();
    return row ? toImageHashRecord(row) : null;
  }

  /**
   * Which of `imageHashes` are already on the ledger (lowercased)
   */
  async findExistingHashes(imageHashes: readonly string[]): Promise<Set<string>> {
    const normalized = [...new Set(this.normalizeAll(imageHashes))];
    const existing = new Set<string>();

    for (let i = 0; i < normalized.length; i += LOOKUP_CHUNK_SIZE) {
      const chunk = normalized.slice(i, i + LOOKUP_CHUNK_SIZE);
      const rows = await this.db
        .getKnex()<ImageHashRow>('image_hashes')
        .whereIn('image_hash', chunk)
        .select('image_hash');
      for (const row of rows) {
        existing.add(row.image_hash);
      }
    }
    return existing;
  }

  async getTotalHashCount(): Promise<number> {
    return this.countImageHashes(this.db.getKnex());
  }

  async getNodeState(): Promise<NodeState | null> {
    const row = await this.db
      .getKnex()<NodeStateRow>('node_state')
      .where('node_id', this.nodeId)
      .first();
    return row ? toNodeState(row) : null;
  }

  /**
   * Point node state at a block and recount stored hashes
   */
  async updateNodeState(blockHeight: number, blockHash: string): Promise<void> {
    const block = await this.getBlockByHeight(blockHeight);
    await this.db.transaction((trx) =>
      this.writeNodeState(trx, blockHeight, blockHash, block?.timestamp ?? null)
    );
  }

  async getMerkleProof(imageHash: string): Promise<MerkleProofWithRoot | null> {
    const normalized = normalizeHash(imageHash);
    if (!normalized) {
      return null;
    }

    const row = await this.db
      .getKnex()<MerkleProofRow>('merkle_proofs')
      .where('image_hash', normalized)
      .first();
    if (!row) {
      return null;
    }

    const tx = await this.db
      .getKnex()<TransactionRow>('transactions')
      .where('tx_id', row.tx_id)
      .first();
    if (!tx || tx.merkle_root === null) {
      return null;
    }

    return {
      txId: row.tx_id,
      imageHash: row.image_hash,
      leafIndex: row.leaf_index,
      path: parseProofPath(row.proof_path),
      merkleRoot: tx.merkle_root,
      blockHeight: tx.block_height,
    };
  }

  private async assertExtendsTip(trx: Knex.Transaction, proposal: BlockProposal): Promise<void> {
    const tip = await trx<BlockRow>('blocks').orderBy('height', 'desc').first();
    const expectedHeight = tip ? tip.height + 1 : 0;
    const expectedPrevious = tip ? tip.block_hash : ZERO_HASH;

    if (proposal.height !== expectedHeight || proposal.previousHash !== expectedPrevious) {
      throw new ChainConflictError(
        `Block ${proposal.height} does not extend the chain tip (expected height ${expectedHeight})`,
        expectedHeight,
        proposal.height
      );
    }
  }

  private async insertTransaction(
    trx: Knex.Transaction,
    blockHeight: number,
    tx: BatchTransaction,
    txHash: string
  ): Promise<number> {
    const imageHashes = this.normalizeAll(tx.imageHashes);
    const tree = imageHashes.length > 0 ? this.merkle.buildTree(imageHashes) : null;

    const [inserted] = await trx('transactions')
      .insert({
        tx_hash: txHash,
        block_height: blockHeight,
        submitter_id: tx.submitterId,
        batch_size: imageHashes.length,
        signature: tx.signature,
        merkle_root: tree?.root ?? null,
        tree_depth: tree?.depth ?? null,
      })
      .returning('tx_id');
    const txId = insertedTxId(inserted);

    const imageRows: ImageHashRow[] = imageHashes.map((imageHash, i) => ({
      image_hash: imageHash,
      tx_id: txId,
      block_height: blockHeight,
      timestamp: roundToMinute(tx.timestamps[i]),
      modification_level: tx.modificationLevels?.[i] ?? 0,
      parent_image_hash: normalizeHash(tx.parentImageHashes?.[i]),
      submitter_id: tx.submitterId,
      gps_hash: normalizeHash(tx.gpsHashes?.[i]),
      owner_hash: normalizeHash(tx.ownerHashes?.[i]),
    }));
    await this.insertChunked(trx, 'image_hashes', imageRows);

    if (tree) {
      const proofRows = tree.proofs.map((proof) => ({
        tx_id: txId,
        image_hash: proof.imageHash,
        leaf_index: proof.leafIndex,
        proof_path: JSON.stringify(
          proof.path.map((step) => ({ sibling_hash: step.siblingHash, position: step.position }))
        ),
      }));
      await this.insertChunked(trx, 'merkle_proofs', proofRows);
    }

    return txId;
  }

  private async writeNodeState(
    db: Knex,
    blockHeight: number,
    blockHash: string,
    blockTime: number | null
  ): Promise<void> {
    const totalHashes = await this.countImageHashes(db);
    const existing = await db<NodeStateRow>('node_state').where('node_id', this.nodeId).first();

    if (existing) {
      await db('node_state').where('node_id', this.nodeId).update({
        ...(blockHeight === 0 ? { genesis_hash: blockHash } : {}),
        current_block_height: blockHeight,
        total_hashes: totalHashes,
        last_block_time: blockTime,
      });
      return;
    }

    await db('node_state').insert({
      node_id: this.nodeId,
      current_block_height: blockHeight,
      total_hashes: totalHashes,
      genesis_hash: blockHeight === 0 ? blockHash : null,
      last_block_time: blockTime,
    });
  }

  private async countImageHashes(db: Knex): Promise<number> {
    const result = await db('image_hashes').count<{ count: number | string }[]>('* as count');
    return Number(result[0]?.count ?? 0);
  }

  private async insertChunked(
    trx: Knex.Transaction,
    table: string,
    rows: readonly object[]
  ): Promise<void> {
    for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
      await trx(table).insert(rows.slice(i, i + INSERT_CHUNK_SIZE));
    }
  }

  private normalizeAll(hashes: readonly string[]): string[] {
    return hashes.map((hash) => {
      const normalized = normalizeHash(hash);
      if (!normalized) {
        throw new InvalidInputError(`Malformed image hash: ${hash}`);
      }
      return normalized;
    });
  }
}

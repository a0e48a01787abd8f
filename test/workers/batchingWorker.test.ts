import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DatabaseConnection } from '../../src/db/database.js';
import type { CreateTokenSubmissionInput } from '../../src/db/types.js';
import { createLedgerNode, type LedgerNode } from '../../src/node.js';
import { ValidatorKeys } from '../../src/services/crypto/validatorKeys.js';
import { buildBatchTransaction } from '../../src/workers/batchingWorker.js';
import type { PendingSubmission } from '../../src/types/index.js';
import { createTestConfig, createTestDatabase, hashOf, nowSeconds } from '../utils/test-db.js';

describe('BatchingWorker', () => {
  let db: DatabaseConnection;
  let node: LedgerNode;
  const keys = ValidatorKeys.generate();

  const setup = async (env: Record<string, string> = {}) => {
    db = await createTestDatabase();
    node = createLedgerNode(createTestConfig(env), db.getAdapter(), keys);
    await node.storage.initializeGenesis(keys, 'validator_test');
  };

  const stageValidated = async (
    imageHash: string,
    overrides: Partial<CreateTokenSubmissionInput> = {}
  ): Promise<PendingSubmission> => {
    const created = await node.submissions.create({
      imageHash,
      timestamp: nowSeconds() - 30,
      modificationLevel: 0,
      submitterId: 'camera_1',
      ciphertext: 'ciphertext',
      authTag: 'tag',
      nonce: `nonce-${imageHash.slice(0, 4)}`,
      tableId: 1,
      keyIndex: 2,
      authorityId: 'authority_1',
      ...overrides,
    });
    await node.submissions.recordValidationAttempt(created.id, {
      status: 'validated',
      message: 'Token validated',
      retryCount: 1,
      nextRetryAt: null,
    });
    return created;
  };

  afterEach(async () => {
    await db.close();
  });

  describe('runCycle', () => {
    beforeEach(() => setup());

    it('should stay idle without validated submissions', async () => {
      expect(await node.batchingWorker.runCycle()).toEqual({ status: 'idle', count: 0 });
      expect((await node.storage.getLatestBlock())?.height).toBe(0);
    });

    it('should commit validated submissions as one block', async () => {
      const staged = [
        await stageValidated(hashOf('a'), { modificationLevel: 1, ownerHash: hashOf('e') }),
        await stageValidated(hashOf('b')),
        await stageValidated(hashOf('c')),
      ];

      const result = await node.batchingWorker.runCycle();

      expect(result).toEqual({ status: 'committed', count: 3, blockHeight: 1, txId: 1 });

      const [tx] = await node.storage.getTransactionsForBlock(1);
      expect(tx).toMatchObject({
        submitterId: 'validator_test',
        batchSize: 3,
        merkleRoot: '26d974d88e212bfe4d86dfb25e26df30afa9006d70f931b0c2ca482b5bfe242a',
      });

      for (const submission of staged) {
        expect(await node.submissions.findByReceiptId(submission.receiptId)).toMatchObject({
          batched: true,
          txId: 1,
        });
      }
      expect(await node.storage.verifyImageHash(hashOf('a'))).toMatchObject({
        modificationLevel: 1,
        ownerHash: hashOf('e'),
      });
      expect(await node.submissions.countAwaiting()).toBe(0);
      expect(await node.batchingWorker.runCycle()).toEqual({ status: 'idle', count: 0 });
    });

    it('should drop entries that would sink the batch', async () => {
      const timestamp = nowSeconds() - 30;
      await node.ledger.submit({ imageHash: hashOf('a'), timestamp, submitterId: 'camera_1' });

      const onChain = await stageValidated(hashOf('a'));
      const good = await stageValidated(hashOf('b'));
      const repeated = await stageValidated(hashOf('b'), { nonce: 'other-nonce' });
      const future = nowSeconds() + 3600;
      const early = await stageValidated(hashOf('c'), { timestamp: future });

      const result = await node.batchingWorker.runCycle();

      expect(result).toEqual({ status: 'committed', count: 1, blockHeight: 2, txId: 2 });
      expect(await node.submissions.findByReceiptId(onChain.receiptId)).toMatchObject({
        validationStatus: 'rejected',
        validationMessage: 'Image hash already on blockchain',
      });
      expect(await node.submissions.findByReceiptId(repeated.receiptId)).toMatchObject({
        validationStatus: 'rejected',
        validationMessage: 'Duplicate image hash in batch',
      });
      expect(await node.submissions.findByReceiptId(early.receiptId)).toMatchObject({
        validationStatus: 'rejected',
        validationMessage: `Timestamp in future: ${future}`,
      });
      expect(await node.submissions.findByReceiptId(good.receiptId)).toMatchObject({
        batched: true,
        txId: 2,
      });
    });

    it('should report idle when every entry was dropped', async () => {
      await stageValidated(hashOf('a'), { timestamp: nowSeconds() + 3600 });
      expect(await node.batchingWorker.runCycle()).toEqual({ status: 'idle', count: 0 });
    });
  });

  describe('minimum batch size', () => {
    beforeEach(() => setup({ BATCH_SIZE_MIN: '3' }));

    it('should wait until enough submissions are validated', async () => {
      await stageValidated(hashOf('a'));
      await stageValidated(hashOf('b'));

      expect(await node.batchingWorker.runCycle()).toEqual({ status: 'waiting', count: 2 });
      expect((await node.storage.getLatestBlock())?.height).toBe(0);

      await stageValidated(hashOf('c'));
      expect(await node.batchingWorker.runCycle()).toMatchObject({
        status: 'committed',
        count: 3,
      });
    });
  });

  describe('maximum batch size', () => {
    beforeEach(() => setup({ BATCH_SIZE_MAX: '2' }));

    it('should take at most the maximum per cycle, oldest first', async () => {
      await stageValidated(hashOf('a'));
      await stageValidated(hashOf('b'));
      await stageValidated(hashOf('c'));

      expect(await node.batchingWorker.runCycle()).toMatchObject({ status: 'committed', count: 2 });
      expect(await node.storage.verifyImageHash(hashOf('c'))).toBeNull();

      expect(await node.batchingWorker.runCycle()).toMatchObject({
        status: 'committed',
        count: 1,
        blockHeight: 2,
      });
    });
  });

  it('should sign the sorted image hashes of a batch', async () => {
    await setup();
    const second = await stageValidated(hashOf('b'));
    const first = await stageValidated(hashOf('A'));

    const tx = buildBatchTransaction([second, first], 'validator_test', keys);

    expect(tx.imageHashes).toEqual([hashOf('b'), hashOf('a')]);
    expect(tx.submitterId).toBe('validator_test');
    expect(keys.verify(`${hashOf('a')},${hashOf('b')}`, tx.signature)).toBe(true);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { DatabaseConnection } from '../../src/db/database.js';
import { PendingSubmissionsRepository } from '../../src/db/repositories/pendingSubmissions.repository.js';
import type { CreateTokenSubmissionInput } from '../../src/db/types.js';
import { createTestDatabase, hashOf } from '../utils/test-db.js';

const input = (overrides: Partial<CreateTokenSubmissionInput> = {}): CreateTokenSubmissionInput => ({
  imageHash: hashOf('a'),
  timestamp: 1_700_000_000,
  modificationLevel: 0,
  submitterId: 'camera_1',
  ciphertext: 'ciphertext-1',
  authTag: 'tag-1',
  nonce: 'nonce-1',
  tableId: 3,
  keyIndex: 7,
  authorityId: 'authority_1',
  ...overrides,
});

describe('PendingSubmissionsRepository', () => {
  let db: DatabaseConnection;
  let repo: PendingSubmissionsRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repo = new PendingSubmissionsRepository(db.getAdapter());
  });

  afterEach(async () => {
    await db.close();
  });

  it('should create a pending submission with a receipt id', async () => {
    const created = await repo.create(input({ gpsHash: hashOf('e') }));

    expect(created.receiptId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
    expect(created).toMatchObject({
      imageHash: hashOf('a'),
      gpsHash: hashOf('e'),
      parentImageHash: null,
      validationStatus: 'pending',
      validationMessage: null,
      retryCount: 0,
      batched: false,
      txId: null,
      tableId: 3,
      keyIndex: 7,
    });
    expect(await repo.findByReceiptId(created.receiptId)).toEqual(created);
    expect(await repo.findByReceiptId('missing')).toBeNull();
  });

  it('should default to a camera token submission', async () => {
    const created = await repo.create(input());
    expect(created.kind).toBe('camera_token');
  });

  it('should store a certificate bundle submission', async () => {
    const created = await repo.create({
      kind: 'certificate',
      imageHash: hashOf('b'),
      timestamp: 1_700_000_000,
      modificationLevel: 0,
      gpsHash: hashOf('e'),
      submitterId: 'camera_1',
      cameraCert: 'Y2VydA==',
      bundleSignature: 'c2ln',
      authorityId: 'authority_1',
    });

    expect(created).toMatchObject({
      kind: 'certificate',
      imageHash: hashOf('b'),
      gpsHash: hashOf('e'),
      cameraCert: 'Y2VydA==',
      bundleSignature: 'c2ln',
      validationStatus: 'pending',
    });
    expect(created).not.toHaveProperty('ciphertext');

    const [due] = await repo.findDueForValidation(5, 10, created.createdAt);
    expect(due).toEqual(created);
  });

  it('should treat a hash as staged until it is rejected', async () => {
    const created = await repo.create(input());
    expect(await repo.isStaged(hashOf('a'))).toBe(true);
    expect(await repo.isStaged(hashOf('b'))).toBe(false);

    await repo.markRejected(created.id, 'Token rejected');

    expect(await repo.isStaged(hashOf('a'))).toBe(false);
    expect(await repo.findByReceiptId(created.receiptId)).toMatchObject({
      validationStatus: 'rejected',
      validationMessage: 'Token rejected',
    });
  });

  it('should select submissions due for validation', async () => {
    const due = await repo.create(input({ imageHash: hashOf('a') }));
    const later = await repo.create(input({ imageHash: hashOf('b') }));
    const exhausted = await repo.create(input({ imageHash: hashOf('c') }));
    const now = Math.floor(Date.now() / 1000);

    await repo.recordValidationAttempt(later.id, {
      status: 'pending',
      message: 'Authority validation timeout',
      retryCount: 1,
      nextRetryAt: now + 60,
    });
    await repo.recordValidationAttempt(exhausted.id, {
      status: 'pending',
      message: 'Authority validation timeout',
      retryCount: 5,
      nextRetryAt: now,
    });

    const found = await repo.findDueForValidation(5, 10, now);
    expect(found.map((s) => s.id)).toEqual([due.id]);

    const afterDelay = await repo.findDueForValidation(5, 10, now + 60);
    expect(afterDelay.map((s) => s.id)).toEqual([due.id, later.id]);

    expect(await repo.findDueForValidation(5, 1, now + 60)).toHaveLength(1);
  });

  it('should hand validated, unbatched submissions to batching and mark them in a transaction', async () => {
    const first = await repo.create(input({ imageHash: hashOf('a') }));
    const second = await repo.create(input({ imageHash: hashOf('b') }));
    await repo.create(input({ imageHash: hashOf('c') }));

    for (const submission of [first, second]) {
      await repo.recordValidationAttempt(submission.id, {
        status: 'validated',
        message: 'Token validated',
        retryCount: 1,
        nextRetryAt: null,
      });
    }

    const ready = await repo.findReadyForBatching(10);
    expect(ready.map((s) => s.imageHash)).toEqual([hashOf('a'), hashOf('b')]);

    await db.getAdapter().transaction((trx) => repo.markBatched(trx, [first.id], 42));

    expect((await repo.findReadyForBatching(10)).map((s) => s.id)).toEqual([second.id]);
    expect(await repo.findByReceiptId(first.receiptId)).toMatchObject({ batched: true, txId: 42 });
  });

  it('should count awaiting submissions and statuses', async () => {
    const a = await repo.create(input({ imageHash: hashOf('a') }));
    const b = await repo.create(input({ imageHash: hashOf('b') }));
    await repo.create(input({ imageHash: hashOf('c') }));

    await repo.markRejected(a.id, 'Token rejected');
    await repo.recordValidationAttempt(b.id, {
      status: 'validated',
      message: null,
      retryCount: 1,
      nextRetryAt: null,
    });

    expect(await repo.countAwaiting()).toBe(2);
    expect(await repo.getStatusCounts()).toEqual({ pending: 1, validated: 1, rejected: 1 });

    await db.getAdapter().transaction((trx) => repo.markBatched(trx, [b.id], 1));
    expect(await repo.countAwaiting()).toBe(1);
  });
});

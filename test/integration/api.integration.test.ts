import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import type { DatabaseConnection } from '../../src/db/database.js';
import { createServer } from '../../src/api/server.js';
import { createLedgerNode, type LedgerNode } from '../../src/node.js';
import { ValidatorKeys } from '../../src/services/crypto/validatorKeys.js';
import { createTestConfig, createTestDatabase, hashOf, nowSeconds } from '../utils/test-db.js';

const ADMIN_PASSWORD = 'test-secret';

describe('Ledger API Integration', () => {
  let db: DatabaseConnection;
  let node: LedgerNode;
  let app: Express;
  const keys = ValidatorKeys.generate();

  const intakeBody = (imageHash: string, overrides: Record<string, unknown> = {}) => ({
    imageHash,
    timestamp: nowSeconds() - 30,
    submitterId: 'camera_1',
    cameraToken: {
      ciphertext: 'ciphertext-1',
      authTag: 'tag-1',
      nonce: 'nonce-1',
      tableId: 3,
      keyIndex: 7,
    },
    authorityId: 'authority_1',
    ...overrides,
  });

  beforeEach(async () => {
    db = await createTestDatabase();
    const config = createTestConfig();
    node = createLedgerNode(config, db.getAdapter(), keys);
    await node.storage.initializeGenesis(keys, config.nodeId);
    app = createServer(config, node.handlers);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await db.close();
  });

  describe('GET /health', () => {
    it('should report healthy', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.environment).toBe('test');
    });
  });

  describe('POST /api/v1/blockchain/submit', () => {
    it('should commit a hash and make it verifiable', async () => {
      const res = await request(app)
        .post('/api/v1/blockchain/submit')
        .send({ imageHash: hashOf('A'), timestamp: nowSeconds() - 30, submitterId: 'camera_1' });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ imageHash: hashOf('a'), txId: 1, blockHeight: 1 });

      const verify = await request(app).get(`/api/v1/verify/${hashOf('a')}`);
      expect(verify.status).toBe(200);
      expect(verify.body).toMatchObject({
        verified: true,
        imageHash: hashOf('a'),
        blockHeight: 1,
        txId: 1,
        submitterId: 'camera_1',
      });
    });

    it('should answer 409 for a duplicate hash', async () => {
      const body = { imageHash: hashOf('a'), timestamp: nowSeconds() - 30, submitterId: 'camera_1' };
      await request(app).post('/api/v1/blockchain/submit').send(body);

      const res = await request(app).post('/api/v1/blockchain/submit').send(body);

      expect(res.status).toBe(409);
      expect(res.body.error).toEqual({
        message: `Duplicate hash(es) already on blockchain: ${hashOf('a')}`,
        rule: 'duplicate_on_chain',
      });
    });

    it('should answer 400 with the failed rule', async () => {
      const timestamp = nowSeconds() + 3600;
      const res = await request(app)
        .post('/api/v1/blockchain/submit')
        .send({ imageHash: hashOf('a'), timestamp, submitterId: 'camera_1' });

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        message: `Timestamp in future: ${timestamp}`,
        rule: 'timestamp_range',
      });
    });

    it('should validate the request body', async () => {
      const missing = await request(app)
        .post('/api/v1/blockchain/submit')
        .send({ timestamp: 1, submitterId: 'camera_1' });
      expect(missing.status).toBe(400);
      expect(missing.body.error).toEqual({ message: 'imageHash is required', field: 'imageHash' });

      const malformed = await request(app)
        .post('/api/v1/blockchain/submit')
        .send({ imageHash: 'xyz', timestamp: 1, submitterId: 'camera_1' });
      expect(malformed.body.error).toEqual({
        message: 'Invalid imageHash format',
        field: 'imageHash',
      });

      const badLevel = await request(app)
        .post('/api/v1/blockchain/submit')
        .send({ imageHash: hashOf('a'), timestamp: 1, submitterId: 'c', modificationLevel: 5 });
      expect(badLevel.body.error).toEqual({
        message: 'modificationLevel must be at most 2',
        field: 'modificationLevel',
      });
    });

    it('should reject malformed JSON', async () => {
      const res = await request(app)
        .post('/api/v1/blockchain/submit')
        .set('Content-Type', 'application/json')
        .send('{"imageHash":');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Malformed JSON body');
    });
  });

  describe('GET /api/v1/verify/:imageHash', () => {
    it('should report an unknown hash as unverified', async () => {
      const res = await request(app).get(`/api/v1/verify/${hashOf('b')}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ verified: false, imageHash: hashOf('b') });
    });

    it('should reject a malformed hash', async () => {
      const res = await request(app).get('/api/v1/verify/not-a-hash');

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({ message: 'Invalid SHA256 hash format', field: 'imageHash' });
    });

    it('should serve Merkle proofs and provenance', async () => {
      await node.ledger.submit({ imageHash: hashOf('a'), timestamp: nowSeconds(), submitterId: 'c' });
      await node.ledger.submit({
        imageHash: hashOf('b'),
        timestamp: nowSeconds(),
        submitterId: 'c',
        modificationLevel: 1,
        parentImageHash: hashOf('a'),
      });

      const proof = await request(app).get(`/api/v1/verify/${hashOf('b')}/proof`);
      expect(proof.status).toBe(200);
      expect(proof.body).toMatchObject({ merkleRoot: hashOf('b'), path: [], valid: true });

      const provenance = await request(app).get(`/api/v1/verify/${hashOf('b')}/provenance`);
      expect(provenance.status).toBe(200);
      expect(provenance.body.chain.map((link: { imageHash: string }) => link.imageHash)).toEqual([
        hashOf('b'),
        hashOf('a'),
      ]);

      const missing = await request(app).get(`/api/v1/verify/${hashOf('c')}/proof`);
      expect(missing.status).toBe(404);
    });
  });

  describe('blocks', () => {
    it('should serve genesis and the latest block', async () => {
      const genesis = await request(app).get('/api/v1/blocks/0');
      expect(genesis.status).toBe(200);
      expect(genesis.body).toMatchObject({ height: 0, transactions: [] });

      await node.ledger.submit({ imageHash: hashOf('a'), timestamp: nowSeconds(), submitterId: 'c' });

      const latest = await request(app).get('/api/v1/blocks/latest');
      expect(latest.status).toBe(200);
      expect(latest.body.height).toBe(1);
      expect(latest.body.previousHash).toBe(genesis.body.blockHash);
      expect(latest.body.transactions).toHaveLength(1);

      const byHash = await request(app).get(`/api/v1/blocks/hash/${latest.body.blockHash}`);
      expect(byHash.body.height).toBe(1);
    });

    it('should answer 404 and 400 for missing or malformed heights', async () => {
      expect((await request(app).get('/api/v1/blocks/42')).status).toBe(404);

      const bad = await request(app).get('/api/v1/blocks/-1');
      expect(bad.status).toBe(400);
      expect(bad.body.error.message).toBe('height must be a non-negative integer');

      for (const huge of ['2147483648', '9007199254740993']) {
        const tooHigh = await request(app).get(`/api/v1/blocks/${huge}`);
        expect(tooHigh.status).toBe(400);
        expect(tooHigh.body.error.message).toBe('height must not exceed 2147483647');
      }
      expect((await request(app).get('/api/v1/blocks/2147483647')).status).toBe(404);

      expect((await request(app).get('/api/v1/blocks/hash/xyz')).status).toBe(400);
    });
  });

  describe('GET /api/v1/status', () => {
    it('should report node state', async () => {
      const res = await request(app).get('/api/v1/status');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        nodeId: 'validator_test',
        blockHeight: 0,
        totalHashes: 0,
        status: 'operational',
        consensusMode: 'single',
        pendingSubmissions: 0,
      });
      expect(typeof res.body.uptimeSeconds).toBe('number');
    });
  });

  describe('token-authenticated intake', () => {
    it('should stage, validate and batch a submission', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response(JSON.stringify({ valid: true }), { status: 200 }))
      );

      const created = await request(app).post('/api/v1/submissions').send(intakeBody(hashOf('a')));
      expect(created.status).toBe(202);
      expect(created.body.status).toBe('pending_validation');
      const { receiptId } = created.body;

      const pending = await request(app).get(`/api/v1/submissions/${receiptId}`);
      expect(pending.body).toEqual({
        receiptId,
        kind: 'camera_token',
        imageHash: hashOf('a'),
        validationStatus: 'pending',
        retryCount: 0,
        batched: false,
      });

      await node.validationWorker.runCycle();

      const run = await request(app).post('/api/v1/admin/batching/run').auth('admin', ADMIN_PASSWORD);
      expect(run.status).toBe(200);
      expect(run.body).toEqual({ status: 'committed', count: 1, blockHeight: 1, txId: 1 });

      const done = await request(app).get(`/api/v1/submissions/${receiptId}`);
      expect(done.body).toEqual({
        receiptId,
        kind: 'camera_token',
        imageHash: hashOf('a'),
        validationStatus: 'validated',
        validationMessage: 'Token validated',
        retryCount: 1,
        batched: true,
        txId: 1,
      });

      const verify = await request(app).get(`/api/v1/verify/${hashOf('a')}`);
      expect(verify.body.verified).toBe(true);
    });

    it('should refuse hashes already staged or on the ledger', async () => {
      await request(app).post('/api/v1/submissions').send(intakeBody(hashOf('a')));
      const staged = await request(app).post('/api/v1/submissions').send(intakeBody(hashOf('a')));
      expect(staged.status).toBe(409);
      expect(staged.body.error).toEqual({ message: 'Image hash already submitted', field: 'imageHash' });

      await node.ledger.submit({ imageHash: hashOf('b'), timestamp: nowSeconds(), submitterId: 'c' });
      const onChain = await request(app).post('/api/v1/submissions').send(intakeBody(hashOf('b')));
      expect(onChain.status).toBe(409);
      expect(onChain.body.error.message).toBe('Image hash already on blockchain');
    });

    it('should require the camera token', async () => {
      const res = await request(app)
        .post('/api/v1/submissions')
        .send(intakeBody(hashOf('a'), { cameraToken: undefined }));

      expect(res.status).toBe(400);
      expect(res.body.error).toEqual({
        message: 'cameraToken must be an object',
        field: 'cameraToken',
      });
    });

    it('should answer 404 for an unknown receipt', async () => {
      expect((await request(app).get('/api/v1/submissions/unknown')).status).toBe(404);
    });
  });

  describe('certificate-authenticated intake', () => {
    const certificateBody = (imageHash: string, overrides: Record<string, unknown> = {}) => ({
      imageHash,
      timestamp: nowSeconds() - 30,
      submitterId: 'camera_1',
      gpsHash: hashOf('e'),
      certificateBundle: { cameraCert: 'Y2VydA==', bundleSignature: 'c2ln' },
      authorityId: 'authority_1',
      ...overrides,
    });

    it('should validate the bundle at the certificate endpoint and batch it', async () => {
      const fetchMock = vi.fn(
        async (_url: string, _init: RequestInit) =>
          new Response(JSON.stringify({ valid: true }), { status: 200 })
      );
      vi.stubGlobal('fetch', fetchMock);
      const body = certificateBody(hashOf('a'));

      const created = await request(app).post('/api/v1/submissions/certificate').send(body);
      expect(created.status).toBe(202);
      const { receiptId } = created.body;

      await node.validationWorker.runCycle();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('http://authority.test/validate-cert');
      expect(JSON.parse(String(init.body))).toEqual({
        camera_cert: 'Y2VydA==',
        image_hash: hashOf('a'),
        timestamp: body.timestamp,
        gps_hash: hashOf('e'),
        bundle_signature: 'c2ln',
      });

      const run = await request(app).post('/api/v1/admin/batching/run').auth('admin', ADMIN_PASSWORD);
      expect(run.body).toEqual({ status: 'committed', count: 1, blockHeight: 1, txId: 1 });

      const done = await request(app).get(`/api/v1/submissions/${receiptId}`);
      expect(done.body).toEqual({
        receiptId,
        kind: 'certificate',
        imageHash: hashOf('a'),
        validationStatus: 'validated',
        validationMessage: 'Certificate validated',
        retryCount: 1,
        batched: true,
        txId: 1,
      });
    });

    it('should require the certificate bundle fields', async () => {
      const missing = await request(app)
        .post('/api/v1/submissions/certificate')
        .send(certificateBody(hashOf('a'), { certificateBundle: undefined }));
      expect(missing.status).toBe(400);
      expect(missing.body.error).toEqual({
        message: 'certificateBundle must be an object',
        field: 'certificateBundle',
      });

      const unsigned = await request(app)
        .post('/api/v1/submissions/certificate')
        .send(certificateBody(hashOf('a'), { certificateBundle: { cameraCert: 'Y2VydA==' } }));
      expect(unsigned.body.error).toEqual({
        message: 'bundleSignature is required',
        field: 'bundleSignature',
      });
    });

    it('should share duplicate checks with token intake', async () => {
      await request(app).post('/api/v1/submissions').send(intakeBody(hashOf('a')));
      const res = await request(app)
        .post('/api/v1/submissions/certificate')
        .send(certificateBody(hashOf('a')));
      expect(res.status).toBe(409);
      expect(res.body.error.message).toBe('Image hash already submitted');
    });
  });

  describe('admin', () => {
    it('should require credentials', async () => {
      const res = await request(app).get('/api/v1/admin/cache/stats');
      expect(res.status).toBe(401);

      const wrong = await request(app).get('/api/v1/admin/cache/stats').auth('admin', 'wrong');
      expect(wrong.status).toBe(401);
    });

    it('should report and clean the validation cache', async () => {
      const stats = await request(app).get('/api/v1/admin/cache/stats').auth('admin', ADMIN_PASSWORD);
      expect(stats.status).toBe(200);
      expect(stats.body).toEqual({
        size: 0,
        maxSize: 10000,
        hits: 0,
        misses: 0,
        hitRate: '0.0%',
        ttlSeconds: 3600,
      });

      const cleanup = await request(app)
        .post('/api/v1/admin/cache/cleanup')
        .auth('admin', ADMIN_PASSWORD);
      expect(cleanup.body).toEqual({ removed: 0, size: 0 });
    });

    it('should report an idle batching cycle', async () => {
      const res = await request(app).post('/api/v1/admin/batching/run').auth('admin', ADMIN_PASSWORD);
      expect(res.body).toEqual({ status: 'idle', count: 0 });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(app).get('/api/v1/nothing');
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe('Cannot GET /api/v1/nothing');
  });
});

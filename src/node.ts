import type { Config } from './config/index.js';
import type { DatabaseAdapter } from './db/adapters/DatabaseAdapter.js';
import { BlockStorageRepository } from './db/repositories/blockStorage.repository.js';
import { PendingSubmissionsRepository } from './db/repositories/pendingSubmissions.repository.js';
import { AuthorityClient } from './services/authority/authorityClient.service.js';
import { ValidationCache } from './services/authority/validationCache.service.js';
import type { ConsensusEngine } from './services/consensus/consensusEngine.js';
import { createConsensusEngine } from './services/consensus/consensusFactory.js';
import type { VoteTransport } from './services/consensus/proofOfAuthority.service.js';
import type { ValidatorKeys } from './services/crypto/validatorKeys.js';
import { LedgerService } from './services/ledger/ledger.service.js';
import { MerkleService } from './services/merkle/merkle.service.js';
import { TransactionValidator } from './services/validation/transactionValidator.service.js';
import { BatchingWorker } from './workers/batchingWorker.js';
import { ValidationWorker } from './workers/validationWorker.js';
import { SubmissionsHandler } from './handlers/submissions.handler.js';
import { VerificationHandler } from './handlers/verification.handler.js';
import { BlocksHandler } from './handlers/blocks.handler.js';
import { StatusHandler } from './handlers/status.handler.js';
import { AdminHandler } from './handlers/admin.handler.js';
import type { ServerDependencies } from './api/server.js';

export interface LedgerNode {
  storage: BlockStorageRepository;
  submissions: PendingSubmissionsRepository;
  validator: TransactionValidator;
  consensus: ConsensusEngine;
  cache: ValidationCache;
  authority: AuthorityClient;
  ledger: LedgerService;
  batchingWorker: BatchingWorker;
  validationWorker: ValidationWorker;
  handlers: ServerDependencies;
}

/**
 * Wire every component once; the API and worker entry points pick what they need
 */
export function createLedgerNode(
  config: Config,
  db: DatabaseAdapter,
  keys: ValidatorKeys,
  transport?: VoteTransport
): LedgerNode {
  const merkle = new MerkleService();
  const storage = new BlockStorageRepository(db, merkle, config.nodeId);
  const submissions = new PendingSubmissionsRepository(db);

  const validator = new TransactionValidator(storage, {
    authorizedSubmitters: config.authorizedSubmitters,
    batchSizeMin: config.batchSizeMin,
    batchSizeMax: config.batchSizeMax,
  });

  const consensus = createConsensusEngine(
    {
      mode: config.consensusMode,
      validatorId: config.nodeId,
      validatorNodes: config.validatorNodes,
      roundTimeoutMs: config.poaRoundTimeoutMs,
    },
    { chain: storage, keys, transport }
  );

  const cache = new ValidationCache({
    maxSize: config.validationCacheMaxSize,
    ttlSeconds: config.validationCacheTtlSeconds,
  });
  const authority = new AuthorityClient(
    {
      endpoint: config.authorityValidationUrl,
      certificateEndpoint: config.authorityCertificateUrl,
      timeoutMs: config.authorityRequestTimeoutMs,
    },
    cache
  );

  const ledger = new LedgerService(storage, submissions, validator, consensus, merkle, keys, {
    nodeId: config.nodeId,
    consensusMode: config.consensusMode,
    validatorNodes: config.validatorNodes,
  });

  const batchingWorker = new BatchingWorker(submissions, storage, validator, consensus, keys, {
    nodeId: config.nodeId,
    batchSizeMin: config.batchSizeMin,
    batchSizeMax: config.batchSizeMax,
    intervalSeconds: config.batchIntervalSeconds,
  });
  const validationWorker = new ValidationWorker(submissions, authority, {
    intervalSeconds: config.validationIntervalSeconds,
    maxAttempts: config.validationMaxAttempts,
  });

  return {
    storage,
    submissions,
    validator,
    consensus,
    cache,
    authority,
    ledger,
    batchingWorker,
    validationWorker,
    handlers: {
      submissionsHandler: new SubmissionsHandler(submissions, storage, ledger),
      verificationHandler: new VerificationHandler(ledger),
      blocksHandler: new BlocksHandler(ledger),
      statusHandler: new StatusHandler(ledger),
      adminHandler: new AdminHandler(cache, batchingWorker),
    },
  };
}

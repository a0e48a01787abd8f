#!/usr/bin/env tsx
import { config } from '../src/config/index.js';
import { DatabaseConnection } from '../src/db/database.js';
import { BlockStorageRepository } from '../src/db/repositories/blockStorage.repository.js';
import { ValidatorKeys } from '../src/services/crypto/validatorKeys.js';
import { MerkleService } from '../src/services/merkle/merkle.service.js';
import { logger } from '../src/utils/logger.js';

/**
 * Create the genesis block (height 0) if the chain is empty.
 * Uses GENESIS_TIMESTAMP when set so every node of a network can agree on it.
 */
async function main() {
  const db = new DatabaseConnection({ connectionString: config.databaseUrl });
  await db.initialize();

  try {
    await db.migrate();

    const keys = ValidatorKeys.loadOrCreate(config.validatorKeyPath);
    const storage = new BlockStorageRepository(db.getAdapter(), new MerkleService(), config.nodeId);
    const genesis = await storage.initializeGenesis(keys, config.nodeId, config.genesisTimestamp);

    console.log('\n=== Genesis Block ===\n');
    console.log(`Height:        ${genesis.height}`);
    console.log(`Hash:          ${genesis.blockHash}`);
    console.log(`Previous hash: ${genesis.previousHash}`);
    console.log(`Timestamp:     ${genesis.timestamp}`);
    console.log(`Validator:     ${genesis.validatorId}\n`);
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Genesis initialization failed');
  process.exit(1);
});

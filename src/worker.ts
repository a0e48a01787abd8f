import { config } from './config/index.js';
import { DatabaseConnection } from './db/database.js';
import { ValidatorKeys } from './services/crypto/validatorKeys.js';
import { createLedgerNode } from './node.js';
import { logger } from './utils/logger.js';

/**
 * Standalone validation + batching workers, for running them apart from the API
 * (set EMBEDDED_WORKERS=false on the API process)
 */
async function startWorker() {
  logger.info('Starting ledger workers...');

  let dbConnection: DatabaseConnection | null = null;

  try {
    // Initialize database
    logger.info('Initializing database connection...');
    dbConnection = new DatabaseConnection({
      connectionString: config.databaseUrl,
    });
    await dbConnection.initialize();

    // Fails fast on a missing or malformed key: workers never mint identities
    const keys = ValidatorKeys.load(config.validatorKeyPath);
    const node = createLedgerNode(config, dbConnection.getAdapter(), keys);

    node.validationWorker.start();
    node.batchingWorker.start();
    logger.info('Workers started successfully');

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      await node.validationWorker.stop();
      await node.batchingWorker.stop();

      if (dbConnection) {
        await dbConnection.close();
        logger.info('Database connection closed');
      }

      logger.info('Worker shutdown complete');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start worker');

    // Clean up on error
    if (dbConnection) {
      await dbConnection.close();
    }

    process.exit(1);
  }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.fatal({ reason, promise }, 'Unhandled Rejection');
  process.exit(1);
});

// Start the worker
startWorker().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start worker');
  process.exit(1);
});

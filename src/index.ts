import { config } from './config/index.js';
import { createServer } from './api/server.js';
import { DatabaseConnection } from './db/database.js';
import { ValidatorKeys } from './services/crypto/validatorKeys.js';
import { createLedgerNode } from './node.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info({ nodeId: config.nodeId }, 'Starting Provenance Ledger Node...');

  let dbConnection: DatabaseConnection | null = null;

  try {
    // Initialize database
    logger.info('Initializing database...');
    dbConnection = new DatabaseConnection({
      connectionString: config.databaseUrl,
    });
    await dbConnection.initialize();
    await dbConnection.migrate();

    const keys = ValidatorKeys.loadOrCreate(config.validatorKeyPath);
    const node = createLedgerNode(config, dbConnection.getAdapter(), keys);

    const genesis = await node.storage.initializeGenesis(
      keys,
      config.nodeId,
      config.genesisTimestamp
    );
    logger.info({ genesisHash: genesis.blockHash }, 'Chain ready');

    if (config.embeddedWorkers) {
      node.validationWorker.start();
      node.batchingWorker.start();
    }

    const app = createServer(config, node.handlers);
    const port = config.port;

    const server = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/health`);
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      // Stop accepting new connections
      server.close(() => {
        logger.info('HTTP server closed');
      });

      // Let in-flight cycles finish before the database goes away
      await node.validationWorker.stop();
      await node.batchingWorker.stop();

      if (dbConnection) {
        await dbConnection.close();
        logger.info('Database connection closed');
      }

      logger.info('Graceful shutdown complete');
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
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

// Start the application
main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});

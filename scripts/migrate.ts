#!/usr/bin/env tsx
import { config } from '../src/config/index.js';
import { DatabaseConnection } from '../src/db/database.js';
import { migrationSource } from '../src/db/migrationSource.js';
import { logger } from '../src/utils/logger.js';

/**
 * Apply (or with `rollback`, undo the last batch of) database migrations
 *
 *   npm run migrate
 *   npm run migrate -- rollback
 */
async function main() {
  const db = new DatabaseConnection({ connectionString: config.databaseUrl });
  await db.initialize();

  try {
    if (process.argv[2] === 'rollback') {
      const [batch, reverted] = await db
        .getAdapter()
        .getKnex()
        .migrate.rollback({ migrationSource });
      logger.info({ batch, migrations: reverted }, 'Rolled back migrations');
    } else {
      const applied = await db.migrate();
      logger.info({ count: applied.length }, 'Database schema is up to date');
    }
  } finally {
    await db.close();
  }
}

main().catch((error) => {
  logger.fatal({ err: error }, 'Migration failed');
  process.exit(1);
});

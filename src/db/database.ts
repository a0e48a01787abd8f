import type { DatabaseAdapter } from './adapters/DatabaseAdapter.js';
import { PostgresAdapter } from './adapters/PostgresAdapter.js';
import { IN_MEMORY, SqliteAdapter } from './adapters/SqliteAdapter.js';
import { migrationSource } from './migrationSource.js';
import { logger } from '../utils/logger.js';
import { trackAsync } from '../utils/performance.js';

export interface DatabaseConfig {
  /** `postgres://…`, `sqlite:<file>` or `sqlite::memory:` */
  connectionString: string;
}

const SQLITE_PREFIX = 'sqlite:';

function createAdapter(connectionString: string): DatabaseAdapter {
  if (connectionString === IN_MEMORY) {
    return new SqliteAdapter(IN_MEMORY);
  }
  if (connectionString.startsWith(SQLITE_PREFIX)) {
    const filename = connectionString.slice(SQLITE_PREFIX.length).replace(/^\/\//, '');
    return new SqliteAdapter(filename || IN_MEMORY);
  }
  return new PostgresAdapter(connectionString);
}

export class DatabaseConnection {
  private adapter: DatabaseAdapter;

  constructor(config: DatabaseConfig) {
    this.adapter = createAdapter(config.connectionString);
  }

  /**
   * Initialize the database connection
   */
  async initialize(): Promise<void> {
    await this.adapter.initialize();
    logger.debug('Database initialized successfully');
  }

  /**
   * Apply pending migrations
   */
  async migrate(): Promise<string[]> {
    const [batch, applied] = await trackAsync('db.migrate', () =>
      this.adapter.getKnex().migrate.latest({ migrationSource })
    );
    if (applied.length > 0) {
      logger.info({ batch, migrations: applied }, 'Applied database migrations');
    }
    return applied;
  }

  getAdapter(): DatabaseAdapter {
    return this.adapter;
  }

  async close(): Promise<void> {
    logger.debug('Closing database connection...');
    await this.adapter.close();
  }
}

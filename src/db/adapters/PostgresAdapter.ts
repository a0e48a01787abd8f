import knex, { type Knex } from 'knex';
import pg from 'pg';
import type { DatabaseAdapter } from './DatabaseAdapter.js';
import { logger } from '../../utils/logger.js';

// Heights, counts and Unix timestamps are stored as int8 and read back as numbers
const INT8_OID = 20;
pg.types.setTypeParser(INT8_OID, (value: string) => parseInt(value, 10));

export class PostgresAdapter implements DatabaseAdapter {
  private knex: Knex;

  constructor(connectionString: string) {
    this.knex = knex({
      client: 'pg',
      connection: {
        connectionString,
        ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: 2,
        max: 10,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    try {
      await this.knex.raw('SELECT 1');
      logger.debug('PostgreSQL connection established');
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to PostgreSQL');
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return await this.knex.transaction(callback);
  }
}

import knex, { type Knex } from 'knex';
import fs from 'fs';
import path from 'path';
import type { DatabaseAdapter } from './DatabaseAdapter.js';
import { logger } from '../../utils/logger.js';

export const IN_MEMORY = ':memory:';

export class SqliteAdapter implements DatabaseAdapter {
  private knex: Knex;

  constructor(private readonly dbPath: string = './data/ledger.db') {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.knex = knex({
      client: 'better-sqlite3',
      connection: {
        filename: dbPath,
      },
      useNullAsDefault: true,
      // One connection: an in-memory database lives and dies with it
      pool: {
        min: 1,
        max: 1,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  async initialize(): Promise<void> {
    await this.knex.raw('SELECT 1');
    logger.debug({ dbPath: this.dbPath }, 'SQLite database opened');
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return await this.knex.transaction(callback);
  }
}

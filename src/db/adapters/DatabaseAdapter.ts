import type { Knex } from 'knex';

export interface DatabaseAdapter {
  /**
   * Get the underlying Knex instance for this adapter
   */
  getKnex(): Knex;

  /**
   * Open and check the connection
   */
  initialize(): Promise<void>;

  /**
   * Close the connection pool
   */
  close(): Promise<void>;

  /**
   * Run `callback` inside one database transaction
   */
  transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T>;
}

import type { Knex } from 'knex';
import * as createLedgerTables from '../../migrations/20260310090000_create_ledger_tables.js';
import * as createPendingSubmissions from '../../migrations/20260310090100_create_pending_submissions.js';
import * as addMerkleProofs from '../../migrations/20260310090200_add_merkle_proofs.js';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

// Listed in apply order; names are what knex records in its migrations table
const migrations: NamedMigration[] = [
  { name: '20260310090000_create_ledger_tables', migration: createLedgerTables },
  { name: '20260310090100_create_pending_submissions', migration: createPendingSubmissions },
  { name: '20260310090200_add_merkle_proofs', migration: addMerkleProofs },
];

/**
 * Migrations bundled with the code, so compiled builds and tests run the same schema
 */
export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => migrations,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration,
};

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.alterTable('transactions', (table) => {
    table.string('merkle_root', 64).nullable();
    table.integer('tree_depth').nullable();
  });

  await knex.schema.createTable('merkle_proofs', (table) => {
    table.increments('id').primary();
    table.integer('tx_id').notNullable();
    table.string('image_hash', 64).notNullable();
    table.integer('leaf_index').notNullable();
    table.text('proof_path').notNullable(); // JSON array of {sibling_hash, position}

    table.foreign('tx_id').references('tx_id').inTable('transactions');
    table.unique(['tx_id', 'image_hash']);
    table.index('image_hash');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('merkle_proofs');
  await knex.schema.alterTable('transactions', (table) => {
    table.dropColumn('tree_depth');
    table.dropColumn('merkle_root');
  });
}

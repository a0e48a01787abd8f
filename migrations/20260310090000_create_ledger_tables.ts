import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('blocks', (table) => {
    table.integer('height').primary();
    table.string('block_hash', 64).notNullable().unique();
    table.string('previous_hash', 64).notNullable();
    table.bigInteger('timestamp').notNullable(); // Unix seconds
    table.string('validator_id', 255).notNullable();
    table.integer('transaction_count').notNullable().defaultTo(0);
    table.text('signature').notNullable();

    table.index('timestamp');
  });

  await knex.schema.createTable('transactions', (table) => {
    table.increments('tx_id').primary();
    table.string('tx_hash', 64).notNullable().unique();
    table.integer('block_height').notNullable();
    table.string('submitter_id', 255).notNullable();
    table.integer('batch_size').notNullable();
    table.text('signature').notNullable();

    table.foreign('block_height').references('height').inTable('blocks');
    table.index('block_height');
  });

  await knex.schema.createTable('image_hashes', (table) => {
    table.string('image_hash', 64).primary();
    table.integer('tx_id').notNullable();
    table.integer('block_height').notNullable();
    table.bigInteger('timestamp').notNullable(); // Rounded down to the minute
    table.integer('modification_level').notNullable().defaultTo(0);
    table.string('parent_image_hash', 64).nullable();
    table.string('submitter_id', 255).notNullable();
    table.string('gps_hash', 64).nullable();
    table.string('owner_hash', 64).nullable();

    table.foreign('tx_id').references('tx_id').inTable('transactions');
    table.foreign('block_height').references('height').inTable('blocks');
    table.index('block_height');
    table.index('parent_image_hash');
  });

  await knex.schema.createTable('node_state', (table) => {
    table.string('node_id', 255).primary();
    table.integer('current_block_height').notNullable().defaultTo(0);
    table.bigInteger('total_hashes').notNullable().defaultTo(0);
    table.string('genesis_hash', 64).nullable();
    table.bigInteger('last_block_time').nullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('node_state');
  await knex.schema.dropTableIfExists('image_hashes');
  await knex.schema.dropTableIfExists('transactions');
  await knex.schema.dropTableIfExists('blocks');
}

import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('pending_submissions', (table) => {
    table.increments('id').primary();
    table.string('receipt_id', 36).notNullable().unique();
    table.enum('kind', ['camera_token', 'certificate']).notNullable().defaultTo('camera_token');
    table.string('image_hash', 64).notNullable();
    table.bigInteger('timestamp').notNullable();
    table.integer('modification_level').notNullable().defaultTo(0);
    table.string('parent_image_hash', 64).nullable();
    table.string('gps_hash', 64).nullable();
    table.string('owner_hash', 64).nullable();
    table.string('submitter_id', 255).notNullable();

    // Encrypted camera token (kind camera_token)
    table.text('ciphertext').nullable();
    table.string('auth_tag', 255).nullable();
    table.string('nonce', 255).nullable();
    table.integer('table_id').nullable();
    table.integer('key_index').nullable();

    // Device certificate bundle (kind certificate)
    table.text('camera_cert').nullable();
    table.text('bundle_signature').nullable();

    table.string('authority_id', 255).notNullable();

    table
      .enum('validation_status', ['pending', 'validated', 'rejected'])
      .notNullable()
      .defaultTo('pending');
    table.text('validation_message').nullable();
    table.integer('retry_count').notNullable().defaultTo(0);
    table.bigInteger('next_retry_at').nullable(); // Unix seconds
    table.boolean('batched').notNullable().defaultTo(false);
    table.integer('tx_id').nullable();
    table.bigInteger('created_at').notNullable();
    table.bigInteger('updated_at').notNullable();

    table.index(['validation_status', 'batched']);
    table.index('image_hash');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('pending_submissions');
}

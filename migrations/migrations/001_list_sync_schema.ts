import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('ordered_lists', (table) => {
    table.increments('id').primary()
    table.integer('owner_id').notNullable()
    table.string('list_type').notNullable()
    table.string('title').notNullable()
    // Serialized aggregate, validated on read
    table.text('document').notNullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.index('owner_id')
  })

  await knex.schema.createTable('id_mappings', (table) => {
    table.increments('id').primary()
    table.integer('internal_id').notNullable()
    table.string('service_kind').notNullable()
    table.string('external_id').notNullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.unique(['internal_id', 'service_kind'])
    table.unique(['service_kind', 'external_id'])
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('id_mappings')
  await knex.schema.dropTableIfExists('ordered_lists')
}

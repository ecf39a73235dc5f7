import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('subscriptions', (table) => {
    table.increments('id').primary()
    table.string('feed_url').notNullable().unique()
    table.string('remote_id').nullable()
    table.boolean('subscribed').notNullable().defaultTo(true)
    table.boolean('needs_sync').notNullable().defaultTo(false)
    table.string('title').nullable()
    table.string('author').nullable()
    table.text('description').nullable()
    table.string('artwork_url').nullable()
    table.string('last_refreshed_at').nullable()
    table.string('created_at').notNullable()
    table.string('updated_at').notNullable()
    table.index(['subscribed', 'needs_sync'])
    table.index('remote_id')
  })

  await knex.schema.createTable('episodes', (table) => {
    table.increments('id').primary()
    table
      .integer('subscription_id')
      .notNullable()
      .references('id')
      .inTable('subscriptions')
      .onDelete('CASCADE')
    table.string('guid').notNullable()
    table.string('remote_id').nullable()
    table.string('audio_url').nullable()
    table.string('title').nullable()
    table.text('description').nullable()
    table.string('published_at').nullable()
    table.float('duration').nullable()
    table.string('artwork_url').nullable()
    table.float('position').notNullable().defaultTo(0)
    table.boolean('played').notNullable().defaultTo(false)
    table.string('last_played_at').nullable()
    table.string('last_synced_at').nullable()
    table.boolean('needs_sync').notNullable().defaultTo(false)
    table.unique(['subscription_id', 'guid'])
    table.index('remote_id')
    table.index('audio_url')
  })

  await knex.schema.createTable('pending_actions', (table) => {
    table.increments('id').primary()
    table
      .integer('episode_id')
      .notNullable()
      .references('id')
      .inTable('episodes')
      .onDelete('CASCADE')
    table.string('remote_episode_id').nullable()
    table.float('position').notNullable()
    table.float('duration').nullable()
    table.boolean('completed').notNullable().defaultTo(false)
    table.string('created_at').notNullable()
    table.boolean('synced').notNullable().defaultTo(false)
    table.string('synced_at').nullable()
    table.index(['synced', 'created_at'])
    table.index('episode_id')
  })

  await knex.schema.createTable('sync_state', (table) => {
    table.integer('id').primary()
    table.string('status').notNullable().defaultTo('idle')
    table.text('last_error').nullable()
    table.string('last_subscription_sync_at').nullable()
    table.string('last_progress_sync_at').nullable()
    table.string('last_full_sync_at').nullable()
    table.string('last_sync_attempt_at').nullable()
    table.text('subscription_cursor').nullable()
    table.text('progress_cursor').nullable()
    table.integer('total_syncs').notNullable().defaultTo(0)
    table.integer('failed_syncs').notNullable().defaultTo(0)
  })

  await knex.schema.createTable('server_configuration', (table) => {
    table.integer('id').primary()
    table.string('server_url').nullable()
    table.string('protocol').nullable()
    table.string('username').nullable()
    table.text('session_token').nullable()
    table.boolean('is_authenticated').notNullable().defaultTo(false)
    table.string('updated_at').nullable()
  })

  await knex.schema.createTable('queue_items', (table) => {
    table.increments('id').primary()
    table
      .integer('episode_id')
      .notNullable()
      .unique()
      .references('id')
      .inTable('episodes')
      .onDelete('CASCADE')
    table.string('remote_id').nullable()
    table.integer('position').notNullable()
    table.string('pending_op').nullable()
    table.index('pending_op')
  })

  await knex.schema.createTable('playlists', (table) => {
    table.increments('id').primary()
    table.string('remote_id').nullable().unique()
    table.string('name').notNullable()
    table.text('description').nullable()
    table.boolean('needs_sync').notNullable().defaultTo(false)
    table.boolean('deleted').notNullable().defaultTo(false)
    table.string('created_at').notNullable()
    table.string('updated_at').notNullable()
  })

  await knex.schema.createTable('playlist_items', (table) => {
    table.increments('id').primary()
    table
      .integer('playlist_id')
      .notNullable()
      .references('id')
      .inTable('playlists')
      .onDelete('CASCADE')
    table.string('remote_id').notNullable()
    table
      .integer('episode_id')
      .nullable()
      .references('id')
      .inTable('episodes')
      .onDelete('SET NULL')
    table.integer('position').notNullable()
    table.unique(['playlist_id', 'remote_id'])
  })
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('playlist_items')
  await knex.schema.dropTableIfExists('playlists')
  await knex.schema.dropTableIfExists('queue_items')
  await knex.schema.dropTableIfExists('server_configuration')
  await knex.schema.dropTableIfExists('sync_state')
  await knex.schema.dropTableIfExists('pending_actions')
  await knex.schema.dropTableIfExists('episodes')
  await knex.schema.dropTableIfExists('subscriptions')
}

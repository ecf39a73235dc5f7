import type { ServerConfiguration } from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  mapServerConfigurationRow,
  type ServerConfigurationRow,
} from '@services/database/rows.js'
import type { Knex } from 'knex'

const SINGLETON_ID = 1

/**
 * Reads the server configuration, creating the singleton row on first access
 * in the caller's transaction.
 */
export async function getServerConfiguration(
  this: DatabaseService,
  trx?: Knex.Transaction,
): Promise<ServerConfiguration> {
  const db = trx ?? this.knex
  await db<ServerConfigurationRow>('server_configuration')
    .insert({ id: SINGLETON_ID, is_authenticated: false })
    .onConflict('id')
    .ignore()

  const row = await db<ServerConfigurationRow>('server_configuration')
    .where({ id: SINGLETON_ID })
    .first()
  if (!row) {
    throw new Error('Server configuration row is missing')
  }
  return mapServerConfigurationRow(row)
}

/**
 * Applies a partial update to the server configuration singleton
 */
export async function saveServerConfiguration(
  this: DatabaseService,
  updates: Partial<ServerConfiguration>,
  trx?: Knex.Transaction,
): Promise<ServerConfiguration> {
  await this.getServerConfiguration(trx)

  const row: Partial<ServerConfigurationRow> = { updated_at: this.timestamp }
  if (updates.serverUrl !== undefined) row.server_url = updates.serverUrl
  if (updates.protocol !== undefined) row.protocol = updates.protocol
  if (updates.username !== undefined) row.username = updates.username
  if (updates.sessionToken !== undefined) {
    row.session_token = updates.sessionToken
  }
  if (updates.isAuthenticated !== undefined) {
    row.is_authenticated = updates.isAuthenticated
  }

  await (trx ?? this.knex)<ServerConfigurationRow>('server_configuration')
    .where({ id: SINGLETON_ID })
    .update(row)
  return this.getServerConfiguration(trx)
}

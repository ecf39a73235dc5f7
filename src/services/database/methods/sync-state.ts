import type { SyncState } from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { mapSyncStateRow, type SyncStateRow } from '@services/database/rows.js'
import { serializeDate } from '@utils/date-serializer.js'
import type { Knex } from 'knex'

const SINGLETON_ID = 1

/**
 * Reads the sync state, creating the singleton row on first access in the
 * caller's transaction.
 */
export async function getSyncState(
  this: DatabaseService,
  trx?: Knex.Transaction,
): Promise<SyncState> {
  const db = trx ?? this.knex
  await db<SyncStateRow>('sync_state')
    .insert({ id: SINGLETON_ID, status: 'idle', total_syncs: 0, failed_syncs: 0 })
    .onConflict('id')
    .ignore()

  const row = await db<SyncStateRow>('sync_state')
    .where({ id: SINGLETON_ID })
    .first()
  if (!row) {
    throw new Error('Sync state row is missing')
  }
  return mapSyncStateRow(row)
}

/**
 * Applies a partial update to the sync state singleton
 *
 * @returns The state after the update
 */
export async function updateSyncState(
  this: DatabaseService,
  updates: Partial<SyncState>,
  trx?: Knex.Transaction,
): Promise<SyncState> {
  const db = trx ?? this.knex
  // Ensures the row exists
  await this.getSyncState(trx)

  const row: Partial<SyncStateRow> = {}
  if (updates.status !== undefined) row.status = updates.status
  if (updates.lastError !== undefined) row.last_error = updates.lastError
  if (updates.lastSubscriptionSyncAt !== undefined) {
    row.last_subscription_sync_at = serializeDate(updates.lastSubscriptionSyncAt)
  }
  if (updates.lastProgressSyncAt !== undefined) {
    row.last_progress_sync_at = serializeDate(updates.lastProgressSyncAt)
  }
  if (updates.lastFullSyncAt !== undefined) {
    row.last_full_sync_at = serializeDate(updates.lastFullSyncAt)
  }
  if (updates.lastSyncAttemptAt !== undefined) {
    row.last_sync_attempt_at = serializeDate(updates.lastSyncAttemptAt)
  }
  if (updates.subscriptionCursor !== undefined) {
    row.subscription_cursor = updates.subscriptionCursor
  }
  if (updates.progressCursor !== undefined) {
    row.progress_cursor = updates.progressCursor
  }
  if (updates.totalSyncs !== undefined) row.total_syncs = updates.totalSyncs
  if (updates.failedSyncs !== undefined) row.failed_syncs = updates.failedSyncs

  if (Object.keys(row).length > 0) {
    await db<SyncStateRow>('sync_state').where({ id: SINGLETON_ID }).update(row)
  }
  return this.getSyncState(trx)
}

/**
 * Resets a `running` status left behind by a process that died mid-pass
 *
 * @returns Whether the status was reset
 */
export async function resetStaleRunningStatus(
  this: DatabaseService,
  trx?: Knex.Transaction,
): Promise<boolean> {
  await this.getSyncState(trx)
  const updated = await (trx ?? this.knex)<SyncStateRow>('sync_state')
    .where({ id: SINGLETON_ID, status: 'running' })
    .update({
      status: 'idle',
      last_error: 'Previous sync was interrupted',
    })
  return updated > 0
}

/**
 * Forgets server-side history: cursors and last-sync times. Counters and
 * status are kept.
 */
export async function resetSyncCursors(
  this: DatabaseService,
  trx?: Knex.Transaction,
): Promise<void> {
  await this.updateSyncState(
    {
      subscriptionCursor: null,
      progressCursor: null,
      lastSubscriptionSyncAt: null,
      lastProgressSyncAt: null,
      lastFullSyncAt: null,
    },
    trx,
  )
}

import type {
  PendingAction,
  PendingUpload,
} from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  mapPendingActionRow,
  type PendingActionRow,
} from '@services/database/rows.js'
import { serializeDate } from '@utils/date-serializer.js'
import type { Knex } from 'knex'

export interface NewPendingAction {
  episodeId: number
  remoteEpisodeId: string | null
  position: number
  duration: number | null
  completed: boolean
  createdAt: Date
}

interface PendingUploadRow extends PendingActionRow {
  episode_remote_id: string | null
  audio_url: string | null
  feed_url: string
}

/**
 * Appends an action to the pending queue
 */
export async function createPendingAction(
  this: DatabaseService,
  action: NewPendingAction,
  trx?: Knex.Transaction,
): Promise<PendingAction> {
  const db = trx ?? this.knex
  const [id] = await db<PendingActionRow>('pending_actions').insert({
    episode_id: action.episodeId,
    remote_episode_id: action.remoteEpisodeId,
    position: action.position,
    duration: action.duration,
    completed: action.completed,
    created_at: action.createdAt.toISOString(),
    synced: false,
    synced_at: null,
  })
  const row = await db<PendingActionRow>('pending_actions')
    .where({ id })
    .first()
  if (!row) {
    throw new Error(`Failed to queue action for episode ${action.episodeId}`)
  }
  return mapPendingActionRow(row)
}

/**
 * Unsynced actions in creation order, with what an upload needs to address
 * the episode on the server.
 */
export async function getUnsyncedPendingUploads(
  this: DatabaseService,
  trx?: Knex.Transaction,
): Promise<PendingUpload[]> {
  const rows: PendingUploadRow[] = await (trx ?? this.knex)('pending_actions')
    .join('episodes', 'episodes.id', 'pending_actions.episode_id')
    .join('subscriptions', 'subscriptions.id', 'episodes.subscription_id')
    .where('pending_actions.synced', false)
    .select(
      'pending_actions.*',
      'episodes.remote_id as episode_remote_id',
      'episodes.audio_url as audio_url',
      'subscriptions.feed_url as feed_url',
    )
    .orderBy([
      { column: 'pending_actions.created_at', order: 'asc' },
      { column: 'pending_actions.id', order: 'asc' },
    ])

  return rows.map((row) => ({
    ...mapPendingActionRow(row),
    episodeRemoteId: row.episode_remote_id,
    audioUrl: row.audio_url,
    feedUrl: row.feed_url,
  }))
}

export async function getPendingActionsForEpisode(
  this: DatabaseService,
  episodeId: number,
  trx?: Knex.Transaction,
): Promise<PendingAction[]> {
  const rows = await (trx ?? this.knex)<PendingActionRow>('pending_actions')
    .where({ episode_id: episodeId })
    .orderBy('id', 'asc')
  return rows.map(mapPendingActionRow)
}

/**
 * Marks actions as confirmed by the server
 *
 * @returns Number of actions marked
 */
export async function markPendingActionsSynced(
  this: DatabaseService,
  ids: number[],
  syncedAt: Date,
  trx?: Knex.Transaction,
): Promise<number> {
  if (ids.length === 0) return 0
  return (trx ?? this.knex)<PendingActionRow>('pending_actions')
    .whereIn('id', ids)
    .update({ synced: true, synced_at: serializeDate(syncedAt) })
}

export async function countUnsyncedActionsForEpisode(
  this: DatabaseService,
  episodeId: number,
  trx?: Knex.Transaction,
): Promise<number> {
  const result = await (trx ?? this.knex)<PendingActionRow>('pending_actions')
    .where({ episode_id: episodeId, synced: false })
    .count({ count: '*' })
    .first()
  return Number(result?.count ?? 0)
}

/**
 * Deletes confirmed actions synced before the cutoff. Unsynced actions are
 * never touched.
 *
 * @returns Number of actions deleted
 */
export async function pruneSyncedPendingActions(
  this: DatabaseService,
  syncedBefore: Date,
  trx?: Knex.Transaction,
): Promise<number> {
  return (trx ?? this.knex)<PendingActionRow>('pending_actions')
    .where({ synced: true })
    .where('synced_at', '<', syncedBefore.toISOString())
    .delete()
}

import type { QueueItem, QueuePendingOp } from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { mapQueueItemRow, type QueueItemRow } from '@services/database/rows.js'
import type { Knex } from 'knex'

export interface QueueMirrorEntry {
  episodeId: number
  remoteId: string
  position: number
}

/**
 * Queue items in play order
 *
 * @param includeRemoved - Also return items whose removal is not yet pushed
 */
export async function getQueueItems(
  this: DatabaseService,
  includeRemoved = false,
  trx?: Knex.Transaction,
): Promise<QueueItem[]> {
  const query = (trx ?? this.knex)<QueueItemRow>('queue_items')
  if (!includeRemoved) {
    query.where((builder) =>
      builder.whereNull('pending_op').orWhereNot('pending_op', 'remove'),
    )
  }
  const rows = await query.orderBy([
    { column: 'position', order: 'asc' },
    { column: 'id', order: 'asc' },
  ])
  return rows.map(mapQueueItemRow)
}

/**
 * Appends an episode to the end of the queue. Re-adding an item whose
 * removal is still pending cancels the removal.
 */
export async function addQueueItem(
  this: DatabaseService,
  episodeId: number,
  trx?: Knex.Transaction,
): Promise<QueueItem> {
  const db = trx ?? this.knex
  const max = await db<QueueItemRow>('queue_items')
    .max({ position: 'position' })
    .first()
  const position = Number(max?.position ?? -1) + 1

  const existing = await db<QueueItemRow>('queue_items')
    .where({ episode_id: episodeId })
    .first()

  if (existing) {
    if (existing.pending_op === 'remove') {
      await db<QueueItemRow>('queue_items')
        .where({ id: existing.id })
        .update({ position, pending_op: existing.remote_id ? 'move' : 'add' })
    }
  } else {
    await db<QueueItemRow>('queue_items').insert({
      episode_id: episodeId,
      remote_id: null,
      position,
      pending_op: 'add',
    })
  }

  const row = await db<QueueItemRow>('queue_items')
    .where({ episode_id: episodeId })
    .first()
  if (!row) {
    throw new Error(`Failed to queue episode ${episodeId}`)
  }
  return mapQueueItemRow(row)
}

/**
 * Removes an episode from the queue. Items the server never saw are deleted
 * outright; others are kept until the removal is pushed.
 *
 * @returns Whether the episode was queued
 */
export async function removeQueueItem(
  this: DatabaseService,
  episodeId: number,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const db = trx ?? this.knex
  const existing = await db<QueueItemRow>('queue_items')
    .where({ episode_id: episodeId })
    .first()
  if (!existing || existing.pending_op === 'remove') return false

  if (existing.remote_id === null) {
    await db<QueueItemRow>('queue_items').where({ id: existing.id }).delete()
  } else {
    await db<QueueItemRow>('queue_items')
      .where({ id: existing.id })
      .update({ pending_op: 'remove' })
  }
  return true
}

/**
 * Rewrites queue positions to follow `episodeIds`. Items not listed keep
 * their relative order after the listed ones.
 */
export async function reorderQueueItems(
  this: DatabaseService,
  episodeIds: number[],
  trx?: Knex.Transaction,
): Promise<void> {
  const db = trx ?? this.knex
  const items = await this.getQueueItems(false, trx)
  const rank = new Map(episodeIds.map((id, index) => [id, index]))
  const ordered = [...items].sort(
    (a, b) =>
      (rank.get(a.episodeId) ?? episodeIds.length + a.position) -
      (rank.get(b.episodeId) ?? episodeIds.length + b.position),
  )

  for (const [position, item] of ordered.entries()) {
    if (item.position === position) continue
    const pendingOp: QueuePendingOp | null =
      item.pendingOp === 'add' ? 'add' : 'move'
    await db<QueueItemRow>('queue_items')
      .where({ id: item.id })
      .update({ position, pending_op: pendingOp })
  }
}

export async function updateQueueItem(
  this: DatabaseService,
  id: number,
  updates: Partial<Pick<QueueItem, 'remoteId' | 'pendingOp' | 'position'>>,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const row: Partial<QueueItemRow> = {}
  if (updates.remoteId !== undefined) row.remote_id = updates.remoteId
  if (updates.pendingOp !== undefined) row.pending_op = updates.pendingOp
  if (updates.position !== undefined) row.position = updates.position
  if (Object.keys(row).length === 0) return false

  const updated = await (trx ?? this.knex)<QueueItemRow>('queue_items')
    .where({ id })
    .update(row)
  return updated > 0
}

export async function deleteQueueItem(
  this: DatabaseService,
  id: number,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const deleted = await (trx ?? this.knex)<QueueItemRow>('queue_items')
    .where({ id })
    .delete()
  return deleted > 0
}

/**
 * Replaces the synced part of the queue with the server's queue. Items with
 * a pending change are left for the next push.
 */
export async function mirrorQueue(
  this: DatabaseService,
  entries: QueueMirrorEntry[],
  trx?: Knex.Transaction,
): Promise<void> {
  const db = trx ?? this.knex
  const pending = await db<QueueItemRow>('queue_items')
    .whereNotNull('pending_op')
    .pluck('episode_id')
  const keep = new Set<number>(pending)

  await db<QueueItemRow>('queue_items').whereNull('pending_op').delete()

  for (const entry of entries) {
    if (keep.has(entry.episodeId)) continue
    await db<QueueItemRow>('queue_items').insert({
      episode_id: entry.episodeId,
      remote_id: entry.remoteId,
      position: entry.position,
      pending_op: null,
    })
  }
}

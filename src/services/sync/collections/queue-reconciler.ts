/**
 * Queue Reconciler
 *
 * Pushes local queue edits, then mirrors the server's queue. The server owns
 * membership and order once local edits are through; items whose push
 * failed keep their pending marker and survive the mirror.
 */
import { attempt, validationError } from '@root/types/errors.js'
import type { QueueItem } from '@root/types/library.types.js'
import type { CollectionsClient } from '@root/types/remote.types.js'
import type { QueueMirrorEntry } from '@services/database/methods/queue.js'
import {
  handleRecordError,
  settleBoundary,
  settleRecord,
} from '@services/sync/error-policy.js'
import type { PhaseContext } from '@services/sync/phase-context.js'

export interface QueueSummary {
  items: number
  failedPushes: number
}

/**
 * @returns null when the server's queue could not be read and the mirror
 * step was skipped
 * @throws SyncError when the pass must abort
 */
export async function reconcileQueue(
  ctx: PhaseContext,
  collections: CollectionsClient,
): Promise<QueueSummary | null> {
  const failedPushes = await pushQueueChanges(ctx, collections)

  const remoteQueue = settleBoundary(
    await attempt(() => collections.getQueue(), 'Fetching queue'),
    ctx.log,
    'queue',
  )
  if (!remoteQueue) return null

  const entries = await ctx.db.withTransaction(async (trx) => {
    const seen = new Set<number>()
    const mirrored: QueueMirrorEntry[] = []
    const ordered = [...remoteQueue].sort((a, b) => a.position - b.position)
    for (const item of ordered) {
      const episode = await ctx.db.findEpisodeByRemoteId(
        item.remoteEpisodeId,
        trx,
      )
      if (!episode || seen.has(episode.id)) continue
      seen.add(episode.id)
      mirrored.push({
        episodeId: episode.id,
        remoteId: item.remoteId,
        position: mirrored.length,
      })
    }
    await ctx.db.mirrorQueue(mirrored, trx)
    return mirrored
  })

  return { items: entries.length, failedPushes }
}

/**
 * @returns Number of queue edits that could not be pushed
 */
async function pushQueueChanges(
  ctx: PhaseContext,
  collections: CollectionsClient,
): Promise<number> {
  const items = await ctx.db.getQueueItems(true)
  let failed = 0
  let reorder = false

  for (const item of items) {
    switch (item.pendingOp) {
      case 'remove':
        if (!(await pushRemove(ctx, collections, item))) failed++
        break
      case 'add':
        if (await pushAdd(ctx, collections, item)) {
          reorder = true
        } else {
          failed++
        }
        break
      case 'move':
        reorder = true
        break
      default:
        break
    }
  }

  if (reorder && !(await pushOrder(ctx, collections))) failed++
  return failed
}

async function pushRemove(
  ctx: PhaseContext,
  collections: CollectionsClient,
  item: QueueItem,
): Promise<boolean> {
  const remoteId = item.remoteId
  if (remoteId) {
    const outcome = settleRecord(
      await attempt(() => collections.removeFromQueue(remoteId)),
      ctx.log,
      { episodeId: item.episodeId, remoteId },
      'Failed to push queue removal',
    )
    if (outcome === 'skipped') return false
  }
  await ctx.db.deleteQueueItem(item.id)
  return true
}

async function pushAdd(
  ctx: PhaseContext,
  collections: CollectionsClient,
  item: QueueItem,
): Promise<boolean> {
  const episode = await ctx.db.getEpisodeById(item.episodeId)
  const remoteEpisodeId = episode?.remoteId
  if (!remoteEpisodeId) {
    handleRecordError(
      validationError('Episode has no server ID yet'),
      ctx.log,
      { episodeId: item.episodeId },
      'Cannot queue episode on server',
    )
    return false
  }

  const result = await attempt(() => collections.addToQueue(remoteEpisodeId))
  const outcome = settleRecord(
    result,
    ctx.log,
    { episodeId: item.episodeId, remoteEpisodeId },
    'Failed to push queue addition',
  )
  if (outcome === 'skipped') return false

  // Position still has to be pushed; an item the server already had is left
  // for the mirror
  await ctx.db.updateQueueItem(
    item.id,
    result.ok
      ? { pendingOp: 'move', remoteId: result.value.remoteId }
      : { pendingOp: null },
  )
  return true
}

/**
 * Sends the local order of every item the server knows about
 */
async function pushOrder(
  ctx: PhaseContext,
  collections: CollectionsClient,
): Promise<boolean> {
  const items = await ctx.db.getQueueItems(false)
  const known = items.filter(
    (item): item is QueueItem & { remoteId: string } =>
      item.remoteId !== null && item.pendingOp !== 'add',
  )
  if (known.length === 0) return true

  const outcome = settleRecord(
    await attempt(() =>
      collections.reorderQueue(known.map((item) => item.remoteId)),
    ),
    ctx.log,
    { items: known.length },
    'Failed to push queue order',
  )
  if (outcome === 'skipped') return false

  await ctx.db.withTransaction(async (trx) => {
    for (const item of known) {
      if (item.pendingOp === 'move') {
        await ctx.db.updateQueueItem(item.id, { pendingOp: null }, trx)
      }
    }
  })
  return true
}

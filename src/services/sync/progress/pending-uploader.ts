/**
 * Pending Uploader
 *
 * Drains the pending action queue to the server. Confirmed actions are
 * marked synced and their episode's last-synced time advanced; anything
 * else stays queued for the next pass.
 */
import { attempt } from '@root/types/errors.js'
import type { PendingUpload } from '@root/types/library.types.js'
import type {
  ProgressUpload,
  ProgressUploadResult,
} from '@root/types/remote.types.js'
import {
  handleRecordError,
  type RecordOutcome,
} from '@services/sync/error-policy.js'
import type { PhaseContext } from '@services/sync/phase-context.js'
import { resolveRemoteEpisodeId } from '@services/sync/resolve-ids.js'
import { maxDate } from '@utils/date-serializer.js'

export interface UploadSummary {
  uploaded: number
  failed: number
}

function toProgressUpload(action: PendingUpload): ProgressUpload {
  return {
    actionId: action.id,
    remoteEpisodeId: resolveRemoteEpisodeId(action),
    podcastUrl: action.feedUrl,
    audioUrl: action.audioUrl,
    position: action.position,
    duration: action.duration,
    completed: action.completed,
    timestamp: action.createdAt,
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

/**
 * Uploads every unsynced action, in bulk chunks when the server accepts them
 * and one by one otherwise.
 *
 * @throws SyncError when the pass must abort
 */
export async function uploadPendingActions(
  ctx: PhaseContext,
): Promise<UploadSummary> {
  const pending = await ctx.db.getUnsyncedPendingUploads()
  const summary: UploadSummary = { uploaded: 0, failed: 0 }
  if (pending.length === 0) return summary

  const size = ctx.remote.capabilities.bulkProgressUpload
    ? Math.max(1, ctx.settings.progressBatchSize)
    : 1

  for (const batch of chunk(pending, size)) {
    const uploads = batch.map(toProgressUpload)
    const result = await attempt(
      () => ctx.remote.pushProgress(uploads),
      'Uploading progress',
    )
    const results: ProgressUploadResult[] = result.ok
      ? result.value
      : uploads.map((upload) => ({
          actionId: upload.actionId,
          ok: false as const,
          error: result.error,
        }))

    const byId = new Map(results.map((r) => [r.actionId, r]))
    const confirmed: PendingUpload[] = []
    for (const action of batch) {
      const outcome = byId.get(action.id)
      let settled: RecordOutcome = 'skipped'
      if (outcome?.ok) {
        settled = 'success'
      } else if (outcome) {
        settled = handleRecordError(
          outcome.error,
          ctx.log,
          { actionId: action.id, episodeId: action.episodeId },
          'Progress upload rejected',
        )
      } else {
        ctx.log.warn(
          { actionId: action.id },
          'Server returned no result for progress upload',
        )
      }
      if (settled === 'success') {
        confirmed.push(action)
      } else {
        summary.failed++
      }
    }

    await confirmActions(ctx, confirmed)
    summary.uploaded += confirmed.length
  }

  ctx.log.debug(summary, 'Pending actions uploaded')
  return summary
}

async function confirmActions(
  ctx: PhaseContext,
  actions: PendingUpload[],
): Promise<void> {
  if (actions.length === 0) return

  await ctx.db.withTransaction(async (trx) => {
    await ctx.db.markPendingActionsSynced(
      actions.map((action) => action.id),
      new Date(),
      trx,
    )

    const newestByEpisode = new Map<number, Date>()
    for (const action of actions) {
      newestByEpisode.set(
        action.episodeId,
        maxDate(newestByEpisode.get(action.episodeId) ?? null, action.createdAt),
      )
    }

    for (const [episodeId, newest] of newestByEpisode) {
      const episode = await ctx.db.getEpisodeById(episodeId, trx)
      if (!episode) continue
      const remaining = await ctx.db.countUnsyncedActionsForEpisode(
        episodeId,
        trx,
      )
      await ctx.db.markEpisodeSynced(
        episodeId,
        maxDate(episode.lastSyncedAt, newest),
        remaining === 0,
        trx,
      )
    }
  })
}

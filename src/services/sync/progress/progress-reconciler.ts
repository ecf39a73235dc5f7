/**
 * Progress Reconciler
 *
 * Applies the server's progress records through the conflict resolver, then
 * drains the local pending action queue.
 */
import { attempt } from '@root/types/errors.js'
import type { Episode } from '@root/types/library.types.js'
import type { RemoteProgressRecord } from '@root/types/remote.types.js'
import type { ProgressPhaseSummary } from '@root/types/sync.types.js'
import { resolveProgressConflict } from '@services/sync/conflict-resolver.js'
import { settleBoundary } from '@services/sync/error-policy.js'
import type {
  PhaseContext,
  PhaseResult,
} from '@services/sync/phase-context.js'
import { uploadPendingActions } from '@services/sync/progress/pending-uploader.js'
import type { Knex } from 'knex'

/**
 * Runs one progress reconciliation.
 *
 * @returns The summary and the cursor to persist, or null when the server
 * does not support the phase
 * @throws SyncError when the pass must abort
 */
export async function reconcileProgress(
  ctx: PhaseContext,
  cursor: string | null,
): Promise<PhaseResult<ProgressPhaseSummary>> {
  const delta = settleBoundary(
    await attempt(() => ctx.remote.getProgress(cursor), 'Fetching progress'),
    ctx.log,
    'progress',
  )
  if (!delta) return null

  const summary: ProgressPhaseSummary = {
    applied: 0,
    keptLocal: 0,
    unmatched: 0,
    uploaded: 0,
    uploadFailed: 0,
  }

  await ctx.db.withTransaction(async (trx) => {
    for (const record of delta.records) {
      const episode = await findLocalEpisode(ctx, record, trx)
      if (!episode) {
        summary.unmatched++
        ctx.log.debug(
          { remoteEpisodeId: record.remoteEpisodeId, audioUrl: record.audioUrl },
          'No local episode for progress record',
        )
        continue
      }

      if (resolveProgressConflict(episode, record) === 'local') {
        summary.keptLocal++
        continue
      }

      const unsynced = await ctx.db.countUnsyncedActionsForEpisode(
        episode.id,
        trx,
      )
      await ctx.db.updateEpisodeProgress(
        episode.id,
        {
          position: record.position,
          played: record.completed,
          needsSync: unsynced > 0,
          lastSyncedAt: record.timestamp,
        },
        trx,
      )
      summary.applied++
    }
  })

  const uploads = await uploadPendingActions(ctx)
  summary.uploaded = uploads.uploaded
  summary.uploadFailed = uploads.failed

  ctx.log.info(summary, 'Progress reconciliation finished')
  return { summary, newCursor: delta.newCursor }
}

/**
 * Locates a record's episode by remote ID, then by enclosure URL
 */
async function findLocalEpisode(
  ctx: PhaseContext,
  record: RemoteProgressRecord,
  trx: Knex.Transaction,
): Promise<Episode | null> {
  if (record.remoteEpisodeId) {
    const episode = await ctx.db.findEpisodeByRemoteId(
      record.remoteEpisodeId,
      trx,
    )
    if (episode) return episode
  }
  if (record.audioUrl) {
    return ctx.db.findEpisodeByAudioUrl(record.audioUrl, trx)
  }
  return null
}

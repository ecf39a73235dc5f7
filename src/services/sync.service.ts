/**
 * Sync Service
 *
 * Orchestrates reconciliation passes between the local store and the sync
 * server. It is exposed to the application via the 'sync' Fastify plugin
 * and can be accessed through the fastify.sync decorator.
 *
 * Responsible for:
 * - Single-flight execution: a pass requested while one runs is skipped
 * - Ordering the phases (subscriptions, progress, collections) and
 *   committing each before the next starts
 * - Recording pass state, cursors and counters in the sync state row
 * - Publishing run state on the status channel
 * - Pruning confirmed pending actions after a completed pass
 *
 * @example
 * const outcome = await fastify.sync.performSync({ mode: 'smart' })
 * if (outcome.outcome === 'completed') log.info(outcome.summary)
 */
import {
  isSyncError,
  localStoreError,
  noSession,
  type SyncError,
} from '@root/types/errors.js'
import type { FeedFetcher } from '@root/types/feed.types.js'
import type { ActiveSession, SyncState } from '@root/types/library.types.js'
import type { CollectionsClient } from '@root/types/remote.types.js'
import type {
  CollectionsPhaseSummary,
  SyncMode,
  SyncOptions,
  SyncOutcome,
  SyncSettings,
  SyncSummary,
} from '@root/types/sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { RemoteClientFactory } from '@services/remote/index.js'
import { reconcilePlaylists } from '@services/sync/collections/playlist-reconciler.js'
import { reconcileQueue } from '@services/sync/collections/queue-reconciler.js'
import type { PhaseContext } from '@services/sync/phase-context.js'
import { linkEpisodeIds } from '@services/sync/progress/episode-linker.js'
import { reconcileProgress } from '@services/sync/progress/progress-reconciler.js'
import { resolveActiveSession } from '@services/sync/resolve-ids.js'
import { SyncStatusChannel } from '@services/sync/status-channel.js'
import { reconcileSubscriptions } from '@services/sync/subscriptions/subscription-reconciler.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const HOUR_MS = 60 * 60 * 1000
const DAY_MS = 24 * HOUR_MS

export interface SyncServiceDeps {
  db: DatabaseService
  feeds: FeedFetcher
  createClient: RemoteClientFactory
  settings: SyncSettings
}

export class SyncService {
  readonly status: SyncStatusChannel
  private readonly log: FastifyBaseLogger
  private running = false

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly deps: SyncServiceDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'SYNC')
    this.status = new SyncStatusChannel(baseLog)
  }

  get isRunning(): boolean {
    return this.running
  }

  /**
   * Runs one reconciliation pass.
   *
   * @returns `skipped` without touching anything when a pass is in flight
   * @throws SyncError NoSession when not logged in; any error that aborts
   * the pass, after it has been recorded as failed
   */
  async performSync(options: SyncOptions = {}): Promise<SyncOutcome> {
    if (this.running) {
      this.log.info('Sync already running, skipping request')
      return { outcome: 'skipped', reason: 'already-running' }
    }

    this.running = true
    try {
      const summary = await this.runPass(options.mode ?? 'full')
      return { outcome: 'completed', summary }
    } finally {
      this.running = false
    }
  }

  private async runPass(requested: SyncMode): Promise<SyncSummary> {
    const { db } = this.deps

    const session = resolveActiveSession(
      await this.local(() => db.getServerConfiguration()),
    )
    if (!session) {
      const error = noSession('Not logged in to a sync server')
      this.log.warn(error.message)
      this.status.publish('failed', error.message)
      throw error
    }

    const state = await this.local(() => db.getSyncState())
    const startedAt = new Date()
    const mode = this.resolveMode(requested, state, startedAt)

    await this.local(() =>
      db.updateSyncState({
        status: 'running',
        lastSyncAttemptAt: startedAt,
        lastError: null,
      }),
    )
    this.status.publish('running', `Running ${mode} sync`)
    this.log.info({ mode, protocol: session.protocol }, 'Sync started')

    try {
      const summary = await this.runPhases(mode, session, state)

      summary.pruned = await db.pruneSyncedPendingActions(
        new Date(
          startedAt.getTime() -
            this.deps.settings.pendingActionRetentionDays * DAY_MS,
        ),
      )

      await db.updateSyncState({
        status: 'idle',
        lastError: null,
        totalSyncs: state.totalSyncs + 1,
        ...(mode === 'full' ? { lastFullSyncAt: startedAt } : {}),
      })

      this.log.info(
        { summary, durationMs: Date.now() - startedAt.getTime() },
        'Sync completed',
      )
      this.status.publish('completed', describeSummary(summary))
      return summary
    } catch (error) {
      // Remote and feed failures arrive classified; anything else came from
      // the local store
      const syncError = asLocalStoreError(error)
      await this.recordFailure(syncError, state)
      this.status.publish('failed', syncError.message)
      throw syncError
    }
  }

  /**
   * Smart mode runs progress only, unless a full pass is due
   */
  private resolveMode(
    requested: SyncMode,
    state: SyncState,
    now: Date,
  ): SyncMode {
    if (requested === 'full') return 'full'
    const last = state.lastFullSyncAt
    const due =
      last === null ||
      now.getTime() - last.getTime() >=
        this.deps.settings.fullSyncIntervalHours * HOUR_MS
    if (due) {
      this.log.debug('Full sync is due, upgrading smart sync')
      return 'full'
    }
    return 'smart'
  }

  private async runPhases(
    mode: SyncMode,
    session: ActiveSession,
    state: SyncState,
  ): Promise<SyncSummary> {
    const { db } = this.deps
    const ctx: PhaseContext = {
      db,
      remote: this.deps.createClient(session),
      feeds: this.deps.feeds,
      log: this.log,
      settings: this.deps.settings,
    }
    const summary: SyncSummary = {
      mode,
      subscriptions: null,
      progress: null,
      collections: null,
      skippedPhases: [],
      pruned: 0,
    }

    if (mode === 'full') {
      const result = await reconcileSubscriptions(ctx, state.subscriptionCursor)
      if (result) {
        summary.subscriptions = result.summary
        await db.updateSyncState({
          lastSubscriptionSyncAt: new Date(),
          ...(result.newCursor !== null
            ? { subscriptionCursor: result.newCursor }
            : {}),
        })
      } else {
        summary.skippedPhases.push('subscriptions')
      }

      const linked = await linkEpisodeIds(ctx)
      if (summary.subscriptions) summary.subscriptions.linkedEpisodes = linked
    }

    const progress = await reconcileProgress(ctx, state.progressCursor)
    if (progress) {
      summary.progress = progress.summary
      await db.updateSyncState({
        lastProgressSyncAt: new Date(),
        ...(progress.newCursor !== null
          ? { progressCursor: progress.newCursor }
          : {}),
      })
    } else {
      summary.skippedPhases.push('progress')
    }

    if (mode === 'full') {
      const collections = ctx.remote.collections
      summary.collections = collections
        ? await this.reconcileCollections(ctx, collections)
        : null
      if (!summary.collections) summary.skippedPhases.push('collections')
    }

    return summary
  }

  private async reconcileCollections(
    ctx: PhaseContext,
    collections: CollectionsClient,
  ): Promise<CollectionsPhaseSummary | null> {
    const queue = await reconcileQueue(ctx, collections)
    const playlists = await reconcilePlaylists(ctx, collections)
    if (!queue && !playlists) return null

    const summary: CollectionsPhaseSummary = {
      queueItems: queue?.items ?? 0,
      playlists: playlists?.playlists ?? 0,
      failedPushes: (queue?.failedPushes ?? 0) + (playlists?.failedPushes ?? 0),
    }
    this.log.info(summary, 'Collection reconciliation finished')
    return summary
  }

  private async recordFailure(error: SyncError, state: SyncState): Promise<void> {
    this.log.error({ error, kind: error.kind }, 'Sync failed')
    try {
      await this.deps.db.updateSyncState({
        status: 'failed',
        lastError: error.message,
        failedSyncs: state.failedSyncs + 1,
      })
    } catch (updateError) {
      this.log.error(
        { error: updateError },
        'Could not record sync failure in sync state',
      )
    }
  }

  /**
   * Runs a local store call outside a phase, classifying its failures
   */
  private async local<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      throw asLocalStoreError(error)
    }
  }
}

function asLocalStoreError(error: unknown): SyncError {
  if (isSyncError(error)) return error
  const reason = error instanceof Error ? error.message : String(error)
  return localStoreError(`Local store failure: ${reason}`, error)
}

function describeSummary(summary: SyncSummary): string {
  const parts: string[] = [`${summary.mode} sync completed`]
  if (summary.subscriptions) {
    parts.push(
      `${summary.subscriptions.materialized} subscriptions added, ${summary.subscriptions.remoteRemoved} removed`,
    )
  }
  if (summary.progress) {
    parts.push(
      `${summary.progress.applied} progress updates applied, ${summary.progress.uploaded} uploaded`,
    )
  }
  return parts.join('; ')
}

export type SyncMode = 'full' | 'smart'

export type SyncRunState = 'idle' | 'running' | 'completed' | 'failed'

/**
 * Immutable snapshot published on the status channel.
 */
export interface SyncStatusEvent {
  readonly state: SyncRunState
  readonly message: string | null
  readonly at: Date
}

export type SyncPhase = 'subscriptions' | 'progress' | 'collections'

export interface SubscriptionPhaseSummary {
  materialized: number
  materializeFailed: number
  remoteRemoved: number
  pushedAdds: number
  pushedRemoves: number
  failedPushes: number
  linkedEpisodes: number
}

export interface ProgressPhaseSummary {
  applied: number
  keptLocal: number
  unmatched: number
  uploaded: number
  uploadFailed: number
}

export interface CollectionsPhaseSummary {
  queueItems: number
  playlists: number
  failedPushes: number
}

export interface SyncSummary {
  mode: SyncMode
  subscriptions: SubscriptionPhaseSummary | null
  progress: ProgressPhaseSummary | null
  collections: CollectionsPhaseSummary | null
  /** Phases skipped because the server does not support them */
  skippedPhases: SyncPhase[]
  pruned: number
}

export type SyncOutcome =
  | { outcome: 'completed'; summary: SyncSummary }
  | { outcome: 'skipped'; reason: 'already-running' }

export interface SyncOptions {
  mode?: SyncMode
}

export interface SyncSettings {
  feedConcurrency: number
  progressBatchSize: number
  fullSyncIntervalHours: number
  pendingActionRetentionDays: number
}

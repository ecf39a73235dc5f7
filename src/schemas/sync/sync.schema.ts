import { z } from 'zod'

export const SyncModeSchema = z.enum(['full', 'smart'])

export const TriggerSyncBodySchema = z
  .object({
    mode: SyncModeSchema.default('full'),
  })
  .default({})

const SubscriptionPhaseSummarySchema = z.object({
  materialized: z.number(),
  materializeFailed: z.number(),
  remoteRemoved: z.number(),
  pushedAdds: z.number(),
  pushedRemoves: z.number(),
  failedPushes: z.number(),
  linkedEpisodes: z.number(),
})

const ProgressPhaseSummarySchema = z.object({
  applied: z.number(),
  keptLocal: z.number(),
  unmatched: z.number(),
  uploaded: z.number(),
  uploadFailed: z.number(),
})

const CollectionsPhaseSummarySchema = z.object({
  queueItems: z.number(),
  playlists: z.number(),
  failedPushes: z.number(),
})

export const SyncSummarySchema = z.object({
  mode: SyncModeSchema,
  subscriptions: SubscriptionPhaseSummarySchema.nullable(),
  progress: ProgressPhaseSummarySchema.nullable(),
  collections: CollectionsPhaseSummarySchema.nullable(),
  skippedPhases: z.array(z.enum(['subscriptions', 'progress', 'collections'])),
  pruned: z.number(),
})

export const TriggerSyncResponseSchema = z.object({
  success: z.boolean(),
  summary: SyncSummarySchema,
})

export const SyncStatusEventSchema = z.object({
  state: z.enum(['idle', 'running', 'completed', 'failed']),
  message: z.string().nullable(),
  at: z.string(),
})

export const SyncStatusResponseSchema = z.object({
  running: z.boolean(),
  current: SyncStatusEventSchema,
  state: z.object({
    status: z.enum(['idle', 'running', 'failed']),
    lastError: z.string().nullable(),
    lastSubscriptionSyncAt: z.string().nullable(),
    lastProgressSyncAt: z.string().nullable(),
    lastFullSyncAt: z.string().nullable(),
    lastSyncAttemptAt: z.string().nullable(),
    totalSyncs: z.number(),
    failedSyncs: z.number(),
  }),
})

export const SyncEventsStreamSchema = z.string()

export type TriggerSyncBody = z.infer<typeof TriggerSyncBodySchema>
export type TriggerSyncResponse = z.infer<typeof TriggerSyncResponseSchema>
export type SyncStatusResponse = z.infer<typeof SyncStatusResponseSchema>

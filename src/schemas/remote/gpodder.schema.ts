import { z } from 'zod'

// GET /api/2/subscriptions/{user}/{device}.json
export const SubscriptionChangesSchema = z.object({
  add: z.array(z.string()),
  remove: z.array(z.string()),
  timestamp: z.number(),
})

// Device-less endpoints answer with a plain list of feed URLs
export const SubscriptionListSchema = z.array(z.string())

export const UploadResponseSchema = z
  .object({
    timestamp: z.number().nullish(),
  })
  .passthrough()

export const EpisodeActionSchema = z.object({
  podcast: z.string(),
  episode: z.string(),
  action: z.string(),
  timestamp: z.union([z.string(), z.number()]).nullish(),
  position: z.number().nullish(),
  started: z.number().nullish(),
  total: z.number().nullish(),
  device: z.string().nullish(),
})

export const EpisodeActionsResponseSchema = z.object({
  actions: z.array(EpisodeActionSchema),
  timestamp: z.number(),
})

// Stored cursor: a server timestamp in delta mode, the last snapshot when
// only the device-less endpoints answer
export const GpodderCursorSchema = z.union([
  z.object({ since: z.number() }),
  z.object({ snapshot: z.array(z.string()) }),
])

export type EpisodeAction = z.infer<typeof EpisodeActionSchema>
export type GpodderCursor = z.infer<typeof GpodderCursorSchema>

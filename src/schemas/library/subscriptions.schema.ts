import { z } from 'zod'

export const SubscriptionSchema = z.object({
  id: z.number(),
  feedUrl: z.string(),
  subscribed: z.boolean(),
  needsSync: z.boolean(),
  title: z.string().nullable(),
  author: z.string().nullable(),
  description: z.string().nullable(),
  artworkUrl: z.string().nullable(),
  lastRefreshedAt: z.string().nullable(),
})

export const ListSubscriptionsQuerySchema = z.object({
  includeUnsubscribed: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
})

export const ListSubscriptionsResponseSchema = z.object({
  subscriptions: z.array(SubscriptionSchema),
})

export const FeedUrlBodySchema = z.object({
  feedUrl: z.string().url(),
})

export const SubscriptionResponseSchema = z.object({
  subscription: SubscriptionSchema,
})

export const UnsubscribeResponseSchema = z.object({
  changed: z.boolean(),
})

export const RefreshResponseSchema = z.object({
  subscription: SubscriptionSchema,
  newEpisodes: z.number(),
})

export const ListEpisodesParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const EpisodeSchema = z.object({
  id: z.number(),
  subscriptionId: z.number(),
  guid: z.string(),
  audioUrl: z.string().nullable(),
  title: z.string().nullable(),
  publishedAt: z.string().nullable(),
  duration: z.number().nullable(),
  position: z.number(),
  played: z.boolean(),
  lastPlayedAt: z.string().nullable(),
})

export const ListEpisodesResponseSchema = z.object({
  episodes: z.array(EpisodeSchema),
})

export type SubscriptionResponse = z.infer<typeof SubscriptionSchema>
export type EpisodeResponse = z.infer<typeof EpisodeSchema>

import { z } from 'zod'

export const QueueItemSchema = z.object({
  id: z.number(),
  episodeId: z.number(),
  position: z.number(),
  pendingOp: z.enum(['add', 'remove', 'move']).nullable(),
})

export const QueueResponseSchema = z.object({
  items: z.array(QueueItemSchema),
})

export const EnqueueBodySchema = z.object({
  episodeId: z.number().int().positive(),
})

export const ReorderQueueBodySchema = z.object({
  episodeIds: z.array(z.number().int().positive()),
})

export const QueueEpisodeParamsSchema = z.object({
  episodeId: z.coerce.number().int().positive(),
})

export const PlaylistSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string().nullable(),
  needsSync: z.boolean(),
})

export const PlaylistsResponseSchema = z.object({
  playlists: z.array(PlaylistSchema),
})

export const PlaylistBodySchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
})

export const PlaylistParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const PlaylistResponseSchema = z.object({
  playlist: PlaylistSchema,
})

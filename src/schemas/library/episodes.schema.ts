import { z } from 'zod'

export const EpisodeIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
})

export const RecordProgressBodySchema = z.object({
  position: z.number().min(0),
  completed: z.boolean().optional(),
  duration: z.number().min(0).nullable().optional(),
})

export const RecordProgressResponseSchema = z.object({
  actionId: z.number(),
  episodeId: z.number(),
  position: z.number(),
  completed: z.boolean(),
  createdAt: z.string(),
})

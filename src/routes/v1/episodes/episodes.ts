import type { z } from 'zod'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import {
  EpisodeIdParamsSchema,
  RecordProgressBodySchema,
  RecordProgressResponseSchema,
} from '@schemas/library/episodes.schema.js'
import { sendRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const episodeRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Params: z.infer<typeof EpisodeIdParamsSchema>
    Body: z.infer<typeof RecordProgressBodySchema>
  }>(
    '/:id/progress',
    {
      schema: {
        summary: 'Record playback progress',
        operationId: 'recordProgress',
        description:
          'Stores the playback position in seconds and queues it for upload on the next sync.',
        params: EpisodeIdParamsSchema,
        body: RecordProgressBodySchema,
        response: {
          201: RecordProgressResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Episodes'],
      },
    },
    async (request, reply) => {
      const { position, completed, duration } = request.body
      try {
        const action = await fastify.library.recordProgress(
          request.params.id,
          position,
          { completed, duration },
        )
        return reply.code(201).send({
          actionId: action.id,
          episodeId: action.episodeId,
          position: action.position,
          completed: action.completed,
          createdAt: action.createdAt.toISOString(),
        })
      } catch (error) {
        return sendRouteError(
          request,
          reply,
          error,
          'Failed to record progress',
        )
      }
    },
  )
}

export default episodeRoutes

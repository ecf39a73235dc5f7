import type { z } from 'zod'
import {
  ErrorSchema,
  NoContentSchema,
} from '@root/schemas/common/error.schema.js'
import {
  EnqueueBodySchema,
  QueueEpisodeParamsSchema,
  QueueItemSchema,
  QueueResponseSchema,
  ReorderQueueBodySchema,
} from '@schemas/library/collections.schema.js'
import { serializeQueueItem } from '@utils/response-serializers.js'
import { sendRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const queueRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Get the up-next queue',
        operationId: 'getQueue',
        description: 'Lists queued episodes in play order.',
        response: {
          200: QueueResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Queue'],
      },
    },
    async (request, reply) => {
      try {
        const items = await fastify.library.getQueue()
        return { items: items.map(serializeQueueItem) }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to read queue')
      }
    },
  )

  fastify.post<{ Body: z.infer<typeof EnqueueBodySchema> }>(
    '/',
    {
      schema: {
        summary: 'Add an episode to the queue',
        operationId: 'enqueue',
        description: 'Appends the episode to the end of the queue.',
        body: EnqueueBodySchema,
        response: {
          201: QueueItemSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Queue'],
      },
    },
    async (request, reply) => {
      try {
        const item = await fastify.library.enqueue(request.body.episodeId)
        return reply.code(201).send(serializeQueueItem(item))
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to queue episode')
      }
    },
  )

  fastify.put<{ Body: z.infer<typeof ReorderQueueBodySchema> }>(
    '/order',
    {
      schema: {
        summary: 'Reorder the queue',
        operationId: 'reorderQueue',
        description:
          'Moves the listed episodes to the front in the given order. Unlisted items keep their relative order after them.',
        body: ReorderQueueBodySchema,
        response: {
          200: QueueResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Queue'],
      },
    },
    async (request, reply) => {
      try {
        const items = await fastify.library.reorderQueue(request.body.episodeIds)
        return { items: items.map(serializeQueueItem) }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to reorder queue')
      }
    },
  )

  fastify.delete<{ Params: z.infer<typeof QueueEpisodeParamsSchema> }>(
    '/:episodeId',
    {
      schema: {
        summary: 'Remove an episode from the queue',
        operationId: 'dequeue',
        description: 'Removes the episode from the queue.',
        params: QueueEpisodeParamsSchema,
        response: {
          204: NoContentSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Queue'],
      },
    },
    async (request, reply) => {
      try {
        const removed = await fastify.library.dequeue(request.params.episodeId)
        if (!removed) {
          return reply.notFound('Episode is not queued')
        }
        return reply.code(204).send()
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to dequeue episode')
      }
    },
  )
}

export default queueRoutes

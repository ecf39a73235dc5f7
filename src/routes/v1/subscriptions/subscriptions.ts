import type { z } from 'zod'
import {
  ErrorSchema,
  NoContentSchema,
} from '@root/schemas/common/error.schema.js'
import {
  FeedUrlBodySchema,
  ListEpisodesParamsSchema,
  ListEpisodesResponseSchema,
  ListSubscriptionsQuerySchema,
  ListSubscriptionsResponseSchema,
  RefreshResponseSchema,
  SubscriptionResponseSchema,
  UnsubscribeResponseSchema,
} from '@schemas/library/subscriptions.schema.js'
import {
  serializeEpisode,
  serializeSubscription,
} from '@utils/response-serializers.js'
import { sendRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

type FeedUrlBody = z.infer<typeof FeedUrlBodySchema>

/**
 * Local subscription edits. Changes are stored immediately and pushed to the
 * server by the next sync pass.
 */
const subscriptionRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Querystring: z.infer<typeof ListSubscriptionsQuerySchema> }>(
    '/',
    {
      schema: {
        summary: 'List subscriptions',
        operationId: 'listSubscriptions',
        description:
          'Lists subscribed podcasts, or every known podcast with includeUnsubscribed=true.',
        querystring: ListSubscriptionsQuerySchema,
        response: {
          200: ListSubscriptionsResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      try {
        const subscriptions = await fastify.library.listSubscriptions(
          !request.query.includeUnsubscribed,
        )
        return { subscriptions: subscriptions.map(serializeSubscription) }
      } catch (error) {
        return sendRouteError(
          request,
          reply,
          error,
          'Failed to list subscriptions',
        )
      }
    },
  )

  fastify.post<{ Body: FeedUrlBody }>(
    '/',
    {
      schema: {
        summary: 'Subscribe to a podcast',
        operationId: 'subscribe',
        description:
          'Fetches the feed and stores the podcast with its episodes. A known podcast is resubscribed without fetching.',
        body: FeedUrlBodySchema,
        response: {
          201: SubscriptionResponseSchema,
          400: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      try {
        const subscription = await fastify.library.subscribe(request.body.feedUrl)
        return reply
          .code(201)
          .send({ subscription: serializeSubscription(subscription) })
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to subscribe')
      }
    },
  )

  fastify.post<{ Body: FeedUrlBody }>(
    '/unsubscribe',
    {
      schema: {
        summary: 'Unsubscribe from a podcast',
        operationId: 'unsubscribe',
        description:
          'Marks the podcast unsubscribed. Episodes and progress are kept.',
        body: FeedUrlBodySchema,
        response: {
          200: UnsubscribeResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      try {
        const changed = await fastify.library.unsubscribe(request.body.feedUrl)
        return { changed }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to unsubscribe')
      }
    },
  )

  fastify.post<{ Body: FeedUrlBody }>(
    '/refresh',
    {
      schema: {
        summary: 'Refresh a podcast feed',
        operationId: 'refreshSubscription',
        description:
          'Re-reads the feed, stores new episodes and asks the sync server to refresh its copy.',
        body: FeedUrlBodySchema,
        response: {
          200: RefreshResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      try {
        const result = await fastify.library.refreshPodcast(request.body.feedUrl)
        return {
          subscription: serializeSubscription(result.subscription),
          newEpisodes: result.newEpisodes,
        }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to refresh feed')
      }
    },
  )

  fastify.post<{ Body: FeedUrlBody }>(
    '/purge',
    {
      schema: {
        summary: 'Delete a podcast locally',
        operationId: 'purgeSubscription',
        description:
          'Deletes the podcast with its episodes and pending progress. Nothing is sent to the server.',
        body: FeedUrlBodySchema,
        response: {
          204: NoContentSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      try {
        await fastify.library.purgeSubscription(request.body.feedUrl)
        return reply.code(204).send()
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to delete podcast')
      }
    },
  )

  fastify.get<{ Params: z.infer<typeof ListEpisodesParamsSchema> }>(
    '/:id/episodes',
    {
      schema: {
        summary: 'List episodes of a podcast',
        operationId: 'listEpisodes',
        description: 'Lists stored episodes, newest first.',
        params: ListEpisodesParamsSchema,
        response: {
          200: ListEpisodesResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Subscriptions'],
      },
    },
    async (request, reply) => {
      try {
        const episodes = await fastify.library.listEpisodes(request.params.id)
        return { episodes: episodes.map(serializeEpisode) }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to list episodes')
      }
    },
  )
}

export default subscriptionRoutes

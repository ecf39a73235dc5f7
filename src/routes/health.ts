import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Reports local store connectivity and the outcome of the last sync pass. A failed pass does not make the service unhealthy.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const body: HealthCheckResponse = {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        checks: { database: 'ok' },
        sync: {
          running: fastify.sync.isRunning,
          lastStatus: null,
          lastSyncAttemptAt: null,
        },
      }

      try {
        const state = await fastify.db.getSyncState()
        body.sync.lastStatus = state.status
        body.sync.lastSyncAttemptAt =
          state.lastSyncAttemptAt?.toISOString() ?? null
      } catch (error) {
        fastify.log.error(
          { error },
          'Health check failed: local store is unreachable',
        )
        body.status = 'unhealthy'
        body.checks.database = 'failed'
      }

      return reply.status(body.status === 'healthy' ? 200 : 503).send(body)
    },
  )
}

export default plugin

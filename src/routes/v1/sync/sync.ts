import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import {
  type TriggerSyncBody,
  TriggerSyncBodySchema,
  TriggerSyncResponseSchema,
  SyncStatusResponseSchema,
} from '@schemas/sync/sync.schema.js'
import {
  serializeStatusEvent,
  serializeSyncState,
} from '@utils/response-serializers.js'
import { logRouteError, sendRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const syncRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.post<{ Body: TriggerSyncBody }>(
    '/',
    {
      schema: {
        summary: 'Run a sync pass',
        operationId: 'triggerSync',
        description:
          'Runs one reconciliation pass and waits for it to finish. Smart mode only syncs progress unless a full pass is due. Answers 409 when a pass is already running.',
        body: TriggerSyncBodySchema,
        response: {
          200: TriggerSyncResponseSchema,
          401: ErrorSchema,
          409: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      try {
        const result = await fastify.sync.performSync({
          mode: request.body.mode,
        })
        if (result.outcome === 'skipped') {
          return reply.conflict('A sync is already running')
        }
        return { success: true, summary: result.summary }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Sync failed')
      }
    },
  )

  fastify.get(
    '/status',
    {
      schema: {
        summary: 'Get sync status',
        operationId: 'getSyncStatus',
        description:
          'Returns the latest published run state with the persisted sync state counters and timestamps.',
        response: {
          200: SyncStatusResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      try {
        const state = await fastify.db.getSyncState()
        return {
          running: fastify.sync.isRunning,
          current: serializeStatusEvent(fastify.sync.status.current),
          state: serializeSyncState(state),
        }
      } catch (error) {
        return sendRouteError(
          request,
          reply,
          error,
          'Failed to read sync status',
        )
      }
    },
  )

  fastify.get(
    '/events',
    {
      schema: {
        summary: 'Stream sync status events',
        operationId: 'streamSyncStatus',
        description:
          'Server-Sent Events stream of run state changes. The current state is sent first.',
        tags: ['Sync'],
      },
    },
    async (request, reply) => {
      const channel = fastify.sync.status
      const abortController = new AbortController()

      request.socket.on('close', () => {
        abortController.abort()
      })

      return reply.sse(
        (async function* source() {
          yield {
            event: 'status',
            data: JSON.stringify(serializeStatusEvent(channel.current)),
          }
          try {
            for await (const event of channel.stream(abortController.signal)) {
              yield {
                event: 'status',
                data: JSON.stringify(serializeStatusEvent(event)),
              }
            }
          } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
              return
            }
            logRouteError(fastify.log, request, error, {
              message: 'SSE stream error',
            })
          }
        })(),
      )
    },
  )
}

export default syncRoutes

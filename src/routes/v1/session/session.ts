import { ErrorSchema } from '@root/schemas/common/error.schema.js'
import {
  type LoginBody,
  LoginBodySchema,
  SessionResponseSchema,
} from '@schemas/session/session.schema.js'
import { sendRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const sessionRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'Get sync server session',
        operationId: 'getSession',
        description:
          'Returns the configured sync server and whether a session is active. The token is never returned.',
        response: {
          200: SessionResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Session'],
      },
    },
    async (request, reply) => {
      try {
        return await fastify.session.getSession()
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to read session')
      }
    },
  )

  fastify.post<{ Body: LoginBody }>(
    '/login',
    {
      schema: {
        summary: 'Log in to a sync server',
        operationId: 'login',
        description:
          'Authenticates against a gpodder or podcast-service server and stores the session. Switching server or account resets the sync cursors.',
        body: LoginBodySchema,
        response: {
          200: SessionResponseSchema,
          400: ErrorSchema,
          401: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Session'],
      },
    },
    async (request, reply) => {
      try {
        return await fastify.session.login(request.body)
      } catch (error) {
        return sendRouteError(request, reply, error, 'Login failed')
      }
    },
  )

  fastify.post(
    '/logout',
    {
      schema: {
        summary: 'Log out of the sync server',
        operationId: 'logout',
        description:
          'Forgets the session token and the sync cursors. Local library data is kept.',
        response: {
          200: SessionResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Session'],
      },
    },
    async (request, reply) => {
      try {
        return await fastify.session.logout()
      } catch (error) {
        return sendRouteError(request, reply, error, 'Logout failed')
      }
    },
  )
}

export default sessionRoutes

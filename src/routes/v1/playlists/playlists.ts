import type { z } from 'zod'
import {
  ErrorSchema,
  NoContentSchema,
} from '@root/schemas/common/error.schema.js'
import {
  PlaylistBodySchema,
  PlaylistParamsSchema,
  PlaylistResponseSchema,
  PlaylistsResponseSchema,
} from '@schemas/library/collections.schema.js'
import { serializePlaylist } from '@utils/response-serializers.js'
import { sendRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

type PlaylistBody = z.infer<typeof PlaylistBodySchema>
type PlaylistParams = z.infer<typeof PlaylistParamsSchema>

const playlistRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/',
    {
      schema: {
        summary: 'List playlists',
        operationId: 'listPlaylists',
        description: 'Lists playlists by name.',
        response: {
          200: PlaylistsResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Playlists'],
      },
    },
    async (request, reply) => {
      try {
        const playlists = await fastify.library.listPlaylists()
        return { playlists: playlists.map(serializePlaylist) }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to list playlists')
      }
    },
  )

  fastify.post<{ Body: PlaylistBody }>(
    '/',
    {
      schema: {
        summary: 'Create a playlist',
        operationId: 'createPlaylist',
        description: 'Creates a playlist locally; the next full sync creates it on the server.',
        body: PlaylistBodySchema,
        response: {
          201: PlaylistResponseSchema,
          500: ErrorSchema,
        },
        tags: ['Playlists'],
      },
    },
    async (request, reply) => {
      try {
        const playlist = await fastify.library.createPlaylist(
          request.body.name,
          request.body.description ?? null,
        )
        return reply.code(201).send({ playlist: serializePlaylist(playlist) })
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to create playlist')
      }
    },
  )

  fastify.put<{ Params: PlaylistParams; Body: PlaylistBody }>(
    '/:id',
    {
      schema: {
        summary: 'Rename a playlist',
        operationId: 'renamePlaylist',
        description: 'Updates the name and, when given, the description.',
        params: PlaylistParamsSchema,
        body: PlaylistBodySchema,
        response: {
          200: PlaylistResponseSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Playlists'],
      },
    },
    async (request, reply) => {
      try {
        const playlist = await fastify.library.renamePlaylist(
          request.params.id,
          request.body.name,
          request.body.description,
        )
        return { playlist: serializePlaylist(playlist) }
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to rename playlist')
      }
    },
  )

  fastify.delete<{ Params: PlaylistParams }>(
    '/:id',
    {
      schema: {
        summary: 'Delete a playlist',
        operationId: 'deletePlaylist',
        description: 'Deletes the playlist here and, on the next full sync, on the server.',
        params: PlaylistParamsSchema,
        response: {
          204: NoContentSchema,
          404: ErrorSchema,
          500: ErrorSchema,
        },
        tags: ['Playlists'],
      },
    },
    async (request, reply) => {
      try {
        await fastify.library.deletePlaylist(request.params.id)
        return reply.code(204).send()
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to delete playlist')
      }
    },
  )
}

export default playlistRoutes

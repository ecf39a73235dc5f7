import { FastifySSEPlugin } from 'fastify-sse-v2'

/**
 * Adds `reply.sse()` for the sync status stream.
 */
export default FastifySSEPlugin

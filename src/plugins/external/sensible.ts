import sensible from '@fastify/sensible'

/**
 * Adds the `reply.notFound()` family of HTTP error helpers.
 */
export default sensible

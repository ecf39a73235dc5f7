import type { FeedFetcher } from '@root/types/feed.types.js'
import { FeedFetcherService } from '@services/feed-fetcher.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    feeds: FeedFetcher
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.decorate(
      'feeds',
      new FeedFetcherService(fastify.log, fastify.config.feedTimeoutMs),
    )
  },
  {
    name: 'feed-fetcher',
    dependencies: ['config'],
  },
)

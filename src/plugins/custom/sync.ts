import { LibraryService } from '@services/library.service.js'
import {
  createRemoteClient,
  type RemoteClientFactory,
} from '@services/remote/index.js'
import { SessionService } from '@services/session.service.js'
import { SyncService } from '@services/sync.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    sync: SyncService
    library: LibraryService
    session: SessionService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const { config } = fastify
    const createClient: RemoteClientFactory = (session) =>
      createRemoteClient(session, config, fastify.log)

    fastify.decorate(
      'sync',
      new SyncService(fastify.log, {
        db: fastify.db,
        feeds: fastify.feeds,
        createClient,
        settings: {
          feedConcurrency: config.feedConcurrency,
          progressBatchSize: config.progressBatchSize,
          fullSyncIntervalHours: config.fullSyncIntervalHours,
          pendingActionRetentionDays: config.pendingActionRetentionDays,
        },
      }),
    )
    fastify.decorate(
      'library',
      new LibraryService(fastify.log, fastify.db, fastify.feeds, createClient),
    )
    fastify.decorate(
      'session',
      new SessionService(fastify.log, fastify.db, config.requestTimeoutMs),
    )
  },
  {
    name: 'sync',
    dependencies: ['config', 'database', 'feed-fetcher'],
  },
)

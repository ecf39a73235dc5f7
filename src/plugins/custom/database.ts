import { DatabaseService } from '@services/database.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    db: DatabaseService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const dbService = await DatabaseService.create(fastify.log, fastify.config)
    fastify.decorate('db', dbService)
    fastify.addHook('onClose', async () => {
      fastify.log.info('Closing database service...')
      await dbService.close()
    })

    // A process that died mid-pass leaves the state row claiming a run
    if (await dbService.resetStaleRunningStatus()) {
      fastify.log.warn('Reset sync status left running by a previous process')
    }
  },
  {
    name: 'database',
    dependencies: ['config'],
  },
)

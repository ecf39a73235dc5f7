import { SchedulerService } from '@services/scheduler.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    scheduler: SchedulerService
  }
}

export const PERIODIC_SYNC_JOB = 'periodic-sync'

/**
 * Runs a smart sync every `syncIntervalMinutes`. Zero disables the job.
 */
export default fp(
  async (fastify: FastifyInstance) => {
    const scheduler = new SchedulerService(fastify.log)
    fastify.decorate('scheduler', scheduler)

    fastify.addHook('onReady', async () => {
      const minutes = fastify.config.syncIntervalMinutes
      if (minutes <= 0) {
        fastify.log.info('Periodic sync disabled')
        return
      }
      scheduler.scheduleInterval(PERIODIC_SYNC_JOB, { minutes }, async () => {
        await fastify.sync.performSync({ mode: 'smart' })
      })
    })

    fastify.addHook('onClose', async () => {
      scheduler.stopAll()
    })
  },
  {
    name: 'scheduler',
    dependencies: ['config', 'sync'],
  },
)

/**
 * Scheduler Service
 *
 * Runs periodic jobs with toad-scheduler. Registered by the 'scheduler'
 * plugin, which schedules the recurring smart sync.
 *
 * Responsible for:
 * - Registering interval jobs by name, replacing any job with the same name
 * - Logging job failures without letting them escape the timer
 * - Stopping every job on shutdown
 *
 * @example
 * scheduler.scheduleInterval('periodic-sync', { minutes: 15 }, async () => {
 *   await sync.performSync({ mode: 'smart' })
 * })
 */
import { isSyncError } from '@root/types/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { AsyncTask, SimpleIntervalJob, ToadScheduler } from 'toad-scheduler'

/** Handler function type for scheduled jobs */
export type JobHandler = (jobName: string) => Promise<void>

export interface IntervalConfig {
  minutes?: number
  seconds?: number
  hours?: number
  runImmediately?: boolean
}

export class SchedulerService {
  private readonly scheduler = new ToadScheduler()
  private readonly log: FastifyBaseLogger
  private readonly jobs = new Set<string>()

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'SCHEDULER')
  }

  /**
   * Schedules `handler` every interval. Overlapping runs are prevented.
   */
  scheduleInterval(
    name: string,
    config: IntervalConfig,
    handler: JobHandler,
  ): void {
    const task = new AsyncTask(
      `${name}-task`,
      async () => {
        this.log.debug(`Running scheduled job: ${name}`)
        try {
          await handler(name)
          this.log.debug(`Job ${name} completed successfully`)
        } catch (error) {
          if (isSyncError(error) && error.kind === 'NoSession') {
            this.log.info(`Job ${name} skipped: ${error.message}`)
            return
          }
          this.log.error({ error }, `Error in job ${name}`)
        }
      },
      (error) => {
        this.log.error({ error }, `Job task error for ${name}`)
      },
    )

    if (this.jobs.has(name)) {
      this.scheduler.removeById(name)
    }
    this.scheduler.addSimpleIntervalJob(
      new SimpleIntervalJob(
        { ...config, runImmediately: config.runImmediately ?? false },
        task,
        { id: name, preventOverrun: true },
      ),
    )
    this.jobs.add(name)
    this.log.info({ name, ...config }, 'Job scheduled')
  }

  hasJob(name: string): boolean {
    return this.jobs.has(name)
  }

  stopAll(): void {
    this.scheduler.stop()
    this.jobs.clear()
  }
}

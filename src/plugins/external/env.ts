import env from '@fastify/env'
import type { Config } from '@root/types/config.types.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    port: {
      type: 'number',
      default: 3005,
    },
    dbPath: {
      type: 'string',
      default: './data/db/podsync.db',
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    syncIntervalMinutes: {
      type: 'number',
      minimum: 0,
      default: 15,
    },
    fullSyncIntervalHours: {
      type: 'number',
      minimum: 0,
      default: 24,
    },
    feedConcurrency: {
      type: 'number',
      minimum: 1,
      default: 4,
    },
    progressBatchSize: {
      type: 'number',
      minimum: 1,
      default: 50,
    },
    pendingActionRetentionDays: {
      type: 'number',
      minimum: 0,
      default: 30,
    },
    feedTimeoutMs: {
      type: 'number',
      minimum: 1,
      default: 15000,
    },
    requestTimeoutMs: {
      type: 'number',
      minimum: 1,
      default: 30000,
    },
    deviceId: {
      type: 'string',
      minLength: 1,
      default: 'podsync-node',
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    fastify.log.debug(
      {
        dbPath: fastify.config.dbPath,
        syncIntervalMinutes: fastify.config.syncIntervalMinutes,
      },
      'Configuration loaded',
    )
  },
  {
    name: 'config',
  },
)

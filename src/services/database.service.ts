/**
 * Database Service
 *
 * The local store: a transactional repository over better-sqlite3 that holds
 * the offline replica. It is exposed to the application via the 'database'
 * Fastify plugin and can be accessed through the fastify.db decorator.
 *
 * Responsible for:
 * - Subscriptions and their episodes (dedup by feed URL and by GUID)
 * - The pending progress action queue
 * - The sync state and server configuration singletons (get-or-create)
 * - Queue and playlist mirrors
 *
 * Has no network knowledge. Method groups live in ./database/methods and are
 * attached to the prototype below; every method accepts an optional
 * transaction so callers decide the commit boundary.
 *
 * @example
 * await fastify.db.withTransaction(async (trx) => {
 *   const sub = await fastify.db.getSubscriptionByFeedUrl(url, trx)
 *   ...
 * })
 */
import type { Config } from '@root/types/config.types.js'
import { resolveDbFile } from '@utils/paths.js'
import type { FastifyBaseLogger } from 'fastify'
import knex, { type Knex } from 'knex'
import * as episodeMethods from './database/methods/episodes.js'
import * as pendingActionMethods from './database/methods/pending-actions.js'
import * as playlistMethods from './database/methods/playlists.js'
import * as queueMethods from './database/methods/queue.js'
import * as serverConfigMethods from './database/methods/server-config.js'
import * as subscriptionMethods from './database/methods/subscriptions.js'
import * as syncStateMethods from './database/methods/sync-state.js'
import './database/types/episode-methods.js'
import './database/types/pending-action-methods.js'
import './database/types/playlist-methods.js'
import './database/types/queue-methods.js'
import './database/types/server-config-methods.js'
import './database/types/subscription-methods.js'
import './database/types/sync-state-methods.js'

export class DatabaseService {
  readonly knex: Knex

  /**
   * @param log - Logger for database operations
   * @param config - Only `dbPath` is read
   */
  constructor(
    readonly log: FastifyBaseLogger,
    config: Pick<Config, 'dbPath'>,
  ) {
    this.knex = knex(DatabaseService.createKnexConfig(config.dbPath, log))
  }

  /**
   * Creates the service and verifies the connection and schema.
   */
  static async create(
    log: FastifyBaseLogger,
    config: Pick<Config, 'dbPath'>,
  ): Promise<DatabaseService> {
    const service = new DatabaseService(log, config)
    const hasSchema = await service.knex.schema.hasTable('sync_state')
    if (!hasSchema) {
      await service.close()
      throw new Error(
        `Database at ${config.dbPath} has no schema. Run "npm run migrate" first.`,
      )
    }
    return service
  }

  /**
   * Creates Knex configuration for better-sqlite3
   *
   * A single pooled connection serializes all access; WAL and foreign keys
   * are enabled per connection.
   */
  private static createKnexConfig(
    dbPath: string,
    log: FastifyBaseLogger,
  ): Knex.Config {
    return {
      client: 'better-sqlite3',
      connection: {
        filename: dbPath === ':memory:' ? dbPath : resolveDbFile(dbPath),
      },
      useNullAsDefault: true,
      pool: {
        min: 1,
        max: 1,
        afterCreate: (
          conn: { pragma(source: string): unknown },
          done: (err: Error | null, conn: unknown) => void,
        ) => {
          conn.pragma('journal_mode = WAL')
          conn.pragma('foreign_keys = ON')
          done(null, conn)
        },
      },
      log: {
        warn: (message: string) => log.warn(message),
        error: (message: string | Error) => {
          log.error(message instanceof Error ? message.message : message)
        },
        debug: (message: string) => log.debug(message),
      },
      debug: false,
    }
  }

  /**
   * Runs `fn` inside one transaction: committed when it resolves, rolled back
   * when it throws.
   */
  withTransaction<T>(fn: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return this.knex.transaction(fn)
  }

  /**
   * Closes the database connection
   */
  async close(): Promise<void> {
    await this.knex.destroy()
  }

  /**
   * Current time as stored in timestamp columns
   */
  get timestamp(): string {
    return new Date().toISOString()
  }
}

Object.assign(
  DatabaseService.prototype,
  subscriptionMethods,
  episodeMethods,
  pendingActionMethods,
  syncStateMethods,
  serverConfigMethods,
  queueMethods,
  playlistMethods,
)

import type { FeedFetcher } from '@root/types/feed.types.js'
import type { RemoteClient } from '@root/types/remote.types.js'
import type { SyncSettings } from '@root/types/sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Collaborators shared by the phases of one pass
 */
export interface PhaseContext {
  db: DatabaseService
  remote: RemoteClient
  feeds: FeedFetcher
  log: FastifyBaseLogger
  settings: SyncSettings
}

/**
 * Result of a phase that reads from the server: null when the phase was
 * skipped at its boundary
 */
export type PhaseResult<TSummary> = {
  summary: TSummary
  newCursor: string | null
} | null

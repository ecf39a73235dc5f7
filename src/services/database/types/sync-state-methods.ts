import type { SyncState } from '@root/types/library.types.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SYNC STATE METHODS
    /**
     * Reads the sync state singleton, creating it on first access
     */
    getSyncState(trx?: Knex.Transaction): Promise<SyncState>

    updateSyncState(
      updates: Partial<SyncState>,
      trx?: Knex.Transaction,
    ): Promise<SyncState>

    /**
     * Resets a `running` status left by an interrupted process
     * @returns Whether the status was reset
     */
    resetStaleRunningStatus(trx?: Knex.Transaction): Promise<boolean>

    resetSyncCursors(trx?: Knex.Transaction): Promise<void>
  }
}

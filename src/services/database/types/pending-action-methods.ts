import type {
  PendingAction,
  PendingUpload,
} from '@root/types/library.types.js'
import type { NewPendingAction } from '@services/database/methods/pending-actions.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // PENDING ACTION METHODS
    createPendingAction(
      action: NewPendingAction,
      trx?: Knex.Transaction,
    ): Promise<PendingAction>

    /**
     * Unsynced actions in creation order, joined with episode addressing
     */
    getUnsyncedPendingUploads(trx?: Knex.Transaction): Promise<PendingUpload[]>

    getPendingActionsForEpisode(
      episodeId: number,
      trx?: Knex.Transaction,
    ): Promise<PendingAction[]>

    markPendingActionsSynced(
      ids: number[],
      syncedAt: Date,
      trx?: Knex.Transaction,
    ): Promise<number>

    countUnsyncedActionsForEpisode(
      episodeId: number,
      trx?: Knex.Transaction,
    ): Promise<number>

    /**
     * Deletes confirmed actions synced before the cutoff
     * @returns Number of actions deleted
     */
    pruneSyncedPendingActions(
      syncedBefore: Date,
      trx?: Knex.Transaction,
    ): Promise<number>
  }
}

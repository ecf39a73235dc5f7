import type { QueueItem } from '@root/types/library.types.js'
import type { QueueMirrorEntry } from '@services/database/methods/queue.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // QUEUE METHODS
    getQueueItems(
      includeRemoved?: boolean,
      trx?: Knex.Transaction,
    ): Promise<QueueItem[]>

    addQueueItem(episodeId: number, trx?: Knex.Transaction): Promise<QueueItem>

    /**
     * @returns Whether the episode was queued
     */
    removeQueueItem(episodeId: number, trx?: Knex.Transaction): Promise<boolean>

    reorderQueueItems(
      episodeIds: number[],
      trx?: Knex.Transaction,
    ): Promise<void>

    updateQueueItem(
      id: number,
      updates: Partial<Pick<QueueItem, 'remoteId' | 'pendingOp' | 'position'>>,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    deleteQueueItem(id: number, trx?: Knex.Transaction): Promise<boolean>

    /**
     * Replaces synced queue items with the server's queue
     */
    mirrorQueue(
      entries: QueueMirrorEntry[],
      trx?: Knex.Transaction,
    ): Promise<void>
  }
}

import type { Episode, NewEpisode } from '@root/types/library.types.js'
import type {
  EpisodeMetadataUpdate,
  EpisodeProgressUpdate,
} from '@services/database/methods/episodes.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // EPISODE METHODS
    getEpisodeById(id: number, trx?: Knex.Transaction): Promise<Episode | null>

    getEpisodesForSubscription(
      subscriptionId: number,
      trx?: Knex.Transaction,
    ): Promise<Episode[]>

    findEpisodeByRemoteId(
      remoteId: string,
      trx?: Knex.Transaction,
    ): Promise<Episode | null>

    /**
     * Finds an episode by enclosure URL, preferring subscribed podcasts
     */
    findEpisodeByAudioUrl(
      audioUrl: string,
      trx?: Knex.Transaction,
    ): Promise<Episode | null>

    /**
     * Inserts episodes whose GUID is not yet stored for the subscription
     * @returns Number of episodes inserted
     */
    insertEpisodes(
      subscriptionId: number,
      episodes: NewEpisode[],
      trx?: Knex.Transaction,
    ): Promise<number>

    updateEpisodeMetadata(
      subscriptionId: number,
      guid: string,
      updates: EpisodeMetadataUpdate,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    updateEpisodeProgress(
      id: number,
      update: EpisodeProgressUpdate,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    /**
     * Advances last-synced, clearing the dirty flag when asked
     */
    markEpisodeSynced(
      id: number,
      lastSyncedAt: Date,
      clearDirty: boolean,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    setEpisodeRemoteId(
      id: number,
      remoteId: string,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    getEpisodesMissingRemoteId(
      subscriptionId: number,
      trx?: Knex.Transaction,
    ): Promise<Episode[]>
  }
}

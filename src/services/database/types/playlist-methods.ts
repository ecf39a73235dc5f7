import type { Playlist, PlaylistItem } from '@root/types/library.types.js'
import type {
  NewPlaylist,
  PlaylistItemEntry,
} from '@services/database/methods/playlists.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // PLAYLIST METHODS
    getPlaylists(
      includeDeleted?: boolean,
      trx?: Knex.Transaction,
    ): Promise<Playlist[]>

    getPlaylistById(id: number, trx?: Knex.Transaction): Promise<Playlist | null>

    getPlaylistByRemoteId(
      remoteId: string,
      trx?: Knex.Transaction,
    ): Promise<Playlist | null>

    insertPlaylist(data: NewPlaylist, trx?: Knex.Transaction): Promise<Playlist>

    updatePlaylist(
      id: number,
      updates: Partial<
        Pick<
          Playlist,
          'remoteId' | 'name' | 'description' | 'needsSync' | 'deleted'
        >
      >,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    deletePlaylist(id: number, trx?: Knex.Transaction): Promise<boolean>

    getPlaylistItems(
      playlistId: number,
      trx?: Knex.Transaction,
    ): Promise<PlaylistItem[]>

    replacePlaylistItems(
      playlistId: number,
      items: PlaylistItemEntry[],
      trx?: Knex.Transaction,
    ): Promise<void>
  }
}

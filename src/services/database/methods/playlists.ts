import type { Playlist, PlaylistItem } from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  mapPlaylistItemRow,
  mapPlaylistRow,
  type PlaylistItemRow,
  type PlaylistRow,
} from '@services/database/rows.js'
import type { Knex } from 'knex'

export interface NewPlaylist {
  name: string
  description: string | null
  remoteId?: string | null
  needsSync: boolean
}

export interface PlaylistItemEntry {
  remoteId: string
  episodeId: number | null
  position: number
}

export async function getPlaylists(
  this: DatabaseService,
  includeDeleted = false,
  trx?: Knex.Transaction,
): Promise<Playlist[]> {
  const query = (trx ?? this.knex)<PlaylistRow>('playlists')
  if (!includeDeleted) query.where({ deleted: false })
  const rows = await query.orderBy([
    { column: 'name', order: 'asc' },
    { column: 'id', order: 'asc' },
  ])
  return rows.map(mapPlaylistRow)
}

export async function getPlaylistById(
  this: DatabaseService,
  id: number,
  trx?: Knex.Transaction,
): Promise<Playlist | null> {
  const row = await (trx ?? this.knex)<PlaylistRow>('playlists')
    .where({ id })
    .first()
  return row ? mapPlaylistRow(row) : null
}

export async function getPlaylistByRemoteId(
  this: DatabaseService,
  remoteId: string,
  trx?: Knex.Transaction,
): Promise<Playlist | null> {
  const row = await (trx ?? this.knex)<PlaylistRow>('playlists')
    .where({ remote_id: remoteId })
    .first()
  return row ? mapPlaylistRow(row) : null
}

export async function insertPlaylist(
  this: DatabaseService,
  data: NewPlaylist,
  trx?: Knex.Transaction,
): Promise<Playlist> {
  const db = trx ?? this.knex
  const now = this.timestamp
  const [id] = await db<PlaylistRow>('playlists').insert({
    remote_id: data.remoteId ?? null,
    name: data.name,
    description: data.description,
    needs_sync: data.needsSync,
    deleted: false,
    created_at: now,
    updated_at: now,
  })
  const row = await db<PlaylistRow>('playlists').where({ id }).first()
  if (!row) {
    throw new Error(`Failed to create playlist ${data.name}`)
  }
  return mapPlaylistRow(row)
}

export async function updatePlaylist(
  this: DatabaseService,
  id: number,
  updates: Partial<
    Pick<Playlist, 'remoteId' | 'name' | 'description' | 'needsSync' | 'deleted'>
  >,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const row: Partial<PlaylistRow> = { updated_at: this.timestamp }
  if (updates.remoteId !== undefined) row.remote_id = updates.remoteId
  if (updates.name !== undefined) row.name = updates.name
  if (updates.description !== undefined) row.description = updates.description
  if (updates.needsSync !== undefined) row.needs_sync = updates.needsSync
  if (updates.deleted !== undefined) row.deleted = updates.deleted

  const updated = await (trx ?? this.knex)<PlaylistRow>('playlists')
    .where({ id })
    .update(row)
  return updated > 0
}

/**
 * Deletes a playlist row and its items
 */
export async function deletePlaylist(
  this: DatabaseService,
  id: number,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const deleted = await (trx ?? this.knex)<PlaylistRow>('playlists')
    .where({ id })
    .delete()
  return deleted > 0
}

export async function getPlaylistItems(
  this: DatabaseService,
  playlistId: number,
  trx?: Knex.Transaction,
): Promise<PlaylistItem[]> {
  const rows = await (trx ?? this.knex)<PlaylistItemRow>('playlist_items')
    .where({ playlist_id: playlistId })
    .orderBy([
      { column: 'position', order: 'asc' },
      { column: 'id', order: 'asc' },
    ])
  return rows.map(mapPlaylistItemRow)
}

/**
 * Replaces a playlist's items with the server's list
 */
export async function replacePlaylistItems(
  this: DatabaseService,
  playlistId: number,
  items: PlaylistItemEntry[],
  trx?: Knex.Transaction,
): Promise<void> {
  const db = trx ?? this.knex
  await db<PlaylistItemRow>('playlist_items')
    .where({ playlist_id: playlistId })
    .delete()
  if (items.length === 0) return
  await db<PlaylistItemRow>('playlist_items').insert(
    items.map((item) => ({
      playlist_id: playlistId,
      remote_id: item.remoteId,
      episode_id: item.episodeId,
      position: item.position,
    })),
  )
}

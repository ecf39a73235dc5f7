import type { Episode, NewEpisode } from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { type EpisodeRow, mapEpisodeRow } from '@services/database/rows.js'
import { serializeDate } from '@utils/date-serializer.js'
import type { Knex } from 'knex'

const INSERT_CHUNK_SIZE = 200

export interface EpisodeProgressUpdate {
  position: number
  played: boolean
  needsSync: boolean
  lastPlayedAt?: Date | null
  lastSyncedAt?: Date | null
}

export type EpisodeMetadataUpdate = Partial<
  Pick<
    Episode,
    | 'audioUrl'
    | 'title'
    | 'description'
    | 'publishedAt'
    | 'duration'
    | 'artworkUrl'
  >
>

export async function getEpisodeById(
  this: DatabaseService,
  id: number,
  trx?: Knex.Transaction,
): Promise<Episode | null> {
  const row = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ id })
    .first()
  return row ? mapEpisodeRow(row) : null
}

/**
 * Lists a subscription's episodes, newest first
 */
export async function getEpisodesForSubscription(
  this: DatabaseService,
  subscriptionId: number,
  trx?: Knex.Transaction,
): Promise<Episode[]> {
  const rows = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ subscription_id: subscriptionId })
    .orderBy([
      { column: 'published_at', order: 'desc' },
      { column: 'id', order: 'desc' },
    ])
  return rows.map(mapEpisodeRow)
}

export async function findEpisodeByRemoteId(
  this: DatabaseService,
  remoteId: string,
  trx?: Knex.Transaction,
): Promise<Episode | null> {
  const row = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ remote_id: remoteId })
    .first()
  return row ? mapEpisodeRow(row) : null
}

/**
 * Finds an episode by its enclosure URL, preferring one that belongs to a
 * subscribed podcast when several feeds carry the same file.
 */
export async function findEpisodeByAudioUrl(
  this: DatabaseService,
  audioUrl: string,
  trx?: Knex.Transaction,
): Promise<Episode | null> {
  const row = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ audio_url: audioUrl })
    .orderByRaw(
      '(select subscribed from subscriptions where subscriptions.id = episodes.subscription_id) desc',
    )
    .orderBy('id', 'asc')
    .first()
  return row ? mapEpisodeRow(row) : null
}

/**
 * Inserts the episodes whose GUID is not yet stored for the subscription
 *
 * Duplicate GUIDs within `episodes` keep their first occurrence. The GUID
 * lookup and the insert run in one transaction, so the count is exact.
 *
 * @returns Number of episodes inserted
 */
export async function insertEpisodes(
  this: DatabaseService,
  subscriptionId: number,
  episodes: NewEpisode[],
  trx?: Knex.Transaction,
): Promise<number> {
  if (!trx) {
    return this.withTransaction((inner) =>
      this.insertEpisodes(subscriptionId, episodes, inner),
    )
  }

  const existing = await trx<EpisodeRow>('episodes')
    .where({ subscription_id: subscriptionId })
    .pluck('guid')
  const known = new Set<string>(existing)

  const rows: Omit<EpisodeRow, 'id'>[] = []
  for (const episode of episodes) {
    if (known.has(episode.guid)) continue
    known.add(episode.guid)
    rows.push({
      subscription_id: subscriptionId,
      guid: episode.guid,
      remote_id: null,
      audio_url: episode.audioUrl,
      title: episode.title,
      description: episode.description,
      published_at: serializeDate(episode.publishedAt),
      duration: episode.duration,
      artwork_url: episode.artworkUrl,
      position: 0,
      played: false,
      last_played_at: null,
      last_synced_at: null,
      needs_sync: false,
    })
  }

  for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
    await trx<EpisodeRow>('episodes').insert(rows.slice(i, i + INSERT_CHUNK_SIZE))
  }

  return rows.length
}

/**
 * Refreshes metadata of already stored episodes matched by GUID. Playback
 * state is left alone.
 */
export async function updateEpisodeMetadata(
  this: DatabaseService,
  subscriptionId: number,
  guid: string,
  updates: EpisodeMetadataUpdate,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const row: Partial<EpisodeRow> = {}
  if (updates.audioUrl !== undefined) row.audio_url = updates.audioUrl
  if (updates.title !== undefined) row.title = updates.title
  if (updates.description !== undefined) {
    row.description = updates.description
  }
  if (updates.publishedAt !== undefined) {
    row.published_at = serializeDate(updates.publishedAt)
  }
  if (updates.duration !== undefined) row.duration = updates.duration
  if (updates.artworkUrl !== undefined) row.artwork_url = updates.artworkUrl
  if (Object.keys(row).length === 0) return false

  const updated = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ subscription_id: subscriptionId, guid })
    .update(row)
  return updated > 0
}

/**
 * Writes playback state
 *
 * `lastPlayedAt` and `lastSyncedAt` are only written when given.
 */
export async function updateEpisodeProgress(
  this: DatabaseService,
  id: number,
  update: EpisodeProgressUpdate,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const row: Partial<EpisodeRow> = {
    position: update.position,
    played: update.played,
    needs_sync: update.needsSync,
  }
  if (update.lastPlayedAt !== undefined) {
    row.last_played_at = serializeDate(update.lastPlayedAt)
  }
  if (update.lastSyncedAt !== undefined) {
    row.last_synced_at = serializeDate(update.lastSyncedAt)
  }

  const updated = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ id })
    .update(row)
  return updated > 0
}

/**
 * Records a confirmed upload: advances last-synced and optionally clears the
 * dirty flag, without touching playback state.
 */
export async function markEpisodeSynced(
  this: DatabaseService,
  id: number,
  lastSyncedAt: Date,
  clearDirty: boolean,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const row: Partial<EpisodeRow> = {
    last_synced_at: serializeDate(lastSyncedAt),
  }
  if (clearDirty) row.needs_sync = false

  const updated = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ id })
    .update(row)
  return updated > 0
}

export async function setEpisodeRemoteId(
  this: DatabaseService,
  id: number,
  remoteId: string,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const updated = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ id })
    .update({ remote_id: remoteId })
  return updated > 0
}

/**
 * Episodes of a subscription that have an audio URL but no remote ID yet
 */
export async function getEpisodesMissingRemoteId(
  this: DatabaseService,
  subscriptionId: number,
  trx?: Knex.Transaction,
): Promise<Episode[]> {
  const rows = await (trx ?? this.knex)<EpisodeRow>('episodes')
    .where({ subscription_id: subscriptionId })
    .whereNull('remote_id')
    .whereNotNull('audio_url')
  return rows.map(mapEpisodeRow)
}

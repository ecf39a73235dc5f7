import type {
  Episode,
  PendingAction,
  Playlist,
  PlaylistItem,
  QueueItem,
  QueuePendingOp,
  ServerConfiguration,
  Subscription,
  SyncProtocol,
  SyncState,
  SyncStatus,
} from '@root/types/library.types.js'
import { parseDate } from '@utils/date-serializer.js'

// SQLite hands booleans back as 0/1
type DbBoolean = boolean | number

export interface SubscriptionRow {
  id: number
  feed_url: string
  remote_id: string | null
  subscribed: DbBoolean
  needs_sync: DbBoolean
  title: string | null
  author: string | null
  description: string | null
  artwork_url: string | null
  last_refreshed_at: string | null
  created_at: string
  updated_at: string
}

export interface EpisodeRow {
  id: number
  subscription_id: number
  guid: string
  remote_id: string | null
  audio_url: string | null
  title: string | null
  description: string | null
  published_at: string | null
  duration: number | null
  artwork_url: string | null
  position: number
  played: DbBoolean
  last_played_at: string | null
  last_synced_at: string | null
  needs_sync: DbBoolean
}

export interface PendingActionRow {
  id: number
  episode_id: number
  remote_episode_id: string | null
  position: number
  duration: number | null
  completed: DbBoolean
  created_at: string
  synced: DbBoolean
  synced_at: string | null
}

export interface SyncStateRow {
  id: number
  status: string
  last_error: string | null
  last_subscription_sync_at: string | null
  last_progress_sync_at: string | null
  last_full_sync_at: string | null
  last_sync_attempt_at: string | null
  subscription_cursor: string | null
  progress_cursor: string | null
  total_syncs: number
  failed_syncs: number
}

export interface ServerConfigurationRow {
  id: number
  server_url: string | null
  protocol: string | null
  username: string | null
  session_token: string | null
  is_authenticated: DbBoolean
  updated_at: string | null
}

export interface QueueItemRow {
  id: number
  episode_id: number
  remote_id: string | null
  position: number
  pending_op: string | null
}

export interface PlaylistRow {
  id: number
  remote_id: string | null
  name: string
  description: string | null
  needs_sync: DbBoolean
  deleted: DbBoolean
  created_at: string
  updated_at: string
}

export interface PlaylistItemRow {
  id: number
  playlist_id: number
  remote_id: string
  episode_id: number | null
  position: number
}

export function mapSubscriptionRow(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    feedUrl: row.feed_url,
    remoteId: row.remote_id,
    subscribed: Boolean(row.subscribed),
    needsSync: Boolean(row.needs_sync),
    title: row.title,
    author: row.author,
    description: row.description,
    artworkUrl: row.artwork_url,
    lastRefreshedAt: parseDate(row.last_refreshed_at),
    createdAt: parseDate(row.created_at) ?? new Date(0),
    updatedAt: parseDate(row.updated_at) ?? new Date(0),
  }
}

export function mapEpisodeRow(row: EpisodeRow): Episode {
  return {
    id: row.id,
    subscriptionId: row.subscription_id,
    guid: row.guid,
    remoteId: row.remote_id,
    audioUrl: row.audio_url,
    title: row.title,
    description: row.description,
    publishedAt: parseDate(row.published_at),
    duration: row.duration,
    artworkUrl: row.artwork_url,
    position: row.position,
    played: Boolean(row.played),
    lastPlayedAt: parseDate(row.last_played_at),
    lastSyncedAt: parseDate(row.last_synced_at),
    needsSync: Boolean(row.needs_sync),
  }
}

export function mapPendingActionRow(row: PendingActionRow): PendingAction {
  return {
    id: row.id,
    episodeId: row.episode_id,
    remoteEpisodeId: row.remote_episode_id,
    position: row.position,
    duration: row.duration,
    completed: Boolean(row.completed),
    createdAt: parseDate(row.created_at) ?? new Date(0),
    synced: Boolean(row.synced),
    syncedAt: parseDate(row.synced_at),
  }
}

const SYNC_STATUSES: readonly SyncStatus[] = ['idle', 'running', 'failed']

function toSyncStatus(value: string): SyncStatus {
  return SYNC_STATUSES.find((status) => status === value) ?? 'idle'
}

export function mapSyncStateRow(row: SyncStateRow): SyncState {
  return {
    status: toSyncStatus(row.status),
    lastError: row.last_error,
    lastSubscriptionSyncAt: parseDate(row.last_subscription_sync_at),
    lastProgressSyncAt: parseDate(row.last_progress_sync_at),
    lastFullSyncAt: parseDate(row.last_full_sync_at),
    lastSyncAttemptAt: parseDate(row.last_sync_attempt_at),
    subscriptionCursor: row.subscription_cursor,
    progressCursor: row.progress_cursor,
    totalSyncs: row.total_syncs,
    failedSyncs: row.failed_syncs,
  }
}

function toProtocol(value: string | null): SyncProtocol | null {
  return value === 'gpodder' || value === 'podcast-service' ? value : null
}

export function mapServerConfigurationRow(
  row: ServerConfigurationRow,
): ServerConfiguration {
  return {
    serverUrl: row.server_url,
    protocol: toProtocol(row.protocol),
    username: row.username,
    sessionToken: row.session_token,
    isAuthenticated: Boolean(row.is_authenticated),
  }
}

function toPendingOp(value: string | null): QueuePendingOp | null {
  return value === 'add' || value === 'remove' || value === 'move'
    ? value
    : null
}

export function mapQueueItemRow(row: QueueItemRow): QueueItem {
  return {
    id: row.id,
    episodeId: row.episode_id,
    remoteId: row.remote_id,
    position: row.position,
    pendingOp: toPendingOp(row.pending_op),
  }
}

export function mapPlaylistRow(row: PlaylistRow): Playlist {
  return {
    id: row.id,
    remoteId: row.remote_id,
    name: row.name,
    description: row.description,
    needsSync: Boolean(row.needs_sync),
    deleted: Boolean(row.deleted),
  }
}

export function mapPlaylistItemRow(row: PlaylistItemRow): PlaylistItem {
  return {
    id: row.id,
    playlistId: row.playlist_id,
    remoteId: row.remote_id,
    episodeId: row.episode_id,
    position: row.position,
  }
}

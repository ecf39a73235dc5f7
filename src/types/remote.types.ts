import type { SyncError } from '@root/types/errors.js'
import type { SyncProtocol } from '@root/types/library.types.js'

/**
 * Subscription changes since a cursor, normalized from either a delta log or
 * a full snapshot.
 */
export interface SubscriptionDelta {
  added: string[]
  removed: string[]
  /** Remote identifiers keyed by feed URL, where the server has them */
  remoteIds: Record<string, string>
  newCursor: string | null
}

export interface SubscriptionAck {
  timestamp: number | null
}

export interface RemoteProgressRecord {
  remoteEpisodeId: string | null
  audioUrl: string | null
  position: number
  duration: number | null
  completed: boolean
  timestamp: Date
}

export interface ProgressDelta {
  records: RemoteProgressRecord[]
  newCursor: string | null
}

export interface ProgressUpload {
  actionId: number
  remoteEpisodeId: string | null
  podcastUrl: string
  audioUrl: string | null
  position: number
  duration: number | null
  completed: boolean
  timestamp: Date
}

export type ProgressUploadResult =
  | { actionId: number; ok: true }
  | { actionId: number; ok: false; error: SyncError }

export interface RemoteCapabilities {
  /** The feed URL is the server-side identity of a subscription */
  feedUrlIdentity: boolean
  /** Several progress updates can be sent in one request */
  bulkProgressUpload: boolean
}

export interface RemoteEpisode {
  remoteId: string
  audioUrl: string
}

export interface RemoteQueueItem {
  remoteId: string
  remoteEpisodeId: string
  position: number
}

export interface RemotePlaylistItem {
  remoteId: string
  remoteEpisodeId: string | null
  position: number
}

export interface RemotePlaylist {
  remoteId: string
  name: string
  description: string | null
  items: RemotePlaylistItem[]
}

export interface CollectionsClient {
  getQueue(): Promise<RemoteQueueItem[]>
  addToQueue(remoteEpisodeId: string): Promise<RemoteQueueItem>
  removeFromQueue(remoteItemId: string): Promise<void>
  reorderQueue(remoteItemIds: string[]): Promise<RemoteQueueItem[]>
  getPlaylists(): Promise<RemotePlaylist[]>
  createPlaylist(name: string, description: string | null): Promise<string>
  updatePlaylist(
    remoteId: string,
    name: string,
    description: string | null,
  ): Promise<void>
  deletePlaylist(remoteId: string): Promise<void>
}

/**
 * Abstract sync server. One implementation per wire protocol.
 */
export interface RemoteClient {
  readonly protocol: SyncProtocol
  readonly capabilities: RemoteCapabilities

  getSubscriptions(cursor: string | null): Promise<SubscriptionDelta>
  /** Idempotent. Already-present adds and already-absent removes succeed. */
  pushSubscriptionChange(
    add: string[],
    remove: string[],
  ): Promise<SubscriptionAck>
  /** Returns the server identifier of the subscription, when it issues one */
  subscribe(feedUrl: string): Promise<string | null>
  unsubscribe(remoteId: string): Promise<void>
  /** Best effort */
  refreshFeed(remoteId: string): Promise<void>

  getProgress(cursor: string | null): Promise<ProgressDelta>
  pushProgress(uploads: ProgressUpload[]): Promise<ProgressUploadResult[]>

  listEpisodes?(remoteSubscriptionId: string): Promise<RemoteEpisode[]>
  readonly collections?: CollectionsClient
}

export interface RemoteClientOptions {
  serverUrl: string
  username: string
  sessionToken: string
  deviceId: string
  requestTimeoutMs: number
}

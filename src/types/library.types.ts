export type SyncProtocol = 'gpodder' | 'podcast-service'

export interface Subscription {
  id: number
  feedUrl: string
  remoteId: string | null
  subscribed: boolean
  /** Local change not yet confirmed by the server */
  needsSync: boolean
  title: string | null
  author: string | null
  description: string | null
  artworkUrl: string | null
  lastRefreshedAt: Date | null
  createdAt: Date
  updatedAt: Date
}

export interface Episode {
  id: number
  subscriptionId: number
  guid: string
  remoteId: string | null
  audioUrl: string | null
  title: string | null
  description: string | null
  publishedAt: Date | null
  /** Seconds */
  duration: number | null
  artworkUrl: string | null
  /** Seconds */
  position: number
  played: boolean
  lastPlayedAt: Date | null
  lastSyncedAt: Date | null
  needsSync: boolean
}

export interface PendingAction {
  id: number
  episodeId: number
  remoteEpisodeId: string | null
  position: number
  duration: number | null
  completed: boolean
  createdAt: Date
  synced: boolean
  syncedAt: Date | null
}

/**
 * A pending action joined with what an upload needs to address it on the
 * server.
 */
export interface PendingUpload extends PendingAction {
  episodeRemoteId: string | null
  audioUrl: string | null
  feedUrl: string
}

export type SyncStatus = 'idle' | 'running' | 'failed'

export interface SyncState {
  status: SyncStatus
  lastError: string | null
  lastSubscriptionSyncAt: Date | null
  lastProgressSyncAt: Date | null
  lastFullSyncAt: Date | null
  lastSyncAttemptAt: Date | null
  subscriptionCursor: string | null
  progressCursor: string | null
  totalSyncs: number
  failedSyncs: number
}

export interface ServerConfiguration {
  serverUrl: string | null
  protocol: SyncProtocol | null
  username: string | null
  sessionToken: string | null
  isAuthenticated: boolean
}

/** A server configuration that a pass can run against */
export interface ActiveSession {
  serverUrl: string
  protocol: SyncProtocol
  username: string
  sessionToken: string
}

export type QueuePendingOp = 'add' | 'remove' | 'move'

export interface QueueItem {
  id: number
  episodeId: number
  remoteId: string | null
  position: number
  pendingOp: QueuePendingOp | null
}

export interface Playlist {
  id: number
  remoteId: string | null
  name: string
  description: string | null
  needsSync: boolean
  deleted: boolean
}

export interface PlaylistItem {
  id: number
  playlistId: number
  remoteId: string
  episodeId: number | null
  position: number
}

export interface NewEpisode {
  guid: string
  audioUrl: string | null
  title: string | null
  description: string | null
  publishedAt: Date | null
  duration: number | null
  artworkUrl: string | null
}

export interface PodcastMetadata {
  title: string | null
  author: string | null
  description: string | null
  artworkUrl: string | null
}

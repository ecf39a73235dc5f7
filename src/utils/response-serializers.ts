import type {
  EpisodeResponse,
  SubscriptionResponse,
} from '@schemas/library/subscriptions.schema.js'
import type { SyncStatusResponse } from '@schemas/sync/sync.schema.js'
import type {
  Episode,
  Playlist,
  QueueItem,
  Subscription,
  SyncState,
} from '@root/types/library.types.js'
import type { SyncStatusEvent } from '@root/types/sync.types.js'
import { serializeDate } from '@utils/date-serializer.js'

export function serializeSubscription(
  subscription: Subscription,
): SubscriptionResponse {
  return {
    id: subscription.id,
    feedUrl: subscription.feedUrl,
    subscribed: subscription.subscribed,
    needsSync: subscription.needsSync,
    title: subscription.title,
    author: subscription.author,
    description: subscription.description,
    artworkUrl: subscription.artworkUrl,
    lastRefreshedAt: serializeDate(subscription.lastRefreshedAt),
  }
}

export function serializeEpisode(episode: Episode): EpisodeResponse {
  return {
    id: episode.id,
    subscriptionId: episode.subscriptionId,
    guid: episode.guid,
    audioUrl: episode.audioUrl,
    title: episode.title,
    publishedAt: serializeDate(episode.publishedAt),
    duration: episode.duration,
    position: episode.position,
    played: episode.played,
    lastPlayedAt: serializeDate(episode.lastPlayedAt),
  }
}

export function serializeQueueItem(item: QueueItem) {
  return {
    id: item.id,
    episodeId: item.episodeId,
    position: item.position,
    pendingOp: item.pendingOp,
  }
}

export function serializePlaylist(playlist: Playlist) {
  return {
    id: playlist.id,
    name: playlist.name,
    description: playlist.description,
    needsSync: playlist.needsSync,
  }
}

export function serializeStatusEvent(
  event: SyncStatusEvent,
): SyncStatusResponse['current'] {
  return {
    state: event.state,
    message: event.message,
    at: event.at.toISOString(),
  }
}

/**
 * Cursors stay server-side detail and are left out
 */
export function serializeSyncState(
  state: SyncState,
): SyncStatusResponse['state'] {
  return {
    status: state.status,
    lastError: state.lastError,
    lastSubscriptionSyncAt: serializeDate(state.lastSubscriptionSyncAt),
    lastProgressSyncAt: serializeDate(state.lastProgressSyncAt),
    lastFullSyncAt: serializeDate(state.lastFullSyncAt),
    lastSyncAttemptAt: serializeDate(state.lastSyncAttemptAt),
    totalSyncs: state.totalSyncs,
    failedSyncs: state.failedSyncs,
  }
}

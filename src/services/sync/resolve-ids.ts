import type {
  ActiveSession,
  PendingUpload,
  ServerConfiguration,
  Subscription,
} from '@root/types/library.types.js'
import type { RemoteCapabilities } from '@root/types/remote.types.js'

/**
 * The identifier the server knows a subscription by: its remote ID, or the
 * feed URL on protocols keyed by URL. Null means the server never learned of
 * the subscription.
 */
export function resolveRemoteSubscriptionId(
  subscription: Pick<Subscription, 'remoteId' | 'feedUrl'>,
  capabilities: RemoteCapabilities,
): string | null {
  if (subscription.remoteId) return subscription.remoteId
  return capabilities.feedUrlIdentity ? subscription.feedUrl : null
}

/**
 * The episode's current remote ID, falling back to the one captured when the
 * action was recorded
 */
export function resolveRemoteEpisodeId(
  upload: Pick<PendingUpload, 'episodeRemoteId' | 'remoteEpisodeId'>,
): string | null {
  return upload.episodeRemoteId ?? upload.remoteEpisodeId
}

/**
 * The session a pass can run against, or null when not logged in
 */
export function resolveActiveSession(
  config: ServerConfiguration,
): ActiveSession | null {
  if (
    !config.isAuthenticated ||
    !config.serverUrl ||
    !config.protocol ||
    !config.username ||
    !config.sessionToken
  ) {
    return null
  }
  return {
    serverUrl: config.serverUrl,
    protocol: config.protocol,
    username: config.username,
    sessionToken: config.sessionToken,
  }
}

import type { Subscription } from '@root/types/library.types.js'
import type { SubscriptionUpdate } from '@services/database/methods/subscriptions.js'

/**
 * Local change implied by a remote add of a known feed, or null when the row
 * already agrees
 */
export function mergeRemoteAdd(
  local: Subscription,
  remoteId: string | null,
): SubscriptionUpdate | null {
  const update: SubscriptionUpdate = {}
  if (remoteId && local.remoteId !== remoteId) update.remoteId = remoteId

  if (local.subscribed) {
    // The server already has it: a pending local subscribe is confirmed
    if (local.needsSync) update.needsSync = false
  } else if (!local.needsSync) {
    update.subscribed = true
  }

  return Object.keys(update).length > 0 ? update : null
}

import type { Episode } from '@root/types/library.types.js'
import type { RemoteProgressRecord } from '@root/types/remote.types.js'

export type ProgressWinner = 'remote' | 'local'

/**
 * Last-write-wins on the remote record's timestamp against the episode's
 * last-synced timestamp. An episode that never synced takes the remote value;
 * equal timestamps go to the remote side so both replicas converge.
 */
export function resolveProgressConflict(
  local: Pick<Episode, 'lastSyncedAt'>,
  remote: Pick<RemoteProgressRecord, 'timestamp'>,
): ProgressWinner {
  if (local.lastSyncedAt === null) return 'remote'
  return remote.timestamp.getTime() >= local.lastSyncedAt.getTime()
    ? 'remote'
    : 'local'
}

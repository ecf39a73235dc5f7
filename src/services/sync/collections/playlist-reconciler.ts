/**
 * Playlist Reconciler
 *
 * Pushes local playlist creates, renames and deletes, then mirrors the
 * server's playlists and their items read-only.
 */
import { attempt } from '@root/types/errors.js'
import type { Playlist } from '@root/types/library.types.js'
import type {
  CollectionsClient,
  RemotePlaylist,
} from '@root/types/remote.types.js'
import type { PlaylistItemEntry } from '@services/database/methods/playlists.js'
import {
  settleBoundary,
  settleRecord,
} from '@services/sync/error-policy.js'
import type { PhaseContext } from '@services/sync/phase-context.js'
import type { Knex } from 'knex'

export interface PlaylistSummary {
  playlists: number
  failedPushes: number
}

/**
 * @returns null when the server's playlists could not be read and the mirror
 * step was skipped
 * @throws SyncError when the pass must abort
 */
export async function reconcilePlaylists(
  ctx: PhaseContext,
  collections: CollectionsClient,
): Promise<PlaylistSummary | null> {
  let failedPushes = 0
  for (const playlist of await ctx.db.getPlaylists(true)) {
    if (!(await pushPlaylist(ctx, collections, playlist))) failedPushes++
  }

  const remotePlaylists = settleBoundary(
    await attempt(() => collections.getPlaylists(), 'Fetching playlists'),
    ctx.log,
    'playlists',
  )
  if (!remotePlaylists) return null

  await ctx.db.withTransaction(async (trx) => {
    const remoteIds = new Set<string>()
    for (const remote of remotePlaylists) {
      remoteIds.add(remote.remoteId)
      await mirrorPlaylist(ctx, remote, trx)
    }

    // Gone on the server and nothing local waiting to be pushed
    for (const local of await ctx.db.getPlaylists(true, trx)) {
      if (
        local.remoteId &&
        !remoteIds.has(local.remoteId) &&
        !local.needsSync &&
        !local.deleted
      ) {
        await ctx.db.deletePlaylist(local.id, trx)
      }
    }
  })

  return { playlists: remotePlaylists.length, failedPushes }
}

/**
 * @returns false when the change stays pending
 */
async function pushPlaylist(
  ctx: PhaseContext,
  collections: CollectionsClient,
  playlist: Playlist,
): Promise<boolean> {
  const context = { playlistId: playlist.id, name: playlist.name }
  const remoteId = playlist.remoteId

  if (playlist.deleted) {
    if (remoteId) {
      const outcome = settleRecord(
        await attempt(() => collections.deletePlaylist(remoteId)),
        ctx.log,
        context,
        'Failed to push playlist deletion',
      )
      if (outcome === 'skipped') return false
    }
    await ctx.db.deletePlaylist(playlist.id)
    return true
  }

  if (!remoteId) {
    const result = await attempt(() =>
      collections.createPlaylist(playlist.name, playlist.description),
    )
    const outcome = settleRecord(
      result,
      ctx.log,
      context,
      'Failed to push new playlist',
    )
    if (outcome === 'skipped' || !result.ok) return false
    await ctx.db.updatePlaylist(playlist.id, {
      remoteId: result.value,
      needsSync: false,
    })
    return true
  }

  if (!playlist.needsSync) return true

  const outcome = settleRecord(
    await attempt(() =>
      collections.updatePlaylist(remoteId, playlist.name, playlist.description),
    ),
    ctx.log,
    context,
    'Failed to push playlist rename',
  )
  if (outcome === 'skipped') return false
  await ctx.db.updatePlaylist(playlist.id, { needsSync: false })
  return true
}

async function mirrorPlaylist(
  ctx: PhaseContext,
  remote: RemotePlaylist,
  trx: Knex.Transaction,
): Promise<void> {
  let local = await ctx.db.getPlaylistByRemoteId(remote.remoteId, trx)
  if (!local) {
    local = await ctx.db.insertPlaylist(
      {
        name: remote.name,
        description: remote.description,
        remoteId: remote.remoteId,
        needsSync: false,
      },
      trx,
    )
  } else if (local.deleted) {
    return
  } else if (!local.needsSync) {
    await ctx.db.updatePlaylist(
      local.id,
      { name: remote.name, description: remote.description },
      trx,
    )
  }

  const items: PlaylistItemEntry[] = []
  for (const item of [...remote.items].sort((a, b) => a.position - b.position)) {
    const episode = item.remoteEpisodeId
      ? await ctx.db.findEpisodeByRemoteId(item.remoteEpisodeId, trx)
      : null
    items.push({
      remoteId: item.remoteId,
      episodeId: episode?.id ?? null,
      position: items.length,
    })
  }
  await ctx.db.replacePlaylistItems(local.id, items, trx)
}

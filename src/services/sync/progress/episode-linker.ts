import { attempt } from '@root/types/errors.js'
import { settleRecord } from '@services/sync/error-policy.js'
import type { PhaseContext } from '@services/sync/phase-context.js'

/**
 * Gives local episodes the server's episode IDs, matched by enclosure URL.
 * Only runs on servers that list episodes; per-subscription failures are
 * skipped.
 *
 * @returns Number of episodes linked
 */
export async function linkEpisodeIds(ctx: PhaseContext): Promise<number> {
  const { remote } = ctx
  if (!remote.listEpisodes) return 0
  const listEpisodes = remote.listEpisodes.bind(remote)

  let linked = 0
  const subscriptions = await ctx.db.getSubscriptions({ subscribed: true })
  for (const subscription of subscriptions) {
    const remoteId = subscription.remoteId
    if (!remoteId) continue

    const missing = await ctx.db.getEpisodesMissingRemoteId(subscription.id)
    if (missing.length === 0) continue

    const result = await attempt(() => listEpisodes(remoteId))
    if (!result.ok) {
      settleRecord(
        result,
        ctx.log,
        { feedUrl: subscription.feedUrl, remoteId },
        'Could not list server episodes',
      )
      continue
    }

    const byAudioUrl = new Map(
      result.value.map((episode) => [episode.audioUrl, episode.remoteId]),
    )
    linked += await ctx.db.withTransaction(async (trx) => {
      let count = 0
      for (const episode of missing) {
        const episodeRemoteId = episode.audioUrl
          ? byAudioUrl.get(episode.audioUrl)
          : undefined
        if (!episodeRemoteId) continue
        await ctx.db.setEpisodeRemoteId(episode.id, episodeRemoteId, trx)
        count++
      }
      return count
    })
  }

  if (linked > 0) ctx.log.info({ linked }, 'Linked episodes to server IDs')
  return linked
}

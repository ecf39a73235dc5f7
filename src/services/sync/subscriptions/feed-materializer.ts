/**
 * Feed Materializer
 *
 * Turns remote-added feed URLs into local subscriptions: fetches each feed
 * with bounded concurrency and stores the subscription (not dirty) with its
 * episodes in one transaction per feed.
 *
 * Local writers are not locked out while feeds download, so a feed may have
 * been subscribed locally in the meantime. That row is merged as a remote add
 * of a known feed instead of inserted again.
 */
import { attempt } from '@root/types/errors.js'
import { settleRecord } from '@services/sync/error-policy.js'
import type { PhaseContext } from '@services/sync/phase-context.js'
import { mergeRemoteAdd } from '@services/sync/subscriptions/merge-remote-add.js'
import pLimit from 'p-limit'

export interface MaterializeResult {
  materialized: number
  failed: number
}

export async function materializeFeeds(
  ctx: PhaseContext,
  feedUrls: string[],
  remoteIds: Record<string, string>,
): Promise<MaterializeResult> {
  if (feedUrls.length === 0) return { materialized: 0, failed: 0 }

  const limit = pLimit(ctx.settings.feedConcurrency)
  const outcomes = await Promise.all(
    feedUrls.map((feedUrl) =>
      limit(async () => {
        const parsed = await attempt(
          () => ctx.feeds.parseFeed(feedUrl),
          `Fetching ${feedUrl}`,
        )
        if (!parsed.ok) {
          settleRecord(parsed, ctx.log, { feedUrl }, 'Could not fetch new feed')
          return false
        }

        const feed = parsed.value
        const remoteId = remoteIds[feedUrl] ?? null
        const inserted = await ctx.db.withTransaction(async (trx) => {
          const existing = await ctx.db.getSubscriptionByFeedUrl(feedUrl, trx)
          if (existing) {
            const update = mergeRemoteAdd(existing, remoteId)
            if (update) {
              await ctx.db.updateSubscription(existing.id, update, trx)
            }
            return ctx.db.insertEpisodes(existing.id, feed.episodes, trx)
          }

          const subscription = await ctx.db.insertSubscription(
            {
              feedUrl,
              remoteId,
              subscribed: true,
              needsSync: false,
              metadata: {
                title: feed.title,
                author: feed.author,
                description: feed.description,
                artworkUrl: feed.artworkUrl,
              },
              lastRefreshedAt: new Date(),
            },
            trx,
          )
          return ctx.db.insertEpisodes(subscription.id, feed.episodes, trx)
        })

        ctx.log.info(
          { feedUrl, episodes: inserted },
          'Materialized remote subscription',
        )
        return true
      }),
    ),
  ).catch((error: unknown) => {
    // Pass is aborting; drop feeds not started yet
    limit.clearQueue()
    throw error
  })

  const materialized = outcomes.filter(Boolean).length
  return { materialized, failed: outcomes.length - materialized }
}

/**
 * Subscription Reconciler
 *
 * Merges the server's subscription delta into the local store, then pushes
 * local changes the server has not confirmed.
 *
 * Responsible for:
 * - Materializing remote adds that are unknown locally
 * - Applying remote removals to subscribed rows
 * - Pushing dirty local subscribes and unsubscribes, one record at a time
 * - Deciding whether the subscription cursor may advance
 *
 * A remote add never overrides an unpushed local unsubscribe: snapshot
 * protocols report every server-side subscription as added, so doing so
 * would revert the unsubscribe before it is pushed.
 */
import { attempt } from '@root/types/errors.js'
import type { Subscription } from '@root/types/library.types.js'
import type { SubscriptionPhaseSummary } from '@root/types/sync.types.js'
import {
  settleBoundary,
  settleRecord,
} from '@services/sync/error-policy.js'
import type {
  PhaseContext,
  PhaseResult,
} from '@services/sync/phase-context.js'
import { resolveRemoteSubscriptionId } from '@services/sync/resolve-ids.js'
import { materializeFeeds } from '@services/sync/subscriptions/feed-materializer.js'
import { mergeRemoteAdd } from '@services/sync/subscriptions/merge-remote-add.js'

export function emptySubscriptionSummary(): SubscriptionPhaseSummary {
  return {
    materialized: 0,
    materializeFailed: 0,
    remoteRemoved: 0,
    pushedAdds: 0,
    pushedRemoves: 0,
    failedPushes: 0,
    linkedEpisodes: 0,
  }
}

/**
 * Runs one subscription reconciliation.
 *
 * @returns The summary and the cursor to persist (null when it must not
 * advance), or null when the server does not support the phase
 * @throws SyncError when the pass must abort
 */
export async function reconcileSubscriptions(
  ctx: PhaseContext,
  cursor: string | null,
): Promise<PhaseResult<SubscriptionPhaseSummary>> {
  const delta = settleBoundary(
    await attempt(
      () => ctx.remote.getSubscriptions(cursor),
      'Fetching subscriptions',
    ),
    ctx.log,
    'subscriptions',
  )
  if (!delta) return null

  const summary = emptySubscriptionSummary()
  const added = new Set(delta.added)

  // Merge remote state
  const toMaterialize = await ctx.db.withTransaction(async (trx) => {
    const byUrl = new Map(
      (await ctx.db.getSubscriptions({}, trx)).map((sub) => [sub.feedUrl, sub]),
    )
    const unknown: string[] = []

    for (const feedUrl of added) {
      const local = byUrl.get(feedUrl)
      if (!local) {
        unknown.push(feedUrl)
        continue
      }
      const update = mergeRemoteAdd(local, delta.remoteIds[feedUrl] ?? null)
      if (update) await ctx.db.updateSubscription(local.id, update, trx)
    }

    for (const feedUrl of delta.removed) {
      if (added.has(feedUrl)) continue
      const local = byUrl.get(feedUrl)
      if (!local?.subscribed) continue
      await ctx.db.updateSubscription(
        local.id,
        { subscribed: false, needsSync: false },
        trx,
      )
      summary.remoteRemoved++
    }

    return unknown
  })

  const materialized = await materializeFeeds(
    ctx,
    toMaterialize,
    delta.remoteIds,
  )
  summary.materialized = materialized.materialized
  summary.materializeFailed = materialized.failed

  // Push local changes
  const dirty = await ctx.db.getSubscriptions({ needsSync: true })
  for (const subscription of dirty) {
    if (subscription.subscribed) {
      if (added.has(subscription.feedUrl)) continue
      await pushSubscribe(ctx, subscription, summary)
    } else {
      await pushUnsubscribe(ctx, subscription, summary)
    }
  }

  ctx.log.info(summary, 'Subscription reconciliation finished')

  // A feed that failed to materialize must show up in the next delta again
  return {
    summary,
    newCursor: summary.materializeFailed === 0 ? delta.newCursor : null,
  }
}

async function pushSubscribe(
  ctx: PhaseContext,
  subscription: Subscription,
  summary: SubscriptionPhaseSummary,
): Promise<void> {
  const result = await attempt(() => ctx.remote.subscribe(subscription.feedUrl))
  const outcome = settleRecord(
    result,
    ctx.log,
    { feedUrl: subscription.feedUrl },
    'Failed to push subscribe',
  )
  if (outcome === 'skipped') {
    summary.failedPushes++
    return
  }

  const remoteId = result.ok ? result.value : null
  await ctx.db.updateSubscription(subscription.id, {
    needsSync: false,
    ...(remoteId ? { remoteId } : {}),
  })
  summary.pushedAdds++
}

async function pushUnsubscribe(
  ctx: PhaseContext,
  subscription: Subscription,
  summary: SubscriptionPhaseSummary,
): Promise<void> {
  const remoteId = resolveRemoteSubscriptionId(
    subscription,
    ctx.remote.capabilities,
  )

  if (remoteId) {
    const outcome = settleRecord(
      await attempt(() => ctx.remote.unsubscribe(remoteId)),
      ctx.log,
      { feedUrl: subscription.feedUrl, remoteId },
      'Failed to push unsubscribe',
    )
    if (outcome === 'skipped') {
      summary.failedPushes++
      return
    }
  } else {
    ctx.log.debug(
      { feedUrl: subscription.feedUrl },
      'Subscription never reached the server, nothing to remove',
    )
  }

  await ctx.db.updateSubscription(subscription.id, { needsSync: false })
  summary.pushedRemoves++
}

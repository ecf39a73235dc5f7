import type {
  PodcastMetadata,
  Subscription,
} from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import {
  mapSubscriptionRow,
  type SubscriptionRow,
} from '@services/database/rows.js'
import { serializeDate } from '@utils/date-serializer.js'
import type { Knex } from 'knex'

export interface SubscriptionFilter {
  subscribed?: boolean
  needsSync?: boolean
}

export interface NewSubscription {
  feedUrl: string
  remoteId?: string | null
  subscribed: boolean
  needsSync: boolean
  metadata: PodcastMetadata
  lastRefreshedAt?: Date | null
}

export type SubscriptionUpdate = Partial<
  Pick<
    Subscription,
    | 'remoteId'
    | 'subscribed'
    | 'needsSync'
    | 'title'
    | 'author'
    | 'description'
    | 'artworkUrl'
    | 'lastRefreshedAt'
  >
>

/**
 * Retrieves a subscription by its feed URL
 */
export async function getSubscriptionByFeedUrl(
  this: DatabaseService,
  feedUrl: string,
  trx?: Knex.Transaction,
): Promise<Subscription | null> {
  const row = await (trx ?? this.knex)<SubscriptionRow>('subscriptions')
    .where({ feed_url: feedUrl })
    .first()
  return row ? mapSubscriptionRow(row) : null
}

export async function getSubscriptionById(
  this: DatabaseService,
  id: number,
  trx?: Knex.Transaction,
): Promise<Subscription | null> {
  const row = await (trx ?? this.knex)<SubscriptionRow>('subscriptions')
    .where({ id })
    .first()
  return row ? mapSubscriptionRow(row) : null
}

/**
 * Lists subscriptions matching the given flags, ordered by title then URL
 *
 * @param filter - Omitted flags are not filtered on
 */
export async function getSubscriptions(
  this: DatabaseService,
  filter: SubscriptionFilter = {},
  trx?: Knex.Transaction,
): Promise<Subscription[]> {
  const query = (trx ?? this.knex)<SubscriptionRow>('subscriptions')
  if (filter.subscribed !== undefined) {
    query.where('subscribed', filter.subscribed)
  }
  if (filter.needsSync !== undefined) {
    query.where('needs_sync', filter.needsSync)
  }
  const rows = await query.orderBy([
    { column: 'title', order: 'asc' },
    { column: 'feed_url', order: 'asc' },
  ])
  return rows.map(mapSubscriptionRow)
}

/**
 * Inserts a subscription row
 *
 * @returns The stored subscription
 * @throws When a subscription with the same feed URL already exists
 */
export async function insertSubscription(
  this: DatabaseService,
  data: NewSubscription,
  trx?: Knex.Transaction,
): Promise<Subscription> {
  const db = trx ?? this.knex
  const now = this.timestamp
  const [id] = await db<SubscriptionRow>('subscriptions').insert({
    feed_url: data.feedUrl,
    remote_id: data.remoteId ?? null,
    subscribed: data.subscribed,
    needs_sync: data.needsSync,
    title: data.metadata.title,
    author: data.metadata.author,
    description: data.metadata.description,
    artwork_url: data.metadata.artworkUrl,
    last_refreshed_at: serializeDate(data.lastRefreshedAt),
    created_at: now,
    updated_at: now,
  })

  const row = await db<SubscriptionRow>('subscriptions').where({ id }).first()
  if (!row) {
    throw new Error(`Failed to create subscription for ${data.feedUrl}`)
  }
  return mapSubscriptionRow(row)
}

/**
 * Applies a partial update to a subscription
 *
 * @returns Whether a row was updated
 */
export async function updateSubscription(
  this: DatabaseService,
  id: number,
  updates: SubscriptionUpdate,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const row: Partial<SubscriptionRow> = { updated_at: this.timestamp }
  if (updates.remoteId !== undefined) row.remote_id = updates.remoteId
  if (updates.subscribed !== undefined) row.subscribed = updates.subscribed
  if (updates.needsSync !== undefined) row.needs_sync = updates.needsSync
  if (updates.title !== undefined) row.title = updates.title
  if (updates.author !== undefined) row.author = updates.author
  if (updates.description !== undefined) {
    row.description = updates.description
  }
  if (updates.artworkUrl !== undefined) row.artwork_url = updates.artworkUrl
  if (updates.lastRefreshedAt !== undefined) {
    row.last_refreshed_at = serializeDate(updates.lastRefreshedAt)
  }

  const updated = await (trx ?? this.knex)<SubscriptionRow>('subscriptions')
    .where({ id })
    .update(row)
  return updated > 0
}

/**
 * Hard-deletes a subscription; its episodes and their pending actions go
 * with it through the foreign key cascade.
 */
export async function deleteSubscription(
  this: DatabaseService,
  id: number,
  trx?: Knex.Transaction,
): Promise<boolean> {
  const deleted = await (trx ?? this.knex)<SubscriptionRow>('subscriptions')
    .where({ id })
    .delete()
  return deleted > 0
}

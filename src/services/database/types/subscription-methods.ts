import type { Subscription } from '@root/types/library.types.js'
import type {
  NewSubscription,
  SubscriptionFilter,
  SubscriptionUpdate,
} from '@services/database/methods/subscriptions.js'
import type { Knex } from 'knex'

declare module '../../database.service.js' {
  interface DatabaseService {
    // SUBSCRIPTION METHODS
    /**
     * Retrieves a subscription by its feed URL
     * @returns The subscription, or null when the URL is unknown
     */
    getSubscriptionByFeedUrl(
      feedUrl: string,
      trx?: Knex.Transaction,
    ): Promise<Subscription | null>

    getSubscriptionById(
      id: number,
      trx?: Knex.Transaction,
    ): Promise<Subscription | null>

    /**
     * Lists subscriptions matching the given flags
     */
    getSubscriptions(
      filter?: SubscriptionFilter,
      trx?: Knex.Transaction,
    ): Promise<Subscription[]>

    /**
     * Inserts a subscription row
     * @throws When the feed URL is already stored
     */
    insertSubscription(
      data: NewSubscription,
      trx?: Knex.Transaction,
    ): Promise<Subscription>

    updateSubscription(
      id: number,
      updates: SubscriptionUpdate,
      trx?: Knex.Transaction,
    ): Promise<boolean>

    /**
     * Hard-deletes a subscription with its episodes and pending actions
     */
    deleteSubscription(id: number, trx?: Knex.Transaction): Promise<boolean>
  }
}

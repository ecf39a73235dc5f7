/**
 * Library Service
 *
 * Local writers for the user's library. Every change lands in the local
 * store immediately, marked dirty or queued as a pending action, and is
 * pushed by the next sync pass. Nothing here needs to know whether a pass is
 * running.
 *
 * Responsible for:
 * - Subscribing, unsubscribing, refreshing and purging podcasts
 * - Recording playback progress
 * - Queue and playlist edits
 */
import { attempt, SyncError } from '@root/types/errors.js'
import type { FeedFetcher } from '@root/types/feed.types.js'
import type {
  Episode,
  PendingAction,
  Playlist,
  QueueItem,
  Subscription,
} from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import type { RemoteClientFactory } from '@services/remote/index.js'
import {
  resolveActiveSession,
  resolveRemoteSubscriptionId,
} from '@services/sync/resolve-ids.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface RecordProgressOptions {
  completed?: boolean
  /** Seconds; defaults to the episode's known duration */
  duration?: number | null
}

export interface RefreshResult {
  subscription: Subscription
  newEpisodes: number
}

export class LibraryService {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly db: DatabaseService,
    private readonly feeds: FeedFetcher,
    private readonly createClient: RemoteClientFactory,
  ) {
    this.log = createServiceLogger(baseLog, 'LIBRARY')
  }

  private async requireSubscription(feedUrl: string): Promise<Subscription> {
    const subscription = await this.db.getSubscriptionByFeedUrl(feedUrl)
    if (!subscription) {
      throw new SyncError('NotFound', `No subscription for ${feedUrl}`)
    }
    return subscription
  }

  private async requireEpisode(episodeId: number): Promise<Episode> {
    const episode = await this.db.getEpisodeById(episodeId)
    if (!episode) {
      throw new SyncError('NotFound', `Episode ${episodeId} not found`)
    }
    return episode
  }

  async listSubscriptions(subscribedOnly = true): Promise<Subscription[]> {
    return this.db.getSubscriptions(subscribedOnly ? { subscribed: true } : {})
  }

  /**
   * @throws SyncError NotFound when the subscription does not exist
   */
  async listEpisodes(subscriptionId: number): Promise<Episode[]> {
    const subscription = await this.db.getSubscriptionById(subscriptionId)
    if (!subscription) {
      throw new SyncError('NotFound', `Subscription ${subscriptionId} not found`)
    }
    return this.db.getEpisodesForSubscription(subscription.id)
  }

  /**
   * Subscribes locally. A known feed is resubscribed; a new one is fetched
   * and stored with its episodes.
   *
   * @throws SyncError when the feed cannot be fetched or parsed
   */
  async subscribe(feedUrl: string): Promise<Subscription> {
    const existing = await this.db.getSubscriptionByFeedUrl(feedUrl)
    if (existing) {
      if (existing.subscribed) return existing
      await this.db.updateSubscription(existing.id, {
        subscribed: true,
        needsSync: true,
      })
      this.log.info({ feedUrl }, 'Resubscribed to podcast')
      return this.requireSubscription(feedUrl)
    }

    const feed = await this.feeds.parseFeed(feedUrl)
    const subscriptionId = await this.db.withTransaction(async (trx) => {
      // A sync pass may have stored the feed while it downloaded
      const stored = await this.db.getSubscriptionByFeedUrl(feedUrl, trx)
      if (stored) {
        if (!stored.subscribed) {
          await this.db.updateSubscription(
            stored.id,
            { subscribed: true, needsSync: true },
            trx,
          )
        }
        await this.db.insertEpisodes(stored.id, feed.episodes, trx)
        return stored.id
      }

      const created = await this.db.insertSubscription(
        {
          feedUrl,
          subscribed: true,
          needsSync: true,
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
      await this.db.insertEpisodes(created.id, feed.episodes, trx)
      return created.id
    })

    this.log.info(
      { feedUrl, subscriptionId, episodes: feed.episodes.length },
      'Subscribed to podcast',
    )
    return this.requireSubscription(feedUrl)
  }

  /**
   * @returns Whether the subscription changed
   */
  async unsubscribe(feedUrl: string): Promise<boolean> {
    const subscription = await this.requireSubscription(feedUrl)
    if (!subscription.subscribed) return false
    await this.db.updateSubscription(subscription.id, {
      subscribed: false,
      needsSync: true,
    })
    this.log.info({ feedUrl }, 'Unsubscribed from podcast')
    return true
  }

  /**
   * Re-reads the feed, storing new episodes and updated metadata, then asks
   * the server to refresh too. The server call is best effort.
   */
  async refreshPodcast(feedUrl: string): Promise<RefreshResult> {
    const subscription = await this.requireSubscription(feedUrl)
    const feed = await this.feeds.parseFeed(feedUrl)

    const newEpisodes = await this.db.withTransaction(async (trx) => {
      await this.db.updateSubscription(
        subscription.id,
        {
          title: feed.title,
          author: feed.author,
          description: feed.description,
          artworkUrl: feed.artworkUrl,
          lastRefreshedAt: new Date(),
        },
        trx,
      )
      // Known GUIDs take the feed's current metadata, first occurrence wins
      const seen = new Set<string>()
      for (const episode of feed.episodes) {
        if (seen.has(episode.guid)) continue
        seen.add(episode.guid)
        await this.db.updateEpisodeMetadata(
          subscription.id,
          episode.guid,
          {
            audioUrl: episode.audioUrl,
            title: episode.title,
            description: episode.description,
            publishedAt: episode.publishedAt,
            duration: episode.duration,
            artworkUrl: episode.artworkUrl,
          },
          trx,
        )
      }
      return this.db.insertEpisodes(subscription.id, feed.episodes, trx)
    })

    await this.requestRemoteRefresh(subscription)
    this.log.info({ feedUrl, newEpisodes }, 'Refreshed podcast')
    return { subscription: await this.requireSubscription(feedUrl), newEpisodes }
  }

  private async requestRemoteRefresh(subscription: Subscription): Promise<void> {
    const session = resolveActiveSession(await this.db.getServerConfiguration())
    if (!session) return

    const client = this.createClient(session)
    const remoteId = resolveRemoteSubscriptionId(subscription, client.capabilities)
    if (!remoteId) return

    const result = await attempt(() => client.refreshFeed(remoteId))
    if (!result.ok) {
      this.log.warn(
        { feedUrl: subscription.feedUrl, kind: result.error.kind, error: result.error },
        'Server feed refresh failed',
      )
    }
  }

  /**
   * Stores a playback position and queues it for upload
   */
  async recordProgress(
    episodeId: number,
    position: number,
    options: RecordProgressOptions = {},
  ): Promise<PendingAction> {
    const episode = await this.requireEpisode(episodeId)
    const completed = options.completed ?? false
    const now = new Date()

    return this.db.withTransaction(async (trx) => {
      await this.db.updateEpisodeProgress(
        episode.id,
        {
          position,
          played: completed || episode.played,
          needsSync: true,
          lastPlayedAt: now,
        },
        trx,
      )
      return this.db.createPendingAction(
        {
          episodeId: episode.id,
          remoteEpisodeId: episode.remoteId,
          position,
          duration:
            options.duration === undefined ? episode.duration : options.duration,
          completed,
          createdAt: now,
        },
        trx,
      )
    })
  }

  /**
   * Deletes a subscription with its episodes and their pending actions
   */
  async purgeSubscription(feedUrl: string): Promise<void> {
    const subscription = await this.requireSubscription(feedUrl)
    await this.db.deleteSubscription(subscription.id)
    this.log.info({ feedUrl }, 'Purged podcast')
  }

  async getQueue(): Promise<QueueItem[]> {
    return this.db.getQueueItems()
  }

  async enqueue(episodeId: number): Promise<QueueItem> {
    await this.requireEpisode(episodeId)
    return this.db.addQueueItem(episodeId)
  }

  async dequeue(episodeId: number): Promise<boolean> {
    return this.db.removeQueueItem(episodeId)
  }

  async reorderQueue(episodeIds: number[]): Promise<QueueItem[]> {
    await this.db.withTransaction((trx) =>
      this.db.reorderQueueItems(episodeIds, trx),
    )
    return this.db.getQueueItems()
  }

  async listPlaylists(): Promise<Playlist[]> {
    return this.db.getPlaylists()
  }

  async createPlaylist(
    name: string,
    description: string | null = null,
  ): Promise<Playlist> {
    return this.db.insertPlaylist({ name, description, needsSync: true })
  }

  async renamePlaylist(
    id: number,
    name: string,
    description?: string | null,
  ): Promise<Playlist> {
    const playlist = await this.requirePlaylist(id)
    await this.db.updatePlaylist(playlist.id, {
      name,
      ...(description !== undefined ? { description } : {}),
      needsSync: true,
    })
    return this.requirePlaylist(id)
  }

  /**
   * Playlists the server knows are kept, marked deleted, until the deletion
   * is pushed
   */
  async deletePlaylist(id: number): Promise<void> {
    const playlist = await this.requirePlaylist(id)
    if (playlist.remoteId) {
      await this.db.updatePlaylist(playlist.id, {
        deleted: true,
        needsSync: true,
      })
    } else {
      await this.db.deletePlaylist(playlist.id)
    }
  }

  private async requirePlaylist(id: number): Promise<Playlist> {
    const playlist = await this.db.getPlaylistById(id)
    if (!playlist || playlist.deleted) {
      throw new SyncError('NotFound', `Playlist ${id} not found`)
    }
    return playlist
  }
}

import { networkError, type SyncError } from '@root/types/errors.js'
import type { FeedFetcher, ParsedFeed } from '@root/types/feed.types.js'
import type { NewEpisode } from '@root/types/library.types.js'
import type {
  CollectionsClient,
  ProgressDelta,
  ProgressUpload,
  ProgressUploadResult,
  RemoteCapabilities,
  RemoteClient,
  RemoteEpisode,
  RemotePlaylist,
  RemoteProgressRecord,
  RemoteQueueItem,
  SubscriptionAck,
  SubscriptionDelta,
} from '@root/types/remote.types.js'

export type FakeOperation =
  | 'getSubscriptions'
  | 'subscribe'
  | 'unsubscribe'
  | 'getProgress'
  | 'pushProgress'
  | 'listEpisodes'

/**
 * Builds a feed whose episodes have GUIDs `${feedUrl}#n` and enclosures
 * `${feedUrl}/n.mp3`
 */
export function makeFeed(feedUrl: string, episodeCount = 2): ParsedFeed {
  const episodes: NewEpisode[] = []
  for (let n = 1; n <= episodeCount; n++) {
    episodes.push({
      guid: `${feedUrl}#${n}`,
      audioUrl: `${feedUrl}/${n}.mp3`,
      title: `Episode ${n}`,
      description: null,
      publishedAt: new Date(Date.UTC(2024, 0, n)),
      duration: 1800,
      artworkUrl: null,
    })
  }
  return {
    feedUrl,
    title: `Podcast ${feedUrl}`,
    author: 'Test Author',
    description: null,
    artworkUrl: null,
    episodes,
  }
}

/**
 * In-memory feed source. Unknown URLs reject with a NetworkError.
 */
export class FakeFeedFetcher implements FeedFetcher {
  readonly feeds = new Map<string, ParsedFeed>()
  readonly requested: string[] = []

  add(feed: ParsedFeed): this {
    this.feeds.set(feed.feedUrl, feed)
    return this
  }

  async parseFeed(url: string): Promise<ParsedFeed> {
    this.requested.push(url)
    const feed = this.feeds.get(url)
    if (!feed) throw networkError(`Feed unreachable: ${url}`)
    return feed
  }
}

/**
 * In-process sync server with a gpodder-style change log: subscription and
 * progress cursors are positions in the respective logs. Uploaded progress
 * is echoed back by later progress reads, as a real server does.
 */
export class FakeRemoteClient implements RemoteClient {
  readonly protocol = 'gpodder' as const
  capabilities: RemoteCapabilities = {
    feedUrlIdentity: true,
    bulkProgressUpload: false,
  }

  readonly subscriptions = new Set<string>()
  readonly subscriptionLog: Array<{ feedUrl: string; added: boolean }> = []
  readonly progressLog: RemoteProgressRecord[] = []
  readonly uploads: ProgressUpload[] = []
  /** Server IDs reported with subscription deltas, keyed by feed URL */
  readonly remoteIds: Record<string, string> = {}
  readonly episodes = new Map<string, RemoteEpisode[]>()
  readonly failures = new Map<FakeOperation, SyncError>()
  /** Failures of subscribe and unsubscribe for one feed only, keyed by feed URL */
  readonly feedFailures = new Map<string, SyncError>()
  /** Calls per operation, failed ones included */
  readonly calls: Record<FakeOperation, number> = {
    getSubscriptions: 0,
    subscribe: 0,
    unsubscribe: 0,
    getProgress: 0,
    pushProgress: 0,
    listEpisodes: 0,
  }
  /** Per-upload rejection; null accepts */
  rejectUpload: (upload: ProgressUpload) => SyncError | null = () => null
  collections?: CollectionsClient

  /** Changes made by another device */
  addRemotely(feedUrl: string): void {
    this.subscriptions.add(feedUrl)
    this.subscriptionLog.push({ feedUrl, added: true })
  }

  removeRemotely(feedUrl: string): void {
    this.subscriptions.delete(feedUrl)
    this.subscriptionLog.push({ feedUrl, added: false })
  }

  recordProgressRemotely(record: RemoteProgressRecord): void {
    this.progressLog.push(record)
  }

  enableEpisodeListing(
    remoteSubscriptionId: string,
    episodes: RemoteEpisode[],
  ): void {
    this.episodes.set(remoteSubscriptionId, episodes)
    this.listEpisodes = async (id: string) => {
      this.fail('listEpisodes')
      return this.episodes.get(id) ?? []
    }
  }

  listEpisodes?: (remoteSubscriptionId: string) => Promise<RemoteEpisode[]>

  private fail(operation: FakeOperation, feedUrl?: string): void {
    this.calls[operation]++
    const error =
      this.failures.get(operation) ??
      (feedUrl === undefined ? undefined : this.feedFailures.get(feedUrl))
    if (error) throw error
  }

  async getSubscriptions(cursor: string | null): Promise<SubscriptionDelta> {
    this.fail('getSubscriptions')
    const newCursor = String(this.subscriptionLog.length)
    if (cursor === null) {
      return {
        added: [...this.subscriptions],
        removed: [],
        remoteIds: { ...this.remoteIds },
        newCursor,
      }
    }

    const latest = new Map<string, boolean>()
    for (const entry of this.subscriptionLog.slice(Number(cursor))) {
      latest.set(entry.feedUrl, entry.added)
    }
    const added: string[] = []
    const removed: string[] = []
    for (const [feedUrl, isAdded] of latest) {
      ;(isAdded ? added : removed).push(feedUrl)
    }
    return { added, removed, remoteIds: { ...this.remoteIds }, newCursor }
  }

  async pushSubscriptionChange(
    add: string[],
    remove: string[],
  ): Promise<SubscriptionAck> {
    for (const feedUrl of add) this.addRemotely(feedUrl)
    for (const feedUrl of remove) this.removeRemotely(feedUrl)
    return { timestamp: this.subscriptionLog.length }
  }

  async subscribe(feedUrl: string): Promise<string | null> {
    this.fail('subscribe', feedUrl)
    this.addRemotely(feedUrl)
    return null
  }

  async unsubscribe(remoteId: string): Promise<void> {
    this.fail('unsubscribe', remoteId)
    this.removeRemotely(remoteId)
  }

  async refreshFeed(): Promise<void> {}

  async getProgress(cursor: string | null): Promise<ProgressDelta> {
    this.fail('getProgress')
    return {
      records: this.progressLog.slice(cursor === null ? 0 : Number(cursor)),
      newCursor: String(this.progressLog.length),
    }
  }

  async pushProgress(uploads: ProgressUpload[]): Promise<ProgressUploadResult[]> {
    this.fail('pushProgress')
    return uploads.map((upload): ProgressUploadResult => {
      const error = this.rejectUpload(upload)
      if (error) return { actionId: upload.actionId, ok: false, error }
      this.uploads.push(upload)
      this.progressLog.push({
        remoteEpisodeId: upload.remoteEpisodeId,
        audioUrl: upload.audioUrl,
        position: upload.position,
        duration: upload.duration,
        completed: upload.completed,
        timestamp: upload.timestamp,
      })
      return { actionId: upload.actionId, ok: true }
    })
  }
}

/**
 * In-process queue and playlist store
 */
export class FakeCollections implements CollectionsClient {
  queue: RemoteQueueItem[] = []
  playlists: RemotePlaylist[] = []
  readonly calls: string[] = []
  private nextId = 1

  private id(prefix: string): string {
    return `${prefix}-${this.nextId++}`
  }

  async getQueue(): Promise<RemoteQueueItem[]> {
    this.calls.push('getQueue')
    return this.queue.map((item) => ({ ...item }))
  }

  async addToQueue(remoteEpisodeId: string): Promise<RemoteQueueItem> {
    this.calls.push(`addToQueue:${remoteEpisodeId}`)
    const item = {
      remoteId: this.id('q'),
      remoteEpisodeId,
      position: this.queue.length,
    }
    this.queue.push(item)
    return { ...item }
  }

  async removeFromQueue(remoteItemId: string): Promise<void> {
    this.calls.push(`removeFromQueue:${remoteItemId}`)
    this.queue = this.queue
      .filter((item) => item.remoteId !== remoteItemId)
      .map((item, position) => ({ ...item, position }))
  }

  async reorderQueue(remoteItemIds: string[]): Promise<RemoteQueueItem[]> {
    this.calls.push(`reorderQueue:${remoteItemIds.join(',')}`)
    const rank = new Map(remoteItemIds.map((id, index) => [id, index]))
    this.queue = [...this.queue]
      .sort(
        (a, b) =>
          (rank.get(a.remoteId) ?? remoteItemIds.length + a.position) -
          (rank.get(b.remoteId) ?? remoteItemIds.length + b.position),
      )
      .map((item, position) => ({ ...item, position }))
    return this.queue.map((item) => ({ ...item }))
  }

  async getPlaylists(): Promise<RemotePlaylist[]> {
    this.calls.push('getPlaylists')
    return this.playlists.map((playlist) => ({
      ...playlist,
      items: [...playlist.items],
    }))
  }

  async createPlaylist(
    name: string,
    description: string | null,
  ): Promise<string> {
    this.calls.push(`createPlaylist:${name}`)
    const remoteId = this.id('p')
    this.playlists.push({ remoteId, name, description, items: [] })
    return remoteId
  }

  async updatePlaylist(
    remoteId: string,
    name: string,
    description: string | null,
  ): Promise<void> {
    this.calls.push(`updatePlaylist:${remoteId}`)
    this.playlists = this.playlists.map((playlist) =>
      playlist.remoteId === remoteId
        ? { ...playlist, name, description }
        : playlist,
    )
  }

  async deletePlaylist(remoteId: string): Promise<void> {
    this.calls.push(`deletePlaylist:${remoteId}`)
    this.playlists = this.playlists.filter(
      (playlist) => playlist.remoteId !== remoteId,
    )
  }
}

/**
 * Podcast Service Client
 *
 * RemoteClient over the podcast-service REST API (bearer API key).
 *
 * Responsible for:
 * - Subscription snapshots, diffed against the previous snapshot kept in the
 *   cursor so removals made elsewhere are detected
 * - Per-episode and bulk progress updates, with a client-side cursor on
 *   `lastUpdatedAt`
 * - Episode listing for linking local episodes to server IDs
 * - Queue and playlist collections
 */
import {
  isSyncError,
  type SyncError,
  validationError,
} from '@root/types/errors.js'
import type {
  CollectionsClient,
  ProgressDelta,
  ProgressUpload,
  ProgressUploadResult,
  RemoteCapabilities,
  RemoteClient,
  RemoteClientOptions,
  RemoteEpisode,
  RemotePlaylist,
  RemoteProgressRecord,
  RemoteQueueItem,
  SubscriptionAck,
  SubscriptionDelta,
} from '@root/types/remote.types.js'
import {
  AddToQueueResponseSchema,
  AuthResponseSchema,
  BulkProgressResponseSchema,
  CreatePlaylistResponseSchema,
  EpisodesResponseSchema,
  PlaylistDetailResponseSchema,
  PlaylistsResponseSchema,
  PodcastsResponseSchema,
  ProgressResponseSchema,
  QueueResponseSchema,
  type SubscribedPodcast,
  SubscribeResponseSchema,
  SubscriptionSnapshotCursorSchema,
} from '@schemas/remote/podcast-service.schema.js'
import {
  joinUrl,
  readBody,
  type RequestOptions,
  requestJson,
  sendRequest,
} from '@services/remote/http-client.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import type { z } from 'zod'

const EPISODE_PAGE_SIZE = 500

type Method = NonNullable<RequestOptions['method']>

/**
 * Authenticated JSON transport shared by the client and its collections.
 */
class ApiTransport {
  constructor(private readonly options: RemoteClientOptions) {}

  private request(method: Method, body?: unknown): RequestOptions {
    return {
      method,
      headers: { Authorization: `Bearer ${this.options.sessionToken}` },
      body,
      timeoutMs: this.options.requestTimeoutMs,
    }
  }

  json<T extends z.ZodTypeAny>(
    method: Method,
    path: string,
    schema: T,
    body?: unknown,
  ): Promise<z.output<T>> {
    return requestJson(
      joinUrl(this.options.serverUrl, path),
      schema,
      this.request(method, body),
    )
  }

  async send(method: Method, path: string, body?: unknown): Promise<void> {
    const url = joinUrl(this.options.serverUrl, path)
    const response = await sendRequest(url, this.request(method, body))
    await readBody(response, url)
  }

  /**
   * Like `send`, but a 404 counts as done: the resource is already gone.
   */
  async delete(path: string): Promise<void> {
    try {
      await this.send('DELETE', path)
    } catch (error) {
      if (isSyncError(error) && error.kind === 'NotFound') return
      throw error
    }
  }
}

function readSnapshotCursor(cursor: string | null): string[] {
  if (!cursor) return []
  try {
    const parsed = SubscriptionSnapshotCursorSchema.safeParse(JSON.parse(cursor))
    return parsed.success ? parsed.data.feeds : []
  } catch {
    return []
  }
}

function readProgressCursor(cursor: string | null): Date | null {
  if (!cursor) return null
  const date = new Date(cursor)
  return Number.isNaN(date.getTime()) ? null : date
}

class PodcastServiceCollections implements CollectionsClient {
  constructor(private readonly api: ApiTransport) {}

  async getQueue(): Promise<RemoteQueueItem[]> {
    const data = await this.api.json('GET', '/api/queue', QueueResponseSchema)
    return data.queue.map((item) => ({
      remoteId: item.id,
      remoteEpisodeId: item.episodeId,
      position: item.position,
    }))
  }

  async addToQueue(remoteEpisodeId: string): Promise<RemoteQueueItem> {
    const data = await this.api.json(
      'POST',
      '/api/queue',
      AddToQueueResponseSchema,
      { episodeId: remoteEpisodeId },
    )
    return {
      remoteId: data.queueItem.id,
      remoteEpisodeId: data.queueItem.episodeId,
      position: data.queueItem.position,
    }
  }

  async removeFromQueue(remoteItemId: string): Promise<void> {
    await this.api.delete(`/api/queue/${encodeURIComponent(remoteItemId)}`)
  }

  async reorderQueue(remoteItemIds: string[]): Promise<RemoteQueueItem[]> {
    const data = await this.api.json('PUT', '/api/queue', QueueResponseSchema, {
      items: remoteItemIds.map((id, position) => ({ id, position })),
    })
    return data.queue.map((item) => ({
      remoteId: item.id,
      remoteEpisodeId: item.episodeId,
      position: item.position,
    }))
  }

  async getPlaylists(): Promise<RemotePlaylist[]> {
    const list = await this.api.json(
      'GET',
      '/api/playlists',
      PlaylistsResponseSchema,
    )
    const playlists: RemotePlaylist[] = []
    for (const playlist of list.playlists) {
      const detail = await this.api.json(
        'GET',
        `/api/playlists/${encodeURIComponent(playlist.id)}`,
        PlaylistDetailResponseSchema,
      )
      playlists.push({
        remoteId: detail.playlist.id,
        name: detail.playlist.name,
        description: detail.playlist.description ?? null,
        items: detail.playlist.items.map((item) => ({
          remoteId: item.id,
          remoteEpisodeId: item.episode?.id ?? null,
          position: item.position,
        })),
      })
    }
    return playlists
  }

  async createPlaylist(
    name: string,
    description: string | null,
  ): Promise<string> {
    const data = await this.api.json(
      'POST',
      '/api/playlists',
      CreatePlaylistResponseSchema,
      { name, description },
    )
    return data.playlist.id
  }

  async updatePlaylist(
    remoteId: string,
    name: string,
    description: string | null,
  ): Promise<void> {
    await this.api.send('PUT', `/api/playlists/${encodeURIComponent(remoteId)}`, {
      name,
      description,
    })
  }

  async deletePlaylist(remoteId: string): Promise<void> {
    await this.api.delete(`/api/playlists/${encodeURIComponent(remoteId)}`)
  }
}

export class PodcastServiceClient implements RemoteClient {
  readonly protocol = 'podcast-service' as const
  readonly capabilities: RemoteCapabilities = {
    feedUrlIdentity: false,
    bulkProgressUpload: true,
  }
  readonly collections: CollectionsClient
  private readonly api: ApiTransport
  private readonly log: FastifyBaseLogger

  constructor(options: RemoteClientOptions, baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'PODCAST_SERVICE')
    this.api = new ApiTransport(options)
    this.collections = new PodcastServiceCollections(this.api)
  }

  /**
   * Exchanges credentials for the account's API key
   */
  static async login(
    serverUrl: string,
    email: string,
    password: string,
    timeoutMs: number,
  ): Promise<string> {
    const data = await requestJson(
      joinUrl(serverUrl, '/api/auth/login'),
      AuthResponseSchema,
      { method: 'POST', body: { email, password }, timeoutMs },
    )
    return data.user.apiKey
  }

  private async listPodcasts(): Promise<SubscribedPodcast[]> {
    const data = await this.api.json(
      'GET',
      '/api/podcasts',
      PodcastsResponseSchema,
    )
    return data.podcasts
  }

  async getSubscriptions(cursor: string | null): Promise<SubscriptionDelta> {
    const podcasts = await this.listPodcasts()
    const feeds = podcasts.map((podcast) => podcast.feedUrl)
    const current = new Set(feeds)

    return {
      added: feeds,
      removed: readSnapshotCursor(cursor).filter((url) => !current.has(url)),
      remoteIds: Object.fromEntries(
        podcasts.map((podcast) => [podcast.feedUrl, podcast.id]),
      ),
      newCursor: JSON.stringify({ feeds }),
    }
  }

  async pushSubscriptionChange(
    add: string[],
    remove: string[],
  ): Promise<SubscriptionAck> {
    for (const feedUrl of add) {
      await this.subscribe(feedUrl)
    }
    if (remove.length > 0) {
      const byUrl = new Map(
        (await this.listPodcasts()).map((podcast) => [
          podcast.feedUrl,
          podcast.id,
        ]),
      )
      for (const feedUrl of remove) {
        const remoteId = byUrl.get(feedUrl)
        if (remoteId) await this.unsubscribe(remoteId)
      }
    }
    return { timestamp: null }
  }

  /**
   * Subscribes and returns the podcast ID. An existing subscription (409)
   * resolves to its ID.
   */
  async subscribe(feedUrl: string): Promise<string | null> {
    try {
      const data = await this.api.json(
        'POST',
        '/api/podcasts/subscribe',
        SubscribeResponseSchema,
        { feedUrl },
      )
      return data.podcast.id
    } catch (error) {
      if (!isSyncError(error) || error.kind !== 'Conflict') throw error
      const existing = (await this.listPodcasts()).find(
        (podcast) => podcast.feedUrl === feedUrl,
      )
      this.log.debug({ feedUrl }, 'Already subscribed on server')
      return existing?.id ?? null
    }
  }

  async unsubscribe(remoteId: string): Promise<void> {
    await this.api.delete(`/api/podcasts/${encodeURIComponent(remoteId)}`)
  }

  async refreshFeed(remoteId: string): Promise<void> {
    await this.api.send(
      'POST',
      `/api/podcasts/${encodeURIComponent(remoteId)}/refresh`,
    )
  }

  async getProgress(cursor: string | null): Promise<ProgressDelta> {
    const since = readProgressCursor(cursor)
    const data = await this.api.json(
      'GET',
      '/api/progress',
      ProgressResponseSchema,
    )

    let newest = since
    const records: RemoteProgressRecord[] = []
    for (const record of data.progress) {
      const timestamp = new Date(record.lastUpdatedAt)
      if (!newest || timestamp > newest) newest = timestamp
      if (since && timestamp <= since) continue
      records.push({
        remoteEpisodeId: record.episodeId,
        audioUrl: null,
        position: record.positionSeconds,
        duration: record.durationSeconds ?? null,
        completed: record.completed,
        timestamp,
      })
    }

    return { records, newCursor: newest ? newest.toISOString() : null }
  }

  /**
   * Sends one update through the per-episode endpoint, several through the
   * bulk endpoint. Updates without a server episode ID fail individually.
   *
   * @throws SyncError when the request itself fails
   */
  async pushProgress(
    uploads: ProgressUpload[],
  ): Promise<ProgressUploadResult[]> {
    const results: ProgressUploadResult[] = []
    const sendable: Array<ProgressUpload & { remoteEpisodeId: string }> = []
    for (const upload of uploads) {
      if (upload.remoteEpisodeId) {
        sendable.push({ ...upload, remoteEpisodeId: upload.remoteEpisodeId })
      } else {
        results.push({
          actionId: upload.actionId,
          ok: false,
          error: validationError('Episode has no server ID yet'),
        })
      }
    }

    const body = (upload: ProgressUpload) => ({
      positionSeconds: Math.round(upload.position),
      durationSeconds: Math.round(upload.duration ?? 0),
      completed: upload.completed,
    })

    if (sendable.length === 1) {
      const [upload] = sendable
      await this.api.send(
        'PUT',
        `/api/progress/${encodeURIComponent(upload.remoteEpisodeId)}`,
        body(upload),
      )
      results.push({ actionId: upload.actionId, ok: true })
    } else if (sendable.length > 1) {
      const data = await this.api.json(
        'POST',
        '/api/progress',
        BulkProgressResponseSchema,
        {
          updates: sendable.map((upload) => ({
            episodeId: upload.remoteEpisodeId,
            ...body(upload),
          })),
        },
      )
      const aligned = data.results.length === sendable.length
      sendable.forEach((upload, index) => {
        const result = aligned
          ? data.results[index]
          : data.results.find((r) => r.episodeId === upload.remoteEpisodeId)
        if (result?.success) {
          results.push({ actionId: upload.actionId, ok: true })
        } else {
          results.push({
            actionId: upload.actionId,
            ok: false,
            error: rejected(result?.error ?? 'No result returned for update'),
          })
        }
      })
    }

    return results
  }

  async listEpisodes(remoteSubscriptionId: string): Promise<RemoteEpisode[]> {
    const episodes: RemoteEpisode[] = []
    for (let offset = 0; ; offset += EPISODE_PAGE_SIZE) {
      const data = await this.api.json(
        'GET',
        `/api/episodes?podcastId=${encodeURIComponent(remoteSubscriptionId)}&limit=${EPISODE_PAGE_SIZE}&offset=${offset}`,
        EpisodesResponseSchema,
      )
      for (const episode of data.episodes) {
        episodes.push({ remoteId: episode.id, audioUrl: episode.audioUrl })
      }
      const total = data.total ?? episodes.length
      if (data.episodes.length < EPISODE_PAGE_SIZE || episodes.length >= total) {
        return episodes
      }
    }
  }
}

function rejected(message: string): SyncError {
  return validationError(`Server rejected update: ${message}`)
}

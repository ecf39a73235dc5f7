/**
 * gpodder Client
 *
 * RemoteClient over the gpodder.net API v2: device-scoped subscription
 * deltas, an episode action log and session cookies.
 *
 * Responsible for:
 * - Delta subscription sync, falling back to device-less snapshot endpoints
 *   (plain URL lists or OPML) for servers that lack device support
 * - Translating `play` episode actions to and from progress records
 * - Login through HTTP Basic auth
 *
 * The feed URL is the subscription identity; the protocol has no episode IDs,
 * so progress records carry the enclosure URL instead. Queues and playlists
 * are not part of the protocol.
 */
import {
  decodingError,
  isSyncError,
  SyncError,
  validationError,
} from '@root/types/errors.js'
import type {
  ProgressDelta,
  ProgressUpload,
  ProgressUploadResult,
  RemoteCapabilities,
  RemoteClient,
  RemoteClientOptions,
  RemoteProgressRecord,
  SubscriptionAck,
  SubscriptionDelta,
} from '@root/types/remote.types.js'
import {
  type EpisodeAction,
  EpisodeActionsResponseSchema,
  type GpodderCursor,
  GpodderCursorSchema,
  SubscriptionChangesSchema,
  SubscriptionListSchema,
  UploadResponseSchema,
} from '@schemas/remote/gpodder.schema.js'
import {
  joinUrl,
  readBody,
  requestJson,
  sendRequest,
} from '@services/remote/http-client.js'
import { isOpml, parseOpmlFeedUrls } from '@services/remote/opml.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

const SNAPSHOT_PATHS = [
  '/api/2/subscriptions/{user}.json',
  '/subscriptions/{user}.json',
  '/api/2/subscriptions/{user}',
  '/subscriptions/{user}',
]

const UPDATE_PATHS = [
  '/api/2/subscriptions/{user}.json',
  '/subscriptions/{user}.json',
]

/**
 * Reads a stored cursor; anything unreadable starts from scratch.
 */
export function parseGpodderCursor(cursor: string | null): GpodderCursor | null {
  if (!cursor) return null
  if (/^\d+$/.test(cursor)) return { since: Number(cursor) }
  try {
    const parsed = GpodderCursorSchema.safeParse(JSON.parse(cursor))
    return parsed.success ? parsed.data : null
  } catch {
    return null
  }
}

/**
 * Parses an action timestamp: ISO 8601 (UTC when no offset is given) or Unix
 * seconds.
 */
export function parseActionTimestamp(
  value: string | number | null | undefined,
): Date | null {
  if (value === null || value === undefined || value === '') return null
  const date =
    typeof value === 'number' || /^\d+(\.\d+)?$/.test(value)
      ? new Date(Number(value) * 1000)
      : new Date(/(Z|[+-]\d{2}:?\d{2})$/i.test(value) ? value : `${value}Z`)
  return Number.isNaN(date.getTime()) ? null : date
}

/**
 * Formats a timestamp the way the API expects: UTC, second precision, no
 * offset
 */
export function formatActionTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19)
}

function isEndpointUnsupported(error: unknown): error is SyncError {
  return (
    isSyncError(error) &&
    (error.kind === 'NotFound' || error.kind === 'ValidationError')
  )
}

export class GpodderClient implements RemoteClient {
  readonly protocol = 'gpodder' as const
  readonly capabilities: RemoteCapabilities = {
    feedUrlIdentity: true,
    bulkProgressUpload: true,
  }
  private readonly log: FastifyBaseLogger

  constructor(
    private readonly options: RemoteClientOptions,
    baseLog: FastifyBaseLogger,
  ) {
    this.log = createServiceLogger(baseLog, 'GPODDER')
  }

  /**
   * Opens a session and returns the token to store: the session cookie, or
   * the Basic credentials when the server sets no cookie.
   */
  static async login(
    serverUrl: string,
    username: string,
    password: string,
    timeoutMs: number,
  ): Promise<string> {
    const basic = `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`
    const url = joinUrl(
      serverUrl,
      `/api/2/auth/${encodeURIComponent(username)}/login.json`,
    )
    const response = await sendRequest(url, {
      method: 'POST',
      headers: { Authorization: basic },
      timeoutMs,
    })
    await readBody(response, url)

    const cookies = response.headers
      .getSetCookie()
      .map((cookie) => cookie.split(';')[0].trim())
      .filter((cookie) => cookie.length > 0)
    return cookies.length > 0 ? cookies.join('; ') : basic
  }

  private get authHeaders(): Record<string, string> {
    const token = this.options.sessionToken
    return token.startsWith('Basic ')
      ? { Authorization: token }
      : { Cookie: token }
  }

  private url(path: string): string {
    return joinUrl(
      this.options.serverUrl,
      path
        .replace('{user}', encodeURIComponent(this.options.username))
        .replace('{device}', encodeURIComponent(this.options.deviceId)),
    )
  }

  async getSubscriptions(cursor: string | null): Promise<SubscriptionDelta> {
    const previous = parseGpodderCursor(cursor)
    const since = previous && 'since' in previous ? previous.since : 0

    try {
      const changes = await requestJson(
        `${this.url('/api/2/subscriptions/{user}/{device}.json')}?since=${since}`,
        SubscriptionChangesSchema,
        { headers: this.authHeaders, timeoutMs: this.options.requestTimeoutMs },
      )
      return {
        added: changes.add,
        removed: changes.remove,
        remoteIds: {},
        newCursor: JSON.stringify({ since: changes.timestamp }),
      }
    } catch (error) {
      if (!isEndpointUnsupported(error)) throw error
      this.log.debug(
        { status: error.status },
        'Device subscription endpoint not supported, trying device-less endpoints',
      )
    }

    const snapshot = await this.fetchSnapshot()
    const current = new Set(snapshot)
    const before = previous && 'snapshot' in previous ? previous.snapshot : []
    return {
      added: snapshot,
      removed: before.filter((url) => !current.has(url)),
      remoteIds: {},
      newCursor: JSON.stringify({ snapshot }),
    }
  }

  private async fetchSnapshot(): Promise<string[]> {
    for (const path of SNAPSHOT_PATHS) {
      const url = this.url(path)
      let body: string
      try {
        const response = await sendRequest(url, {
          headers: this.authHeaders,
          timeoutMs: this.options.requestTimeoutMs,
        })
        body = await readBody(response, url)
      } catch (error) {
        if (isEndpointUnsupported(error)) continue
        throw error
      }
      return this.parseSnapshot(body, url)
    }
    throw new SyncError('NotFound', 'No subscription endpoint available on server')
  }

  private parseSnapshot(body: string, url: string): string[] {
    if (body.trim().length === 0) return []
    if (isOpml(body)) return parseOpmlFeedUrls(body)

    let payload: unknown
    try {
      payload = JSON.parse(body)
    } catch (error) {
      throw decodingError(`Invalid subscription list from ${url}`, error)
    }
    const list = SubscriptionListSchema.safeParse(payload)
    if (list.success) return list.data
    const changes = SubscriptionChangesSchema.safeParse(payload)
    if (changes.success) return changes.data.add
    throw decodingError(`Unexpected subscription list from ${url}`, list.error)
  }

  async pushSubscriptionChange(
    add: string[],
    remove: string[],
  ): Promise<SubscriptionAck> {
    const options = {
      method: 'POST' as const,
      headers: this.authHeaders,
      body: { add, remove },
      timeoutMs: this.options.requestTimeoutMs,
    }

    try {
      const response = await sendRequest(
        this.url('/api/2/subscriptions/{user}/{device}.json'),
        options,
      )
      return this.readAck(response)
    } catch (error) {
      if (!isEndpointUnsupported(error)) throw error
    }

    let lastError: SyncError | null = null
    for (const path of UPDATE_PATHS) {
      try {
        return this.readAck(await sendRequest(this.url(path), options))
      } catch (error) {
        if (!isEndpointUnsupported(error)) throw error
        lastError = error
      }
    }
    throw (
      lastError ??
      new SyncError('NotFound', 'No subscription update endpoint available')
    )
  }

  private async readAck(response: Response): Promise<SubscriptionAck> {
    const text = await readBody(response, response.url)
    if (!text) return { timestamp: null }
    try {
      const parsed = UploadResponseSchema.safeParse(JSON.parse(text))
      return { timestamp: parsed.success ? (parsed.data.timestamp ?? null) : null }
    } catch {
      return { timestamp: null }
    }
  }

  /**
   * gpodder has no server IDs; the feed URL doubles as one.
   */
  async subscribe(feedUrl: string): Promise<string | null> {
    await this.pushSubscriptionChange([feedUrl], [])
    return null
  }

  async unsubscribe(remoteId: string): Promise<void> {
    await this.pushSubscriptionChange([], [remoteId])
  }

  async refreshFeed(remoteId: string): Promise<void> {
    // The server polls feeds on its own schedule
    this.log.debug({ feedUrl: remoteId }, 'Feed refresh is server-driven')
  }

  async getProgress(cursor: string | null): Promise<ProgressDelta> {
    const since = cursor && /^\d+$/.test(cursor) ? cursor : '0'
    const data = await requestJson(
      `${this.url('/api/2/episodes/{user}.json')}?since=${since}`,
      EpisodeActionsResponseSchema,
      { headers: this.authHeaders, timeoutMs: this.options.requestTimeoutMs },
    )

    const records: RemoteProgressRecord[] = []
    for (const action of data.actions) {
      const record = this.toProgressRecord(action)
      if (record) records.push(record)
    }
    records.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())

    this.log.debug(
      { received: data.actions.length, usable: records.length },
      'Fetched episode actions',
    )
    return { records, newCursor: String(data.timestamp) }
  }

  private toProgressRecord(action: EpisodeAction): RemoteProgressRecord | null {
    if (action.action.toLowerCase() !== 'play') return null
    const timestamp = parseActionTimestamp(action.timestamp)
    if (!timestamp) return null

    const position = action.position ?? 0
    const total = action.total ?? null
    return {
      remoteEpisodeId: null,
      audioUrl: action.episode,
      position,
      duration: total,
      completed: total !== null && total > 0 && position >= total,
      timestamp,
    }
  }

  /**
   * Uploads all actions in one request. Actions without an enclosure URL
   * cannot be addressed and fail individually.
   *
   * @throws SyncError when the request itself fails
   */
  async pushProgress(
    uploads: ProgressUpload[],
  ): Promise<ProgressUploadResult[]> {
    const results: ProgressUploadResult[] = []
    const sendable: ProgressUpload[] = []
    for (const upload of uploads) {
      if (upload.audioUrl) {
        sendable.push(upload)
      } else {
        results.push({
          actionId: upload.actionId,
          ok: false,
          error: validationError('Episode has no enclosure URL'),
        })
      }
    }

    if (sendable.length > 0) {
      const response = await sendRequest(
        this.url('/api/2/episodes/{user}.json'),
        {
          method: 'POST',
          headers: this.authHeaders,
          body: sendable.map((upload) => ({
            podcast: upload.podcastUrl,
            episode: upload.audioUrl,
            action: 'play',
            timestamp: formatActionTimestamp(upload.timestamp),
            position: Math.round(upload.position),
            started: 0,
            total:
              upload.duration === null ? undefined : Math.round(upload.duration),
            device: this.options.deviceId,
          })),
          timeoutMs: this.options.requestTimeoutMs,
        },
      )
      await readBody(response, response.url)
      for (const upload of sendable) {
        results.push({ actionId: upload.actionId, ok: true })
      }
    }

    return results
  }
}

import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { HttpResponse, http } from 'msw'
import { beforeEach, describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import {
  initializeTestDatabase,
  resetDatabase,
} from '../../helpers/database.js'
import { server } from '../../setup/msw-setup.js'

const FEED_URL = 'https://feeds.example.com/show.xml'

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Route Show</title>
    <item>
      <title>Only Episode</title>
      <guid>only-episode</guid>
      <enclosure url="https://feeds.example.com/only.mp3" length="1" type="audio/mpeg"/>
    </item>
  </channel>
</rss>`

interface SubscriptionBody {
  subscription: { id: number; feedUrl: string; subscribed: boolean; needsSync: boolean }
}

describe('Library routes', () => {
  beforeEach(async () => {
    await initializeTestDatabase()
    await resetDatabase()
    server.use(http.get(FEED_URL, () => new HttpResponse(RSS)))
  })

  it('should subscribe, list and unsubscribe', async (ctx) => {
    const app = await build(ctx)

    const created = await app.inject({
      method: 'POST',
      url: '/v1/subscriptions',
      payload: { feedUrl: FEED_URL },
    })
    expect(created.statusCode).toBe(201)
    expect(created.json<SubscriptionBody>().subscription).toMatchObject({
      feedUrl: FEED_URL,
      subscribed: true,
      needsSync: true,
    })

    const listed = await app.inject({ method: 'GET', url: '/v1/subscriptions' })
    expect(listed.json<{ subscriptions: unknown[] }>().subscriptions).toHaveLength(1)

    const unsubscribed = await app.inject({
      method: 'POST',
      url: '/v1/subscriptions/unsubscribe',
      payload: { feedUrl: FEED_URL },
    })
    expect(unsubscribed.json()).toEqual({ changed: true })

    const remaining = await app.inject({
      method: 'GET',
      url: '/v1/subscriptions?includeUnsubscribed=false',
    })
    expect(remaining.json()).toEqual({ subscriptions: [] })

    const all = await app.inject({
      method: 'GET',
      url: '/v1/subscriptions?includeUnsubscribed=true',
    })
    expect(all.json<{ subscriptions: unknown[] }>().subscriptions).toHaveLength(1)
  })

  it('should answer 502 when the feed cannot be fetched', async (ctx) => {
    const app = await build(ctx)
    server.use(http.get(FEED_URL, () => HttpResponse.error()))

    const response = await app.inject({
      method: 'POST',
      url: '/v1/subscriptions',
      payload: { feedUrl: FEED_URL },
    })

    expect(response.statusCode).toBe(502)
    expect(response.json<ErrorResponse>().code).toBe('NetworkError')
  })

  it('should answer 404 when unsubscribing an unknown feed', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'POST',
      url: '/v1/subscriptions/unsubscribe',
      payload: { feedUrl: FEED_URL },
    })

    expect(response.statusCode).toBe(404)
    expect(response.json<ErrorResponse>()).toEqual({
      statusCode: 404,
      code: 'NotFound',
      error: 'Not Found',
      message: `No subscription for ${FEED_URL}`,
    })
  })

  it('should record progress for a stored episode', async (ctx) => {
    const app = await build(ctx)
    const created = await app.inject({
      method: 'POST',
      url: '/v1/subscriptions',
      payload: { feedUrl: FEED_URL },
    })
    const { id } = created.json<SubscriptionBody>().subscription
    const episodes = await app.inject({
      method: 'GET',
      url: `/v1/subscriptions/${id}/episodes`,
    })
    const [episode] = episodes.json<{ episodes: Array<{ id: number }> }>().episodes

    const response = await app.inject({
      method: 'POST',
      url: `/v1/episodes/${episode.id}/progress`,
      payload: { position: 95, completed: false },
    })

    expect(response.statusCode).toBe(201)
    expect(response.json()).toMatchObject({
      episodeId: episode.id,
      position: 95,
      completed: false,
    })
    expect(await app.db.getUnsyncedPendingUploads()).toMatchObject([
      { episodeId: episode.id, position: 95, feedUrl: FEED_URL },
    ])
  })

  it('should answer 404 for progress on an unknown episode', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'POST',
      url: '/v1/episodes/999/progress',
      payload: { position: 10 },
    })

    expect(response.statusCode).toBe(404)
    expect(response.json<ErrorResponse>().message).toBe('Episode 999 not found')
  })

  it('should reject a negative position', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'POST',
      url: '/v1/episodes/1/progress',
      payload: { position: -5 },
    })

    expect(response.statusCode).toBe(400)
  })

  it('should answer 404 when removing an episode that is not queued', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'DELETE',
      url: '/v1/queue/1',
    })

    expect(response.statusCode).toBe(404)
  })

  it('should create, rename and delete a playlist', async (ctx) => {
    const app = await build(ctx)

    const created = await app.inject({
      method: 'POST',
      url: '/v1/playlists',
      payload: { name: 'Later' },
    })
    expect(created.statusCode).toBe(201)
    const { playlist } = created.json<{ playlist: { id: number } }>()

    const renamed = await app.inject({
      method: 'PUT',
      url: `/v1/playlists/${playlist.id}`,
      payload: { name: 'Weekend' },
    })
    expect(renamed.json()).toMatchObject({
      playlist: { id: playlist.id, name: 'Weekend', needsSync: true },
    })

    const deleted = await app.inject({
      method: 'DELETE',
      url: `/v1/playlists/${playlist.id}`,
    })
    expect(deleted.statusCode).toBe(204)

    const listed = await app.inject({ method: 'GET', url: '/v1/playlists' })
    expect(listed.json()).toEqual({ playlists: [] })
  })

  it('should report the stored session without its token', async (ctx) => {
    const app = await build(ctx)
    await app.db.saveServerConfiguration({
      serverUrl: 'https://sync.example.com',
      protocol: 'gpodder',
      username: 'alice',
      sessionToken: 'test-secret',
      isAuthenticated: true,
    })

    const response = await app.inject({ method: 'GET', url: '/v1/session' })

    expect(response.statusCode).toBe(200)
    expect(response.json()).toEqual({
      serverUrl: 'https://sync.example.com',
      protocol: 'gpodder',
      username: 'alice',
      isAuthenticated: true,
    })
  })
})

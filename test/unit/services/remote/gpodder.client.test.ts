import {
  formatActionTimestamp,
  GpodderClient,
  parseActionTimestamp,
  parseGpodderCursor,
} from '@services/remote/gpodder.client.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'
import { server } from '../../../setup/msw-setup.js'

const BASE = 'https://gpodder.example.com'
const DEVICE_PATH = `${BASE}/api/2/subscriptions/alice/device-1.json`

function createClient(sessionToken = 'sessionid=test-session'): GpodderClient {
  return new GpodderClient(
    {
      serverUrl: `${BASE}/`,
      username: 'alice',
      sessionToken,
      deviceId: 'device-1',
      requestTimeoutMs: 5000,
    },
    createMockLogger(),
  )
}

describe('GpodderClient', () => {
  describe('cursors and timestamps', () => {
    it('should read delta, snapshot and numeric cursors', () => {
      expect(parseGpodderCursor(null)).toBeNull()
      expect(parseGpodderCursor('{"since":12}')).toEqual({ since: 12 })
      expect(parseGpodderCursor('{"snapshot":["a"]}')).toEqual({
        snapshot: ['a'],
      })
      expect(parseGpodderCursor('1700')).toEqual({ since: 1700 })
      expect(parseGpodderCursor('not json')).toBeNull()
    })

    it('should parse ISO and Unix timestamps as UTC', () => {
      expect(parseActionTimestamp('2024-05-01T10:00:00')).toEqual(
        new Date('2024-05-01T10:00:00.000Z'),
      )
      expect(parseActionTimestamp('2024-05-01T12:00:00+02:00')).toEqual(
        new Date('2024-05-01T10:00:00.000Z'),
      )
      expect(parseActionTimestamp(1714557600)).toEqual(
        new Date('2024-05-01T10:00:00.000Z'),
      )
      expect(parseActionTimestamp('garbage')).toBeNull()
      expect(parseActionTimestamp(null)).toBeNull()
    })

    it('should format timestamps without milliseconds or offset', () => {
      expect(
        formatActionTimestamp(new Date('2024-05-01T10:00:00.123Z')),
      ).toBe('2024-05-01T10:00:00')
    })
  })

  describe('login', () => {
    it('should fall back to Basic credentials when no cookie is set', async () => {
      server.use(
        http.post(`${BASE}/api/2/auth/alice/login.json`, () =>
          HttpResponse.json({}),
        ),
      )

      const token = await GpodderClient.login(BASE, 'alice', 'test-secret', 5000)

      expect(token).toBe('Basic YWxpY2U6dGVzdC1zZWNyZXQ=')
    })
  })

  describe('getSubscriptions', () => {
    it('should read the device delta since the stored timestamp', async () => {
      let since: string | null = null
      let cookie: string | null = null
      server.use(
        http.get(DEVICE_PATH, ({ request }) => {
          since = new URL(request.url).searchParams.get('since')
          cookie = request.headers.get('Cookie')
          return HttpResponse.json({
            add: ['https://feeds.example.com/a'],
            remove: ['https://feeds.example.com/b'],
            timestamp: 1700,
          })
        }),
      )

      const delta = await createClient().getSubscriptions('{"since":12}')

      expect(delta).toEqual({
        added: ['https://feeds.example.com/a'],
        removed: ['https://feeds.example.com/b'],
        remoteIds: {},
        newCursor: '{"since":1700}',
      })
      expect(since).toBe('12')
      expect(cookie).toBe('sessionid=test-session')
    })

    it('should fall back to a snapshot and detect removals', async () => {
      server.use(
        http.get(DEVICE_PATH, () => new HttpResponse(null, { status: 404 })),
        http.get(
          `${BASE}/api/2/subscriptions/alice.json`,
          () => new HttpResponse(null, { status: 404 }),
        ),
        http.get(`${BASE}/subscriptions/alice.json`, () =>
          HttpResponse.json([
            'https://feeds.example.com/a',
            'https://feeds.example.com/c',
          ]),
        ),
      )

      const delta = await createClient().getSubscriptions(
        JSON.stringify({
          snapshot: ['https://feeds.example.com/a', 'https://feeds.example.com/b'],
        }),
      )

      expect(delta.added).toEqual([
        'https://feeds.example.com/a',
        'https://feeds.example.com/c',
      ])
      expect(delta.removed).toEqual(['https://feeds.example.com/b'])
      expect(delta.newCursor).toBe(
        JSON.stringify({
          snapshot: ['https://feeds.example.com/a', 'https://feeds.example.com/c'],
        }),
      )
    })

    it('should read an OPML snapshot', async () => {
      server.use(
        http.get(DEVICE_PATH, () => new HttpResponse(null, { status: 400 })),
        http.get(
          `${BASE}/api/2/subscriptions/alice.json`,
          () =>
            new HttpResponse(
              '<opml><body><outline xmlUrl="https://feeds.example.com/a"/></body></opml>',
              { headers: { 'Content-Type': 'text/x-opml' } },
            ),
        ),
      )

      const delta = await createClient().getSubscriptions(null)

      expect(delta.added).toEqual(['https://feeds.example.com/a'])
      expect(delta.removed).toEqual([])
    })

    it('should report an expired session', async () => {
      server.use(
        http.get(DEVICE_PATH, () => new HttpResponse(null, { status: 401 })),
      )

      await expect(createClient().getSubscriptions(null)).rejects.toMatchObject({
        kind: 'NoSession',
        status: 401,
      })
    })
  })

  describe('subscription changes', () => {
    it('should post adds and removes to the device endpoint', async () => {
      let body: unknown = null
      server.use(
        http.post(DEVICE_PATH, async ({ request }) => {
          body = await request.json()
          return HttpResponse.json({ timestamp: 1800, update_urls: [] })
        }),
      )

      const ack = await createClient().pushSubscriptionChange(
        ['https://feeds.example.com/a'],
        ['https://feeds.example.com/b'],
      )

      expect(ack).toEqual({ timestamp: 1800 })
      expect(body).toEqual({
        add: ['https://feeds.example.com/a'],
        remove: ['https://feeds.example.com/b'],
      })
    })

    it('should return no server ID on subscribe', async () => {
      server.use(http.post(DEVICE_PATH, () => HttpResponse.json({})))

      expect(
        await createClient().subscribe('https://feeds.example.com/a'),
      ).toBeNull()
    })
  })

  describe('progress', () => {
    it('should turn play actions into progress records', async () => {
      server.use(
        http.get(`${BASE}/api/2/episodes/alice.json`, ({ request }) => {
          expect(new URL(request.url).searchParams.get('since')).toBe('0')
          return HttpResponse.json({
            actions: [
              {
                podcast: 'https://feeds.example.com/a',
                episode: 'https://feeds.example.com/a/2.mp3',
                action: 'play',
                timestamp: 1714561200,
                position: 1800,
                total: 1800,
              },
              {
                podcast: 'https://feeds.example.com/a',
                episode: 'https://feeds.example.com/a/1.mp3',
                action: 'download',
                timestamp: '2024-05-01T09:00:00',
              },
              {
                podcast: 'https://feeds.example.com/a',
                episode: 'https://feeds.example.com/a/1.mp3',
                action: 'PLAY',
                timestamp: '2024-05-01T10:00:00',
                position: 120,
              },
            ],
            timestamp: 1900,
          })
        }),
      )

      const delta = await createClient().getProgress(null)

      expect(delta).toEqual({
        records: [
          {
            remoteEpisodeId: null,
            audioUrl: 'https://feeds.example.com/a/1.mp3',
            position: 120,
            duration: null,
            completed: false,
            timestamp: new Date('2024-05-01T10:00:00.000Z'),
          },
          {
            remoteEpisodeId: null,
            audioUrl: 'https://feeds.example.com/a/2.mp3',
            position: 1800,
            duration: 1800,
            completed: true,
            timestamp: new Date('2024-05-01T11:00:00.000Z'),
          },
        ],
        newCursor: '1900',
      })
    })

    it('should upload addressable actions in one request', async () => {
      let body: unknown = null
      let authorization: string | null = null
      server.use(
        http.post(`${BASE}/api/2/episodes/alice.json`, async ({ request }) => {
          body = await request.json()
          authorization = request.headers.get('Authorization')
          return HttpResponse.json({ timestamp: 2000, update_urls: [] })
        }),
      )

      const results = await createClient(
        'Basic YWxpY2U6dGVzdC1zZWNyZXQ=',
      ).pushProgress([
        {
          actionId: 1,
          remoteEpisodeId: null,
          podcastUrl: 'https://feeds.example.com/a',
          audioUrl: 'https://feeds.example.com/a/1.mp3',
          position: 30.6,
          duration: 1800,
          completed: false,
          timestamp: new Date('2024-05-01T10:00:00.000Z'),
        },
        {
          actionId: 2,
          remoteEpisodeId: null,
          podcastUrl: 'https://feeds.example.com/a',
          audioUrl: null,
          position: 10,
          duration: null,
          completed: false,
          timestamp: new Date('2024-05-01T10:05:00.000Z'),
        },
      ])

      expect(authorization).toBe('Basic YWxpY2U6dGVzdC1zZWNyZXQ=')
      expect(body).toEqual([
        {
          podcast: 'https://feeds.example.com/a',
          episode: 'https://feeds.example.com/a/1.mp3',
          action: 'play',
          timestamp: '2024-05-01T10:00:00',
          position: 31,
          started: 0,
          total: 1800,
          device: 'device-1',
        },
      ])
      expect(results).toMatchObject([
        { actionId: 2, ok: false, error: { kind: 'ValidationError' } },
        { actionId: 1, ok: true },
      ])
    })
  })
})

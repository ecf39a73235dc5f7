import type { Episode } from '@root/types/library.types.js'
import type { CollectionsPhaseSummary } from '@root/types/sync.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { LibraryService } from '@services/library.service.js'
import { SyncService } from '@services/sync.service.js'
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import {
  createTestDatabaseService,
  resetDatabase,
} from '../../helpers/database.js'
import {
  FakeCollections,
  FakeFeedFetcher,
  FakeRemoteClient,
  makeFeed,
} from '../../helpers/fakes.js'
import { createMockLogger } from '../../mocks/logger.js'

const FEED = 'https://feeds.example.com/show'

describe('collection reconciliation', () => {
  let db: DatabaseService
  let remote: FakeRemoteClient
  let collections: FakeCollections
  let library: LibraryService
  let sync: SyncService
  let first: Episode
  let second: Episode

  beforeAll(async () => {
    db = await createTestDatabaseService()
  })

  afterAll(async () => {
    await db.close()
  })

  beforeEach(async () => {
    await resetDatabase()
    remote = new FakeRemoteClient()
    collections = new FakeCollections()
    remote.collections = collections
    const feeds = new FakeFeedFetcher().add(makeFeed(FEED))
    const log = createMockLogger()
    sync = new SyncService(log, {
      db,
      feeds,
      createClient: () => remote,
      settings: {
        feedConcurrency: 1,
        progressBatchSize: 10,
        fullSyncIntervalHours: 24,
        pendingActionRetentionDays: 30,
      },
    })
    library = new LibraryService(log, db, feeds, () => remote)

    await db.saveServerConfiguration({
      serverUrl: 'https://sync.example.com',
      protocol: 'podcast-service',
      username: 'alice',
      sessionToken: 'test-secret',
      isAuthenticated: true,
    })
    remote.addRemotely(FEED)
    await runCollections()
    collections.calls.length = 0

    first = await episode(`${FEED}/1.mp3`)
    second = await episode(`${FEED}/2.mp3`)
  })

  async function episode(audioUrl: string): Promise<Episode> {
    const found = await db.findEpisodeByAudioUrl(audioUrl)
    if (!found) throw new Error(`No episode for ${audioUrl}`)
    return found
  }

  async function runCollections(): Promise<CollectionsPhaseSummary | null> {
    const result = await sync.performSync({ mode: 'full' })
    if (result.outcome !== 'completed') {
      throw new Error('Expected a completed pass')
    }
    return result.summary.collections
  }

  async function linkEpisodes(): Promise<void> {
    await db.setEpisodeRemoteId(first.id, 'r1')
    await db.setEpisodeRemoteId(second.id, 'r2')
  }

  describe('queue', () => {
    it('should push local additions with their order, then mirror the server', async () => {
      await linkEpisodes()
      await library.enqueue(first.id)
      await library.enqueue(second.id)

      const summary = await runCollections()

      expect(collections.calls).toEqual([
        'addToQueue:r1',
        'addToQueue:r2',
        'reorderQueue:q-1,q-2',
        'getQueue',
        'getPlaylists',
      ])
      expect(summary).toEqual({ queueItems: 2, playlists: 0, failedPushes: 0 })
      expect(await db.getQueueItems()).toMatchObject([
        { episodeId: first.id, remoteId: 'q-1', position: 0, pendingOp: null },
        { episodeId: second.id, remoteId: 'q-2', position: 1, pendingOp: null },
      ])
    })

    it('should keep an addition pending while the episode has no server ID', async () => {
      await library.enqueue(first.id)

      const summary = await runCollections()

      expect(summary?.failedPushes).toBe(1)
      expect(collections.calls).toEqual(['getQueue', 'getPlaylists'])
      expect(await db.getQueueItems()).toMatchObject([
        { episodeId: first.id, remoteId: null, pendingOp: 'add' },
      ])
    })

    it('should push a removal of an item the server knows', async () => {
      await linkEpisodes()
      await library.enqueue(first.id)
      await library.enqueue(second.id)
      await runCollections()
      collections.calls.length = 0

      expect(await library.dequeue(first.id)).toBe(true)
      await runCollections()

      expect(collections.calls).toEqual([
        'removeFromQueue:q-1',
        'getQueue',
        'getPlaylists',
      ])
      expect(await db.getQueueItems(true)).toMatchObject([
        { episodeId: second.id, remoteId: 'q-2', position: 0, pendingOp: null },
      ])
    })

    it('should adopt the server order on the next pass', async () => {
      await linkEpisodes()
      await library.enqueue(first.id)
      await library.enqueue(second.id)
      await runCollections()

      await collections.reorderQueue(['q-2', 'q-1'])
      await runCollections()

      const queue = await db.getQueueItems()
      expect(queue.map((item) => item.episodeId)).toEqual([second.id, first.id])
    })
  })

  describe('playlists', () => {
    it('should create local playlists on the server and mirror server playlists', async () => {
      await linkEpisodes()
      collections.playlists = [
        {
          remoteId: 'srv-1',
          name: 'Commute',
          description: null,
          items: [
            { remoteId: 'item-2', remoteEpisodeId: 'unknown', position: 1 },
            { remoteId: 'item-1', remoteEpisodeId: 'r2', position: 0 },
          ],
        },
      ]
      await library.createPlaylist('Morning', 'Short shows')

      const summary = await runCollections()

      expect(collections.calls).toEqual([
        'getQueue',
        'createPlaylist:Morning',
        'getPlaylists',
      ])
      expect(summary?.playlists).toBe(2)

      const playlists = await db.getPlaylists()
      expect(playlists).toMatchObject([
        { name: 'Commute', remoteId: 'srv-1', needsSync: false },
        {
          name: 'Morning',
          remoteId: 'p-1',
          description: 'Short shows',
          needsSync: false,
        },
      ])
      expect(await db.getPlaylistItems(playlists[0].id)).toMatchObject([
        { remoteId: 'item-1', episodeId: second.id, position: 0 },
        { remoteId: 'item-2', episodeId: null, position: 1 },
      ])
    })

    it('should push a local deletion of a server playlist', async () => {
      collections.playlists = [
        { remoteId: 'srv-1', name: 'Commute', description: null, items: [] },
      ]
      await runCollections()
      const [commute] = await db.getPlaylists()
      collections.calls.length = 0

      await library.deletePlaylist(commute.id)
      expect(await db.getPlaylists()).toEqual([])

      await runCollections()

      expect(collections.calls).toEqual([
        'getQueue',
        'deletePlaylist:srv-1',
        'getPlaylists',
      ])
      expect(collections.playlists).toEqual([])
      expect(await db.getPlaylists(true)).toEqual([])
    })

    it('should push a rename and keep it over the server name', async () => {
      collections.playlists = [
        { remoteId: 'srv-1', name: 'Commute', description: null, items: [] },
      ]
      await runCollections()
      const [commute] = await db.getPlaylists()
      collections.calls.length = 0

      await library.renamePlaylist(commute.id, 'Drive')
      await runCollections()

      expect(collections.calls).toEqual([
        'getQueue',
        'updatePlaylist:srv-1',
        'getPlaylists',
      ])
      expect(collections.playlists[0].name).toBe('Drive')
      expect(await db.getPlaylistById(commute.id)).toMatchObject({
        name: 'Drive',
        needsSync: false,
      })
    })

    it('should delete a playlist removed on the server', async () => {
      collections.playlists = [
        { remoteId: 'srv-1', name: 'Commute', description: null, items: [] },
      ]
      await runCollections()

      collections.playlists = []
      await runCollections()

      expect(await db.getPlaylists(true)).toEqual([])
    })
  })

  it('should not run in smart mode', async () => {
    const result = await sync.performSync({ mode: 'smart' })

    expect(result).toMatchObject({
      outcome: 'completed',
      summary: { mode: 'smart', collections: null, skippedPhases: [] },
    })
    expect(collections.calls).toEqual([])
  })
})

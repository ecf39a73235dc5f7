import type { NewEpisode } from '@root/types/library.types.js'
import type { DatabaseService } from '@services/database.service.js'
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import {
  createTestDatabaseService,
  resetDatabase,
} from '../../../helpers/database.js'
import { makeFeed } from '../../../helpers/fakes.js'

const FEED = 'https://feeds.example.com/show'

describe('episode methods', () => {
  let db: DatabaseService
  let subscriptionId: number

  beforeAll(async () => {
    db = await createTestDatabaseService()
  })

  afterAll(async () => {
    await db.close()
  })

  beforeEach(async () => {
    await resetDatabase()
    const subscription = await db.insertSubscription({
      feedUrl: FEED,
      subscribed: true,
      needsSync: false,
      metadata: { title: 'Show', author: null, description: null, artworkUrl: null },
    })
    subscriptionId = subscription.id
  })

  describe('insertEpisodes', () => {
    it('should count only the episodes it stored', async () => {
      const { episodes } = makeFeed(FEED, 2)

      expect(await db.insertEpisodes(subscriptionId, episodes)).toBe(2)
      expect(
        await db.insertEpisodes(subscriptionId, makeFeed(FEED, 3).episodes),
      ).toBe(1)
      expect(await db.getEpisodesForSubscription(subscriptionId)).toHaveLength(3)
    })

    it('should store concurrent inserts of the same feed once', async () => {
      const { episodes } = makeFeed(FEED, 2)

      const counts = await Promise.all([
        db.insertEpisodes(subscriptionId, episodes),
        db.insertEpisodes(subscriptionId, episodes),
      ])

      expect([...counts].sort()).toEqual([0, 2])
      expect(await db.getEpisodesForSubscription(subscriptionId)).toHaveLength(2)
    })

    it('should keep the first of duplicate GUIDs', async () => {
      const [episode] = makeFeed(FEED, 1).episodes
      const duplicates: NewEpisode[] = [
        { ...episode, title: 'First copy' },
        { ...episode, title: 'Second copy' },
      ]

      expect(await db.insertEpisodes(subscriptionId, duplicates)).toBe(1)
      const [stored] = await db.getEpisodesForSubscription(subscriptionId)
      expect(stored.title).toBe('First copy')
    })
  })

  describe('updateEpisodeMetadata', () => {
    it('should update metadata and leave playback state alone', async () => {
      await db.insertEpisodes(subscriptionId, makeFeed(FEED, 1).episodes)
      const [episode] = await db.getEpisodesForSubscription(subscriptionId)
      await db.updateEpisodeProgress(episode.id, {
        position: 120,
        played: false,
        needsSync: true,
      })

      const updated = await db.updateEpisodeMetadata(subscriptionId, episode.guid, {
        audioUrl: `${FEED}/moved.mp3`,
        title: 'Renamed',
      })

      expect(updated).toBe(true)
      expect(await db.getEpisodeById(episode.id)).toMatchObject({
        audioUrl: `${FEED}/moved.mp3`,
        title: 'Renamed',
        duration: 1800,
        position: 120,
        needsSync: true,
      })
    })

    it('should report an unknown GUID', async () => {
      expect(
        await db.updateEpisodeMetadata(subscriptionId, 'unknown', { title: 'x' }),
      ).toBe(false)
    })
  })
})

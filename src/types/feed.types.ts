import type { NewEpisode, PodcastMetadata } from '@root/types/library.types.js'

export interface ParsedFeed extends PodcastMetadata {
  feedUrl: string
  episodes: NewEpisode[]
}

export interface FeedFetcher {
  /**
   * Fetches and parses a podcast feed.
   * Rejects with a NetworkError when unreachable, DecodingError when invalid.
   */
  parseFeed(url: string): Promise<ParsedFeed>
}

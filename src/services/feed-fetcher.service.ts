/**
 * Feed Fetcher Service
 *
 * Downloads podcast RSS feeds and normalizes them for materialization.
 *
 * Responsible for:
 * - Fetching feeds with a per-request timeout
 * - Parsing RSS/iTunes metadata with rss-parser
 * - Mapping items to episodes, keyed by GUID with the enclosure URL as
 *   fallback
 */
import {
  decodingError,
  isSyncError,
  validationError,
} from '@root/types/errors.js'
import type { FeedFetcher, ParsedFeed } from '@root/types/feed.types.js'
import type { NewEpisode } from '@root/types/library.types.js'
import { readBody, sendRequest } from '@services/remote/http-client.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import Parser from 'rss-parser'

interface ItunesItemFields {
  itunes?: {
    duration?: string
    image?: string
  }
}

type FeedItem = Parser.Item & ItunesItemFields

/**
 * Parses an itunes:duration value: plain seconds, MM:SS or HH:MM:SS.
 */
export function parseDuration(value: string | undefined): number | null {
  if (!value) return null
  const parts = value.trim().split(':')
  if (parts.length > 3 || parts.some((part) => !/^\d+(\.\d+)?$/.test(part))) {
    return null
  }
  return parts.reduce((total, part) => total * 60 + Number(part), 0)
}

function parsePublished(item: FeedItem): Date | null {
  const raw = item.isoDate ?? item.pubDate
  if (!raw) return null
  const date = new Date(raw)
  return Number.isNaN(date.getTime()) ? null : date
}

export class FeedFetcherService implements FeedFetcher {
  private readonly log: FastifyBaseLogger
  private readonly parser = new Parser<Record<string, unknown>, ItunesItemFields>()

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly timeoutMs: number,
  ) {
    this.log = createServiceLogger(baseLog, 'FEED_FETCHER')
  }

  /**
   * @throws SyncError NetworkError when the feed cannot be downloaded,
   * DecodingError when it is not a parseable feed
   */
  async parseFeed(url: string): Promise<ParsedFeed> {
    const xml = await this.download(url)

    let feed: Parser.Output<ItunesItemFields>
    try {
      feed = await this.parser.parseString(xml)
    } catch (error) {
      throw decodingError(`Invalid feed at ${url}`, error)
    }

    const episodes: NewEpisode[] = []
    for (const item of feed.items) {
      const episode = this.toEpisode(item)
      if (episode) episodes.push(episode)
    }

    this.log.debug(
      { url, items: feed.items.length, episodes: episodes.length },
      'Parsed feed',
    )

    return {
      feedUrl: url,
      title: feed.title ?? null,
      author: feed.itunes?.author ?? null,
      description: feed.description ?? null,
      artworkUrl: feed.itunes?.image ?? feed.image?.url ?? null,
      episodes,
    }
  }

  private async download(url: string): Promise<string> {
    try {
      const response = await sendRequest(url, {
        headers: {
          Accept:
            'application/rss+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5',
        },
        timeoutMs: this.timeoutMs,
      })
      return await readBody(response, url)
    } catch (error) {
      // A feed behind auth says nothing about the sync session
      if (isSyncError(error) && error.kind === 'NoSession') {
        throw validationError(`Feed at ${url} requires authentication`, error)
      }
      throw error
    }
  }

  private toEpisode(item: FeedItem): NewEpisode | null {
    const audioUrl = item.enclosure?.url ?? null
    const guid = item.guid ?? audioUrl ?? item.link
    if (!guid) return null

    return {
      guid,
      audioUrl,
      title: item.title ?? null,
      description: item.contentSnippet ?? item.content ?? null,
      publishedAt: parsePublished(item),
      duration: parseDuration(item.itunes?.duration),
      artworkUrl: item.itunes?.image ?? null,
    }
  }
}

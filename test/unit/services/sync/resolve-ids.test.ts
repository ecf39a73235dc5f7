import type { ServerConfiguration } from '@root/types/library.types.js'
import {
  resolveActiveSession,
  resolveRemoteEpisodeId,
  resolveRemoteSubscriptionId,
} from '@services/sync/resolve-ids.js'
import { describe, expect, it } from 'vitest'

const FEED = 'https://feeds.example.com/show'

describe('resolveRemoteSubscriptionId', () => {
  it('should prefer the stored remote ID', () => {
    expect(
      resolveRemoteSubscriptionId(
        { remoteId: 'sub-1', feedUrl: FEED },
        { feedUrlIdentity: true, bulkProgressUpload: false },
      ),
    ).toBe('sub-1')
  })

  it('should fall back to the feed URL on URL-keyed servers', () => {
    expect(
      resolveRemoteSubscriptionId(
        { remoteId: null, feedUrl: FEED },
        { feedUrlIdentity: true, bulkProgressUpload: false },
      ),
    ).toBe(FEED)
  })

  it('should return null when the server never issued an ID', () => {
    expect(
      resolveRemoteSubscriptionId(
        { remoteId: null, feedUrl: FEED },
        { feedUrlIdentity: false, bulkProgressUpload: true },
      ),
    ).toBeNull()
  })
})

describe('resolveRemoteEpisodeId', () => {
  it('should prefer the episode ID linked after the action was recorded', () => {
    expect(
      resolveRemoteEpisodeId({ episodeRemoteId: 'ep-2', remoteEpisodeId: 'ep-1' }),
    ).toBe('ep-2')
    expect(
      resolveRemoteEpisodeId({ episodeRemoteId: null, remoteEpisodeId: 'ep-1' }),
    ).toBe('ep-1')
  })
})

describe('resolveActiveSession', () => {
  const complete: ServerConfiguration = {
    serverUrl: 'https://sync.example.com',
    protocol: 'gpodder',
    username: 'alice',
    sessionToken: 'test-secret',
    isAuthenticated: true,
  }

  it('should build a session from a complete configuration', () => {
    expect(resolveActiveSession(complete)).toEqual({
      serverUrl: 'https://sync.example.com',
      protocol: 'gpodder',
      username: 'alice',
      sessionToken: 'test-secret',
    })
  })

  const incomplete: Array<[string, ServerConfiguration]> = [
    ['not authenticated', { ...complete, isAuthenticated: false }],
    ['no token', { ...complete, sessionToken: null }],
    ['no server', { ...complete, serverUrl: null }],
    ['no protocol', { ...complete, protocol: null }],
    ['no username', { ...complete, username: null }],
  ]

  it.each(incomplete)('should return null with %s', (_label, config) => {
    expect(resolveActiveSession(config)).toBeNull()
  })
})

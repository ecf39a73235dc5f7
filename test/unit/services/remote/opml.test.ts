import { isOpml, parseOpmlFeedUrls } from '@services/remote/opml.js'
import { describe, expect, it } from 'vitest'

const OPML = `<?xml version="1.0" encoding="utf-8"?>
<opml version="2.0">
  <head><title>Subscriptions</title></head>
  <body>
    <outline text="First" type="rss" xmlUrl="https://feeds.example.com/a?x=1&amp;y=2" />
    <outline text="Second" type="rss" xmlUrl='https://feeds.example.com/b' />
    <outline text="Duplicate" type="rss" xmlUrl="https://feeds.example.com/b" />
    <outline text="Folder">
      <outline text="Nested" type="rss" xmlUrl=" https://feeds.example.com/c " />
    </outline>
    <outline text="Empty" xmlUrl="" />
  </body>
</opml>`

describe('OPML', () => {
  it('should recognise OPML documents', () => {
    expect(isOpml(OPML)).toBe(true)
    expect(isOpml('["https://feeds.example.com/a"]')).toBe(false)
  })

  it('should extract feed URLs in document order without duplicates', () => {
    expect(parseOpmlFeedUrls(OPML)).toEqual([
      'https://feeds.example.com/a?x=1&y=2',
      'https://feeds.example.com/b',
      'https://feeds.example.com/c',
    ])
  })

  it('should return nothing for a document without outlines', () => {
    expect(parseOpmlFeedUrls('<opml><body></body></opml>')).toEqual([])
  })
})

const XML_URL_PATTERN = /\bxmlUrl\s*=\s*(?:"([^"]*)"|'([^']*)')/g

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
}

function decodeEntities(value: string): string {
  return value.replace(/&(?:amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity)
}

export function isOpml(body: string): boolean {
  return /<opml[\s>]/i.test(body)
}

/**
 * Extracts the feed URLs of an OPML document's outlines, in document order,
 * without duplicates.
 */
export function parseOpmlFeedUrls(body: string): string[] {
  const urls = new Set<string>()
  for (const match of body.matchAll(XML_URL_PATTERN)) {
    const raw = match[1] ?? match[2]
    if (!raw) continue
    const url = decodeEntities(raw).trim()
    if (url) urls.add(url)
  }
  return [...urls]
}

/**
 * Date serialization utilities
 *
 * Timestamps are stored as ISO 8601 strings so that string order matches
 * chronological order in SQL comparisons.
 */

/**
 * Serializes a date value to an ISO 8601 string, passing strings through.
 */
export function serializeDate(
  date: Date | string | null | undefined,
): string | null {
  if (!date) return null
  return typeof date === 'string' ? date : date.toISOString()
}

/**
 * Parses a stored timestamp. Unparseable values read as null.
 */
export function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? null : date
}

export function maxDate(a: Date | null, b: Date): Date {
  return a && a.getTime() > b.getTime() ? a : b
}

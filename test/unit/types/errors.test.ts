import {
  attempt,
  isSyncError,
  kindForStatus,
  SyncError,
  toSyncError,
} from '@root/types/errors.js'
import { ZodError } from 'zod'
import { describe, expect, it } from 'vitest'

describe('SyncError', () => {
  it('should carry its kind and status', () => {
    const error = new SyncError('NotFound', 'gone', { status: 404 })

    expect(error).toBeInstanceOf(Error)
    expect(isSyncError(error)).toBe(true)
    expect(error.name).toBe('SyncError')
    expect(error.kind).toBe('NotFound')
    expect(error.status).toBe(404)
  })
})

describe('kindForStatus', () => {
  it.each([
    [401, 'NoSession'],
    [403, 'NoSession'],
    [404, 'NotFound'],
    [409, 'Conflict'],
    [429, 'NetworkError'],
    [500, 'NetworkError'],
    [503, 'NetworkError'],
    [400, 'ValidationError'],
    [422, 'ValidationError'],
  ])('should map %i to %s', (status, kind) => {
    expect(kindForStatus(status)).toBe(kind)
  })
})

describe('toSyncError', () => {
  it('should pass SyncErrors through', () => {
    const error = new SyncError('Conflict', 'exists')

    expect(toSyncError(error, 'ignored')).toBe(error)
  })

  it('should classify fetch failures as network errors', () => {
    const error = toSyncError(new TypeError('fetch failed'), 'Fetching queue')

    expect(error.kind).toBe('NetworkError')
    expect(error.message).toBe('Fetching queue: fetch failed')
  })

  it('should classify timeouts as network errors', () => {
    const timeout = new Error('The operation timed out')
    timeout.name = 'TimeoutError'

    expect(toSyncError(timeout).kind).toBe('NetworkError')
  })

  it('should classify parse failures as decoding errors', () => {
    expect(toSyncError(new SyntaxError('Unexpected token')).kind).toBe(
      'DecodingError',
    )
    expect(toSyncError(new ZodError([])).kind).toBe('DecodingError')
  })

  it('should classify SQLite failures as local store errors', () => {
    const error = Object.assign(new Error('database is locked'), {
      code: 'SQLITE_BUSY',
    })

    expect(toSyncError(error).kind).toBe('LocalStoreError')
  })

  it('should wrap non-errors', () => {
    expect(toSyncError('boom')).toMatchObject({
      kind: 'NetworkError',
      message: 'boom',
    })
  })
})

describe('attempt', () => {
  it('should capture the value', async () => {
    expect(await attempt(async () => 42)).toEqual({ ok: true, value: 42 })
  })

  it('should capture a failure as a SyncError', async () => {
    const result = await attempt(async () => {
      throw new TypeError('fetch failed')
    }, 'Fetching progress')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe('NetworkError')
      expect(result.error.message).toBe('Fetching progress: fetch failed')
    }
  })
})

import type { HealthCheckResponse } from '@schemas/health/health.schema.js'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { build } from '../../helpers/app.js'
import {
  initializeTestDatabase,
  resetDatabase,
} from '../../helpers/database.js'

describe('Health Endpoint', () => {
  beforeEach(async () => {
    await initializeTestDatabase()
    await resetDatabase()
  })

  it('should report a healthy store and an idle sync', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    const body = response.json<HealthCheckResponse>()
    expect(body.status).toBe('healthy')
    expect(body.checks.database).toBe('ok')
    expect(body.sync).toEqual({
      running: false,
      lastStatus: 'idle',
      lastSyncAttemptAt: null,
    })
    expect(body.timestamp).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/,
    )
  })

  it('should stay healthy after a failed sync pass', async (ctx) => {
    const app = await build(ctx)
    await app.db.updateSyncState({
      status: 'failed',
      lastError: 'connection refused',
      lastSyncAttemptAt: new Date('2024-05-01T10:00:00.000Z'),
    })

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(200)
    expect(response.json<HealthCheckResponse>().sync).toEqual({
      running: false,
      lastStatus: 'failed',
      lastSyncAttemptAt: '2024-05-01T10:00:00.000Z',
    })
  })

  it('should return 503 when the local store is unavailable', async (ctx) => {
    const app = await build(ctx)
    vi.spyOn(app.db, 'getSyncState').mockRejectedValue(
      new Error('SQLITE_CANTOPEN'),
    )

    const response = await app.inject({ method: 'GET', url: '/health' })

    expect(response.statusCode).toBe(503)
    const body = response.json<HealthCheckResponse>()
    expect(body.status).toBe('unhealthy')
    expect(body.checks.database).toBe('failed')
    expect(body.sync.lastStatus).toBeNull()
  })
})

import type { FastifyBaseLogger } from 'fastify'
import { vi } from 'vitest'

/**
 * Create a mock Fastify logger for testing
 *
 * Every level is a vi.fn(); child() returns a fresh mock, so assertions on
 * a service's prefixed logger go through `logger.child.mock.results`.
 *
 * @example
 * const logger = createMockLogger()
 * const service = new SyncService(logger, deps)
 */
export function createMockLogger(): FastifyBaseLogger {
  const mockLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
    silent: vi.fn(),
    level: 'info',
  } as unknown as FastifyBaseLogger

  mockLogger.child = vi.fn(() => createMockLogger())

  return mockLogger
}

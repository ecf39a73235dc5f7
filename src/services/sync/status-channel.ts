import { EventEmitter, on } from 'node:events'
import type {
  SyncRunState,
  SyncStatusEvent,
} from '@root/types/sync.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export type SyncStatusListener = (event: SyncStatusEvent) => void

/**
 * Publishes the orchestrator's run state as immutable values. Consumers
 * (the SSE route, tests) subscribe; nothing reads orchestrator fields
 * directly.
 */
export class SyncStatusChannel {
  private readonly emitter = new EventEmitter()
  private readonly log: FastifyBaseLogger
  private latest: SyncStatusEvent = Object.freeze({
    state: 'idle',
    message: null,
    at: new Date(),
  })

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'SYNC_STATUS')
    // One listener per SSE client
    this.emitter.setMaxListeners(100)
  }

  get current(): SyncStatusEvent {
    return this.latest
  }

  publish(state: SyncRunState, message: string | null = null): SyncStatusEvent {
    const event: SyncStatusEvent = Object.freeze({
      state,
      message,
      at: new Date(),
    })
    this.latest = event
    this.log.trace({ event }, 'Publishing sync status')
    this.emitter.emit('status', event)
    return event
  }

  /**
   * @returns A function that removes the listener
   */
  subscribe(listener: SyncStatusListener): () => void {
    this.emitter.on('status', listener)
    return () => {
      this.emitter.off('status', listener)
    }
  }

  /**
   * Yields every event published until `signal` aborts, at which point the
   * iterator rejects with an AbortError.
   */
  async *stream(signal: AbortSignal): AsyncGenerator<SyncStatusEvent> {
    for await (const [event] of on(this.emitter, 'status', { signal })) {
      yield event
    }
  }

  get listenerCount(): number {
    return this.emitter.listenerCount('status')
  }
}

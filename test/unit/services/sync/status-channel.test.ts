import { SyncStatusChannel } from '@services/sync/status-channel.js'
import type { SyncStatusEvent } from '@root/types/sync.types.js'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'

describe('SyncStatusChannel', () => {
  it('should start idle', () => {
    const channel = new SyncStatusChannel(createMockLogger())

    expect(channel.current).toMatchObject({ state: 'idle', message: null })
  })

  it('should publish frozen events to subscribers', () => {
    const channel = new SyncStatusChannel(createMockLogger())
    const received: SyncStatusEvent[] = []
    channel.subscribe((event) => received.push(event))

    const event = channel.publish('running', 'Running full sync')

    expect(received).toEqual([event])
    expect(channel.current).toBe(event)
    expect(Object.isFrozen(event)).toBe(true)
  })

  it('should stop delivering after unsubscribe', () => {
    const channel = new SyncStatusChannel(createMockLogger())
    const received: string[] = []
    const unsubscribe = channel.subscribe((event) => received.push(event.state))

    channel.publish('running')
    unsubscribe()
    channel.publish('completed')

    expect(received).toEqual(['running'])
    expect(channel.listenerCount).toBe(0)
  })

  it('should stream events until aborted', async () => {
    const channel = new SyncStatusChannel(createMockLogger())
    const controller = new AbortController()
    const states: string[] = []

    const consumer = (async () => {
      try {
        for await (const event of channel.stream(controller.signal)) {
          states.push(event.state)
          if (event.state === 'completed') controller.abort()
        }
      } catch (error) {
        if (!(error instanceof Error) || error.name !== 'AbortError') throw error
      }
    })()

    // Let the consumer attach its listener
    await new Promise((resolve) => setImmediate(resolve))
    channel.publish('running')
    channel.publish('completed')
    await consumer

    expect(states).toEqual(['running', 'completed'])
    expect(channel.listenerCount).toBe(0)
  })
})

import { describe, it, expect } from '@jest/globals'
import { captureLogger } from '../testing/capture-logger.js'
import type { RealtimeMessage } from '../types/events.js'
import { SubscriberHub, type Subscriber } from './hub.js'

function recorder(id: string, accepts?: (message: RealtimeMessage) => boolean) {
  const received: RealtimeMessage[] = []
  const subscriber: Subscriber = {
    id,
    transport: 'websocket',
    send: (message) => {
      received.push(message)
    },
    accepts,
  }
  return { subscriber, received }
}

const message: RealtimeMessage = { type: 'ReceiveLog', payload: { id: 'event-1' } }

describe('SubscriberHub', () => {
  it('should deliver a message to every subscriber once', async () => {
    const hub = new SubscriberHub(captureLogger().logger)
    const first = recorder('a')
    const second = recorder('b')
    hub.subscribe(first.subscriber)
    hub.subscribe(second.subscriber)
    hub.subscribe(first.subscriber)

    await hub.publish(message)

    expect(first.received).toEqual([message])
    expect(second.received).toEqual([message])
  })

  it('should skip subscribers whose filter rejects the message', async () => {
    const hub = new SubscriberHub(captureLogger().logger)
    const filtered = recorder('a', () => false)
    hub.subscribe(filtered.subscriber)

    await hub.publish(message)

    expect(filtered.received).toEqual([])
    expect(hub.size).toBe(1)
  })

  it('should stop delivering after unsubscribe', async () => {
    const hub = new SubscriberHub(captureLogger().logger)
    const { subscriber, received } = recorder('a')
    const unsubscribe = hub.subscribe(subscriber)

    unsubscribe()
    await hub.publish(message)

    expect(received).toEqual([])
    expect(hub.size).toBe(0)
  })

  it('should drop a failing subscriber without affecting the others', async () => {
    const { logger, entries } = captureLogger()
    const hub = new SubscriberHub(logger)
    const healthy = recorder('healthy')
    hub.subscribe({
      id: 'broken',
      transport: 'sse',
      send: async () => {
        throw new Error('stream closed')
      },
    })
    hub.subscribe(healthy.subscriber)

    await expect(hub.publish(message)).resolves.toBeUndefined()

    expect(healthy.received).toEqual([message])
    expect(hub.size).toBe(1)
    expect(entries.filter((entry) => entry.severity === 'WARNING').map((entry) => entry.message)).toEqual([
      'Dropped subscriber after failed delivery: stream closed',
    ])
  })

  it('should deliver to the snapshot taken when publishing started', async () => {
    const hub = new SubscriberHub(captureLogger().logger)
    const late = recorder('late')
    hub.subscribe({
      id: 'joiner',
      transport: 'websocket',
      send: () => {
        hub.subscribe(late.subscriber)
      },
    })

    await hub.publish(message)

    expect(late.received).toEqual([])
    expect(hub.size).toBe(2)
  })
})

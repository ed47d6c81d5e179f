import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { captureLogger, type LogEntry } from '../../testing/capture-logger.js'
import {
  SseProvider,
  type EventStreamFactory,
  type EventStreamListeners,
  type FetchInit,
  type FetchLike,
} from './sse-provider.js'

interface FakeStream {
  readonly url: string
  readonly token: string
  readonly listeners: EventStreamListeners
  closed: boolean
}

interface FetchCall {
  readonly input: string
  readonly init: FetchInit
}

const STREAM_URL = 'http://localhost:3000/api/event-logs/stream'

describe('SseProvider', () => {
  let streams: FakeStream[]
  let fetchCalls: FetchCall[]
  let nextResponse: { status: number; body: unknown }
  let entries: LogEntry[]
  let provider: SseProvider

  const streamFactory: EventStreamFactory = (url, token, listeners) => {
    const stream: FakeStream = { url, token, listeners, closed: false }
    streams.push(stream)
    return {
      close: () => {
        stream.closed = true
      },
    }
  }

  const fakeFetch: FetchLike = async (input, init) => {
    fetchCalls.push({ input, init })
    const { status, body } = nextResponse
    return { ok: status < 400, status, json: async () => body }
  }

  function current(): FakeStream {
    const stream = streams[streams.length - 1]
    if (!stream) throw new Error('no stream opened')
    return stream
  }

  async function connected(): Promise<FakeStream> {
    const connecting = provider.connect(STREAM_URL, 'token-1')
    current().listeners.onOpen()
    await connecting
    return current()
  }

  beforeEach(() => {
    jest.useFakeTimers()
    streams = []
    fetchCalls = []
    nextResponse = { status: 200, body: {} }
    const captured = captureLogger()
    entries = captured.entries
    provider = new SseProvider({ logger: captured.logger, streamFactory, fetch: fakeFetch })
  })

  afterEach(async () => {
    await provider.disconnect()
    jest.useRealTimers()
  })

  it('should open the stream with the bearer token', async () => {
    const stream = await connected()
    expect(stream.url).toBe(STREAM_URL)
    expect(stream.token).toBe('token-1')
  })

  it('should dispatch event messages to handlers', async () => {
    const stream = await connected()
    const received: unknown[] = []
    provider.on('ReceiveLog', (payload) => received.push(payload))

    stream.listeners.onMessage(JSON.stringify({ type: 'ReceiveLog', payload: { id: 'e1' } }))
    stream.listeners.onMessage('not json')

    expect(received).toEqual([{ id: 'e1' }])
    expect(entries.some((entry) => entry.message === 'Ignored malformed realtime message')).toBe(true)
  })

  it('should reject connect when the stream fails before opening', async () => {
    const connecting = provider.connect(STREAM_URL, 'token-1')
    current().listeners.onError(new Error('refused'))

    await expect(connecting).rejects.toThrow('refused')
    expect(current().closed).toBe(true)
  })

  it('should close the stream on error and reopen it after the fixed delay', async () => {
    const first = await connected()

    first.listeners.onError(new Error('lost'))
    expect(first.closed).toBe(true)
    jest.advanceTimersByTime(2999)
    expect(streams).toHaveLength(1)
    jest.advanceTimersByTime(1)

    expect(streams).toHaveLength(2)
    expect(current().url).toBe(STREAM_URL)
  })

  it('should not reopen after disconnect', async () => {
    const stream = await connected()

    await provider.disconnect()
    jest.advanceTimersByTime(10_000)

    expect(stream.closed).toBe(true)
    expect(streams).toHaveLength(1)
  })

  it('should post invocations beside the stream endpoint', async () => {
    await connected()
    nextResponse = { status: 200, body: { type: 'result', id: 'ignored', result: { serverTime: 'now' } } }

    await expect(provider.invoke('Ping', 'a')).resolves.toEqual({ serverTime: 'now' })

    const [call] = fetchCalls
    expect(call?.input).toBe('http://localhost:3000/api/event-logs/invoke')
    expect(call?.init.method).toBe('POST')
    expect(call?.init.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer token-1' })
    expect(JSON.parse(call?.init.body ?? '{}')).toEqual({
      type: 'invoke',
      id: expect.any(String),
      method: 'Ping',
      args: ['a'],
    })
  })

  it('should reject invocations answered with an error', async () => {
    await connected()
    nextResponse = { status: 200, body: { type: 'error', id: 'x', message: 'Unknown method: Nope' } }

    await expect(provider.invoke('Nope')).rejects.toThrow('Unknown method: Nope')
  })

  it('should reject invocations whose response is not a reply', async () => {
    await connected()
    nextResponse = { status: 401, body: { error: 'Unauthorized' } }

    await expect(provider.invoke('Ping')).rejects.toThrow('Invocation Ping failed with status 401')
  })

  it('should refuse to invoke before connecting', async () => {
    await expect(provider.invoke('Ping')).rejects.toThrow('Realtime connection is not open, cannot invoke Ping')
    expect(fetchCalls).toHaveLength(0)
  })
})

import EventSource from 'eventsource'
import { randomUUID } from 'node:crypto'
import { ExternalServiceError, errorMessage } from '../../lib/errors.js'
import { INVOKE_PATH, replyMessageSchema } from '../protocol.js'
import { ReconnectingProvider, type ProviderOptions } from './reconnecting-provider.js'

export interface EventStreamListeners {
  onOpen(): void
  onMessage(text: string): void
  onError(error: Error): void
}

/** SSE 接続の最小インターフェース（テストでは差し替える） */
export interface EventStreamLike {
  close(): void
}

export type EventStreamFactory = (url: string, token: string, listeners: EventStreamListeners) => EventStreamLike

export const openEventStream: EventStreamFactory = (url, token, listeners) => {
  const source = new EventSource(url, { headers: { Authorization: `Bearer ${token}` } })
  source.onopen = () => listeners.onOpen()
  source.onmessage = (event) => listeners.onMessage(String(event.data))
  source.onerror = () => listeners.onError(new Error(`Event stream connection to ${url} failed`))
  return { close: () => source.close() }
}

export interface FetchInit {
  method: string
  headers: Record<string, string>
  body: string
  signal?: AbortSignal
}

export type FetchLike = (input: string, init: FetchInit) => Promise<{
  ok: boolean
  status: number
  json(): Promise<unknown>
}>

export interface SseProviderOptions extends ProviderOptions {
  readonly streamFactory?: EventStreamFactory
  readonly fetch?: FetchLike
}

/**
 * SSE で配信を受け、呼び出しは HTTP POST で送る。
 * EventSource 自身の再試行は使わず、エラー時に閉じて固定間隔で開き直す。
 */
export class SseProvider extends ReconnectingProvider {
  private readonly streamFactory: EventStreamFactory
  private readonly fetchImpl: FetchLike
  private stream: EventStreamLike | undefined
  private endpoint: { url: string; token: string } | undefined

  constructor(options: SseProviderOptions) {
    super(options)
    this.streamFactory = options.streamFactory ?? openEventStream
    this.fetchImpl = options.fetch ?? fetch
  }

  async invoke(method: string, ...args: unknown[]): Promise<unknown> {
    if (!this.endpoint) {
      throw new ExternalServiceError(`Realtime connection is not open, cannot invoke ${method}`)
    }

    const id = randomUUID()
    const response = await this.fetchImpl(new URL(INVOKE_PATH, this.endpoint.url).toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${this.endpoint.token}` },
      body: JSON.stringify({ type: 'invoke', id, method, args }),
      signal: AbortSignal.timeout(this.invokeTimeoutMs),
    }).catch((error: unknown) => {
      throw new ExternalServiceError(`Invocation ${method} failed: ${errorMessage(error)}`, { cause: error })
    })

    const body: unknown = await response.json().catch(() => undefined)
    const reply = replyMessageSchema.safeParse(body)
    if (!reply.success) {
      throw new ExternalServiceError(`Invocation ${method} failed with status ${response.status}`)
    }
    if (reply.data.type === 'error') {
      throw new ExternalServiceError(reply.data.message)
    }
    return reply.data.result
  }

  protected open(url: string, token: string): Promise<void> {
    this.close()
    this.endpoint = { url, token }

    return new Promise((resolve, reject) => {
      let opened = false
      const stream = this.streamFactory(url, token, {
        onOpen: () => {
          opened = true
          this.logger.info('Event stream connected')
          resolve()
        },
        onMessage: (text) => this.dispatchText(text),
        onError: (error) => {
          if (this.stream !== stream) return
          this.logger.warn({ err: error }, 'Event stream error')
          this.stream = undefined
          stream.close()
          if (!opened) reject(error)
          this.connectionLost()
        },
      })
      this.stream = stream
    })
  }

  protected close(): void {
    const stream = this.stream
    this.stream = undefined
    this.endpoint = undefined
    stream?.close()
  }
}

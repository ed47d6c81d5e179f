import { randomUUID } from 'node:crypto'
import { WebSocket } from 'ws'
import { ExternalServiceError, errorMessage } from '../../lib/errors.js'
import { parseJson, rawDataToString, replyMessageSchema, type ReplyMessage } from '../protocol.js'
import { ReconnectingProvider, type ProviderOptions } from './reconnecting-provider.js'

export interface SocketListeners {
  onOpen(): void
  onMessage(text: string): void
  onError(error: Error): void
  onClose(): void
}

/** WebSocket 接続の最小インターフェース（テストでは差し替える） */
export interface SocketLike {
  isOpen(): boolean
  send(text: string): void
  close(): void
}

export type SocketFactory = (url: string, listeners: SocketListeners) => SocketLike

export const openWebSocket: SocketFactory = (url, listeners) => {
  const ws = new WebSocket(url)
  ws.on('open', () => listeners.onOpen())
  ws.on('message', (data) => listeners.onMessage(rawDataToString(data)))
  ws.on('error', (error) => listeners.onError(error))
  ws.on('close', () => listeners.onClose())
  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (text) => ws.send(text),
    close: () => ws.close(),
  }
}

/** http(s) のURLを ws(s) に変え、トークンをクエリに載せる */
export function toSocketUrl(url: string, token: string): string {
  const socketUrl = new URL(url)
  socketUrl.protocol = socketUrl.protocol === 'https:' || socketUrl.protocol === 'wss:' ? 'wss:' : 'ws:'
  socketUrl.searchParams.set('token', token)
  return socketUrl.toString()
}

interface PendingCall {
  resolve(value: unknown): void
  reject(error: Error): void
  timer: NodeJS.Timeout
}

export interface WebSocketProviderOptions extends ProviderOptions {
  readonly socketFactory?: SocketFactory
}

export class WebSocketProvider extends ReconnectingProvider {
  private readonly socketFactory: SocketFactory
  private readonly pending = new Map<string, PendingCall>()
  private socket: SocketLike | undefined

  constructor(options: WebSocketProviderOptions) {
    super(options)
    this.socketFactory = options.socketFactory ?? openWebSocket
  }

  async invoke(method: string, ...args: unknown[]): Promise<unknown> {
    const socket = this.socket
    if (!socket || !socket.isOpen()) {
      throw new ExternalServiceError(`Realtime connection is not open, cannot invoke ${method}`)
    }

    const id = randomUUID()
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id)
        reject(new ExternalServiceError(`Invocation ${method} timed out after ${this.invokeTimeoutMs} ms`))
      }, this.invokeTimeoutMs)
      this.pending.set(id, { resolve, reject, timer })
      try {
        socket.send(JSON.stringify({ type: 'invoke', id, method, args }))
      } catch (error) {
        this.settle(id, { type: 'error', id, message: errorMessage(error) })
      }
    })
  }

  protected open(url: string, token: string): Promise<void> {
    this.close()

    return new Promise((resolve, reject) => {
      let opened = false
      const socket = this.socketFactory(toSocketUrl(url, token), {
        onOpen: () => {
          opened = true
          this.logger.info('WebSocket connected')
          resolve()
        },
        onMessage: (text) => this.receive(text),
        onError: (error) => {
          this.logger.warn({ err: error }, 'WebSocket error')
          if (!opened) reject(error)
        },
        onClose: () => {
          if (this.socket !== socket) return
          this.socket = undefined
          this.failPending('Connection closed')
          this.logger.info('WebSocket disconnected')
          this.connectionLost()
        },
      })
      this.socket = socket
    })
  }

  protected close(): void {
    const socket = this.socket
    this.socket = undefined
    socket?.close()
    this.failPending('Connection closed')
  }

  private receive(text: string): void {
    const message = parseJson(text)
    const reply = replyMessageSchema.safeParse(message)
    if (reply.success) {
      if (reply.data.id === null || !this.pending.has(reply.data.id)) {
        this.logger.warn({ reply: reply.data }, 'Received reply without a pending invocation')
        return
      }
      this.settle(reply.data.id, reply.data)
      return
    }
    this.dispatch(message)
  }

  private settle(id: string, reply: ReplyMessage): void {
    const call = this.pending.get(id)
    if (!call) return
    this.pending.delete(id)
    clearTimeout(call.timer)
    if (reply.type === 'result') call.resolve(reply.result)
    else call.reject(new ExternalServiceError(reply.message))
  }

  private failPending(message: string): void {
    for (const [id, call] of this.pending) {
      this.pending.delete(id)
      clearTimeout(call.timer)
      call.reject(new ExternalServiceError(message))
    }
  }
}

import type { Logger } from '../../lib/logger.js'
import { eventMessageSchema, parseJson } from '../protocol.js'
import { HandlerRegistry } from './handler-registry.js'
import type { RealtimeHandler, RealtimeProvider } from './types.js'

export const DEFAULT_RECONNECT_DELAY_MS = 3000
export const DEFAULT_INVOKE_TIMEOUT_MS = 10_000

export interface ProviderOptions {
  readonly logger: Logger
  readonly reconnectDelayMs?: number
  readonly invokeTimeoutMs?: number
}

interface ConnectionTarget {
  readonly url: string
  readonly token: string
}

/**
 * 再接続とハンドラ管理を受け持つ基底クラス。
 * 接続が切れたら固定間隔で開き直す。disconnect() 後は再接続しない。
 */
export abstract class ReconnectingProvider implements RealtimeProvider {
  protected readonly logger: Logger
  protected readonly invokeTimeoutMs: number
  private readonly handlers: HandlerRegistry
  private readonly reconnectDelayMs: number
  private target: ConnectionTarget | undefined
  private explicitDisconnect = false
  private reconnectTimer: NodeJS.Timeout | undefined

  constructor(options: ProviderOptions) {
    this.logger = options.logger
    this.handlers = new HandlerRegistry(options.logger)
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS
    this.invokeTimeoutMs = options.invokeTimeoutMs ?? DEFAULT_INVOKE_TIMEOUT_MS
  }

  async connect(url: string, token: string): Promise<void> {
    this.target = { url, token }
    this.explicitDisconnect = false
    this.clearReconnect()
    await this.open(url, token)
  }

  async disconnect(): Promise<void> {
    this.explicitDisconnect = true
    this.clearReconnect()
    this.close()
  }

  on(event: string, handler: RealtimeHandler): void {
    this.handlers.on(event, handler)
  }

  off(event: string, handler?: RealtimeHandler): void {
    this.handlers.off(event, handler)
  }

  abstract invoke(method: string, ...args: unknown[]): Promise<unknown>

  /** 既存の接続があれば閉じてから開く。最初の open 前に失敗したら reject する */
  protected abstract open(url: string, token: string): Promise<void>

  /** 再接続を伴わずに現在の接続を閉じる */
  protected abstract close(): void

  /** 実装側から呼ぶ: 意図しない切断 */
  protected connectionLost(): void {
    if (this.explicitDisconnect || this.reconnectTimer || !this.target) return

    const { url, token } = this.target
    this.logger.info({ delayMs: this.reconnectDelayMs }, `Reconnecting in ${this.reconnectDelayMs}ms`)
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined
      if (this.explicitDisconnect) return
      // 失敗時は接続側の切断通知で次の再接続が予約される
      this.open(url, token).catch((error: unknown) => {
        this.logger.debug({ err: error }, 'Reconnect attempt failed')
      })
    }, this.reconnectDelayMs)
  }

  /** 配信メッセージ { type, payload } をハンドラへ渡す */
  protected dispatch(message: unknown): void {
    const parsed = eventMessageSchema.safeParse(message)
    if (!parsed.success) {
      this.logger.warn('Ignored malformed realtime message')
      return
    }
    this.handlers.emit(parsed.data.type, parsed.data.payload)
  }

  protected dispatchText(text: string): void {
    this.dispatch(parseJson(text))
  }

  private clearReconnect(): void {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer)
    this.reconnectTimer = undefined
  }
}

export type RealtimeHandler = (payload: unknown) => void

/** ライブ配信クライアントの共通インターフェース。実装はトランスポートごとに一つ */
export interface RealtimeProvider {
  connect(url: string, token: string): Promise<void>
  disconnect(): Promise<void>
  on(event: string, handler: RealtimeHandler): void
  off(event: string, handler?: RealtimeHandler): void
  invoke(method: string, ...args: unknown[]): Promise<unknown>
}

export const CLIENT_TRANSPORTS = ['websocket', 'sse'] as const
export type ClientTransport = (typeof CLIENT_TRANSPORTS)[number]

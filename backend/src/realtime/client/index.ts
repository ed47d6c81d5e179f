import type { Logger } from '../../lib/logger.js'
import type { ProviderOptions } from './reconnecting-provider.js'
import { SseProvider } from './sse-provider.js'
import type { ClientTransport, RealtimeProvider } from './types.js'
import { WebSocketProvider } from './websocket-provider.js'

export { HandlerRegistry } from './handler-registry.js'
export { DEFAULT_INVOKE_TIMEOUT_MS, DEFAULT_RECONNECT_DELAY_MS, ReconnectingProvider } from './reconnecting-provider.js'
export { SseProvider, openEventStream } from './sse-provider.js'
export type { EventStreamFactory, EventStreamLike, EventStreamListeners, FetchLike } from './sse-provider.js'
export { WebSocketProvider, openWebSocket, toSocketUrl } from './websocket-provider.js'
export type { SocketFactory, SocketLike, SocketListeners } from './websocket-provider.js'
export type { ClientTransport, RealtimeHandler, RealtimeProvider } from './types.js'
export { CLIENT_TRANSPORTS } from './types.js'

/** 設定値でトランスポートを選ぶ */
export function createRealtimeProvider(
  transport: ClientTransport,
  logger: Logger,
  options: Omit<ProviderOptions, 'logger'> = {},
): RealtimeProvider {
  switch (transport) {
    case 'websocket':
      return new WebSocketProvider({ ...options, logger })
    case 'sse':
      return new SseProvider({ ...options, logger })
  }
}

import { randomUUID } from 'node:crypto'
import type { IncomingMessage, Server } from 'node:http'
import type { Duplex } from 'node:stream'
import { WebSocket, WebSocketServer } from 'ws'
import { canSeeMessage } from '../lib/audit-log.js'
import { errorMessage } from '../lib/errors.js'
import { verifyToken } from '../lib/jwt.js'
import type { Logger } from '../lib/logger.js'
import type { Identity } from '../types/auth.js'
import type { RealtimeMessage } from '../types/events.js'
import type { SubscriberHub } from './hub.js'
import { answerInvocation, type InvocationHandler } from './methods.js'
import { parseJson, rawDataToString } from './protocol.js'

export const WEBSOCKET_PATH = '/ws/event-logs'

export interface WebSocketTransportDeps {
  readonly hub: SubscriberHub
  readonly invoke: InvocationHandler
  readonly secret: string
  readonly logger: Logger
  readonly path?: string
}

function rejectUpgrade(socket: Duplex, status: 401 | 404, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`)
  socket.destroy()
}

/**
 * HTTPサーバーの upgrade を受けて WebSocket 購読者をハブに登録する。
 * トークンはクエリパラメータ token で受け取る。
 */
export function attachWebSocketTransport(server: Server, deps: WebSocketTransportDeps): WebSocketServer {
  const path = deps.path ?? WEBSOCKET_PATH
  const wss = new WebSocketServer({ noServer: true })

  const onUpgrade = async (request: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> => {
    const url = new URL(request.url ?? '/', 'http://localhost')
    if (url.pathname !== path) {
      rejectUpgrade(socket, 404, 'Not Found')
      return
    }

    const token = url.searchParams.get('token')
    const identity = token ? await verifyToken(token, deps.secret) : null
    if (!identity) {
      rejectUpgrade(socket, 401, 'Unauthorized')
      return
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      handleConnection(ws, identity, deps)
    })
  }

  server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    onUpgrade(request, socket, head).catch((error: unknown) => {
      deps.logger.error({ err: error }, 'WebSocket upgrade failed')
      socket.destroy()
    })
  })

  return wss
}

function handleConnection(ws: WebSocket, identity: Identity, deps: WebSocketTransportDeps): void {
  const { hub, logger } = deps
  const subscriberId = randomUUID()

  const sendJson = (message: unknown) =>
    new Promise<void>((resolve, reject) => {
      if (ws.readyState !== WebSocket.OPEN) {
        reject(new Error('WebSocket is not open'))
        return
      }
      ws.send(JSON.stringify(message), (error) => (error ? reject(error) : resolve()))
    })

  const unsubscribe = hub.subscribe({
    id: subscriberId,
    transport: 'websocket',
    accepts: (message: RealtimeMessage) => canSeeMessage(identity, message),
    send: sendJson,
  })

  ws.on('message', (data) => {
    answerInvocation(deps.invoke, identity, parseJson(rawDataToString(data)), logger)
      .then(sendJson)
      .catch((error: unknown) => {
        logger.warn({ subscriberId, err: error }, `Failed to answer invocation: ${errorMessage(error)}`)
      })
  })

  ws.on('close', () => {
    unsubscribe()
  })

  ws.on('error', (error) => {
    logger.warn({ subscriberId, err: error }, 'WebSocket connection error')
  })

  logger.info({ subscriberId, userId: identity.userId }, 'WebSocket subscriber connected')
}

import { randomUUID } from 'node:crypto'
import { Hono } from 'hono'
import { streamSSE } from 'hono/streaming'
import { canSeeMessage, toLogNotification, type AuditLog } from '../lib/audit-log.js'
import type { Logger } from '../lib/logger.js'
import { currentIdentity, requireAuth } from '../middleware/auth.js'
import type { SubscriberHub } from '../realtime/hub.js'
import { answerInvocation, type InvocationHandler } from '../realtime/methods.js'
import type { RealtimeMessage } from '../types/events.js'

export const KEEPALIVE_INTERVAL_MS = 15_000

export interface EventLogRoutesDeps {
  readonly audit: Pick<AuditLog, 'list'>
  readonly logger: Logger
  /** 未指定なら SSE のライブ配信は提供しない */
  readonly live?: {
    readonly hub: SubscriberHub
    readonly invoke: InvocationHandler
    readonly keepaliveMs?: number
  }
}

export function createEventLogRoutes(deps: EventLogRoutesDeps): Hono {
  const eventLogs = new Hono()

  eventLogs.use('*', requireAuth)

  eventLogs.get('/', async (c) => {
    const events = await deps.audit.list(currentIdentity(c))
    return c.json({ events: events.map(toLogNotification) })
  })

  const { live } = deps
  if (!live) return eventLogs

  eventLogs.get('/stream', (c) => {
    const identity = currentIdentity(c)

    return streamSSE(c, async (stream) => {
      const subscriberId = randomUUID()
      const closed = new Promise<void>((resolve) => stream.onAbort(resolve))

      const unsubscribe = live.hub.subscribe({
        id: subscriberId,
        transport: 'sse',
        accepts: (message: RealtimeMessage) => canSeeMessage(identity, message),
        send: (message) => stream.writeSSE({ data: JSON.stringify(message) }),
      })

      // プロキシに切られないよう定期的にコメント行を送る
      const keepalive = setInterval(() => {
        stream.write(': keepalive\n\n').catch((error: unknown) => {
          deps.logger.debug({ subscriberId, err: error }, 'Keepalive write failed')
        })
      }, live.keepaliveMs ?? KEEPALIVE_INTERVAL_MS)
      keepalive.unref()

      deps.logger.info({ subscriberId, userId: identity.userId }, 'SSE subscriber connected')
      try {
        await stream.writeSSE({ event: 'connected', data: JSON.stringify({ subscriberId }) })
        await closed
      } finally {
        clearInterval(keepalive)
        unsubscribe()
      }
    })
  })

  eventLogs.post('/invoke', async (c) => {
    const input: unknown = await c.req.json().catch(() => undefined)
    const reply = await answerInvocation(live.invoke, currentIdentity(c), input, deps.logger)
    return c.json(reply, reply.type === 'error' && reply.id === null ? 400 : 200)
  })

  return eventLogs
}

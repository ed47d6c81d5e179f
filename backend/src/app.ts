import { Hono } from 'hono'
import type { AuditLog } from './lib/audit-log.js'
import type { IngestionCoordinator } from './lib/ingestion.js'
import type { Logger } from './lib/logger.js'
import { createAuthMiddleware } from './middleware/auth.js'
import { createCorsMiddleware } from './middleware/cors.js'
import { createErrorHandler } from './middleware/error-handler.js'
import { createHttpLogger } from './middleware/logger.js'
import type { SubscriberHub } from './realtime/hub.js'
import type { InvocationHandler } from './realtime/methods.js'
import { createAnalysisRoutes } from './routes/analysis.js'
import { createDocumentRoutes } from './routes/documents.js'
import { createEventLogRoutes } from './routes/event-logs.js'
import health from './routes/health.js'

export interface AppDeps {
  readonly coordinator: IngestionCoordinator
  readonly audit: Pick<AuditLog, 'list'>
  readonly logger: Logger
  readonly authSecret: string
  readonly frontendUrl?: string
  readonly projectId?: string
  /** 指定時のみ SSE の配信・呼び出しエンドポイントを公開する */
  readonly sse?: {
    readonly hub: SubscriberHub
    readonly invoke: InvocationHandler
  }
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono()

  app.use('*', createHttpLogger(deps.logger, deps.projectId))
  app.use('*', createCorsMiddleware(deps.frontendUrl))
  app.use('/api/*', createAuthMiddleware(deps.authSecret))

  app.route('/api/health', health)
  app.route('/api/documents', createDocumentRoutes(deps.coordinator))
  app.route('/api/analysis', createAnalysisRoutes(deps.coordinator))
  app.route('/api/event-logs', createEventLogRoutes({ audit: deps.audit, logger: deps.logger, live: deps.sse }))

  app.notFound((c) => c.json({ error: 'Not found' }, 404))
  app.onError(createErrorHandler(deps.logger))

  return app
}

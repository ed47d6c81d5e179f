import 'dotenv/config'
import { Server } from 'node:http'
import { serve } from '@hono/node-server'
import type { WebSocketServer } from 'ws'
import { createApp } from './app.js'
import { GeminiAnalysisClient } from './lib/analysis-client.js'
import { AuditLog } from './lib/audit-log.js'
import { createBlobStore } from './lib/blob-store/index.js'
import { loadConfig, type AppConfig } from './lib/config.js'
import { DocumentAnalyzer } from './lib/document-analyzer.js'
import { IngestionCoordinator } from './lib/ingestion.js'
import { createLogger, logger as bootLogger, type Logger } from './lib/logger.js'
import { SubscriberHub } from './realtime/hub.js'
import { createInvocationHandler } from './realtime/methods.js'
import { WEBSOCKET_PATH, attachWebSocketTransport } from './realtime/websocket-server.js'
import { createBigQueryRepositories, openBigQuery } from './repositories/bigquery.js'
import { createMemoryRepositories } from './repositories/memory.js'
import type { Repositories } from './repositories/types.js'

function createRepositories(config: AppConfig, logger: Logger): Repositories {
  if (config.persistence.kind === 'bigquery') {
    logger.info({ datasetId: config.persistence.datasetId }, 'Using BigQuery repositories')
    return createBigQueryRepositories(openBigQuery(config.persistence.datasetId, config.persistence.projectId))
  }
  logger.warn('Using in-memory repositories; data is lost on restart')
  return createMemoryRepositories()
}

async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger(config.log)

  const repositories = createRepositories(config, logger)
  const blobStore = await createBlobStore(config.storage, logger)
  const hub = new SubscriberHub(logger)
  const audit = new AuditLog({ repository: repositories.eventLogs, hub, logger })

  const { apiKey, model, timeoutMs, mockDelayMs } = config.analysis
  const analyzer = new DocumentAnalyzer({
    client: apiKey ? new GeminiAnalysisClient({ apiKey, model }) : null,
    audit,
    logger,
    timeoutMs,
    mockDelayMs,
  })
  if (analyzer.usesMock) {
    logger.warn('GEMINI_API_KEY is not set; document analysis returns mock results')
  }

  const coordinator = new IngestionCoordinator({
    blobStore,
    documents: repositories.documents,
    users: repositories.users,
    analyzer,
    audit,
    logger,
  })
  const invoke = createInvocationHandler({ audit })
  const { transport } = config.realtime

  const app = createApp({
    coordinator,
    audit,
    logger,
    authSecret: config.auth.secret,
    frontendUrl: config.frontendUrl,
    projectId: config.persistence.kind === 'bigquery' ? config.persistence.projectId : undefined,
    sse: transport === 'websocket' ? undefined : { hub, invoke },
  })

  const server = serve({ fetch: app.fetch, port: config.port })
  let wss: WebSocketServer | undefined
  if (transport !== 'sse') {
    if (!(server instanceof Server)) {
      throw new Error('WebSocket transport requires an HTTP/1.1 server')
    }
    wss = attachWebSocketTransport(server, { hub, invoke, secret: config.auth.secret, logger })
    logger.info({ path: WEBSOCKET_PATH }, 'WebSocket transport attached')
  }

  logger.info({ port: config.port, transport }, 'Server started')

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down')
    for (const client of wss?.clients ?? []) client.terminate()
    server.close((error) => {
      if (error) logger.error({ err: error }, 'Server close failed')
      process.exit(error ? 1 : 0)
    })
  }
  process.once('SIGTERM', shutdown)
  process.once('SIGINT', shutdown)
}

main().catch((error: unknown) => {
  bootLogger.fatal({ err: error }, 'Server failed to start')
  process.exit(1)
})

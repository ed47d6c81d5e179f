import type { Hono } from 'hono'
import { createApp } from '../app.js'
import { AuditLog } from '../lib/audit-log.js'
import { DocumentAnalyzer } from '../lib/document-analyzer.js'
import { IngestionCoordinator } from '../lib/ingestion.js'
import { createToken } from '../lib/jwt.js'
import { SubscriberHub } from '../realtime/hub.js'
import { createInvocationHandler } from '../realtime/methods.js'
import { createMemoryRepositories } from '../repositories/memory.js'
import type { Repositories } from '../repositories/types.js'
import type { Identity } from '../types/auth.js'
import { captureLogger, type LogEntry } from './capture-logger.js'
import { MemoryBlobStore } from './memory-blob-store.js'

export const TEST_SECRET = 'test-secret'
export const TEST_NOW = new Date('2024-05-01T09:00:00.000Z')

export const ALICE: Identity = { userId: 'alice', name: 'Alice', role: 'User' }
export const BOB: Identity = { userId: 'bob', name: 'Bob', role: 'User' }
export const ADMIN: Identity = { userId: 'admin-1', name: 'Admin', role: 'Admin' }

export interface TestApp {
  readonly app: Hono
  readonly repositories: Repositories
  readonly blobStore: MemoryBlobStore
  readonly hub: SubscriberHub
  readonly entries: LogEntry[]
  authHeader(identity: Identity): Promise<Record<string, string>>
}

/** テスト用: メモリ実装とモック解析器で組み立てたアプリ */
export function createTestApp(): TestApp {
  const { logger, entries } = captureLogger()
  const now = () => TEST_NOW
  const repositories = createMemoryRepositories()
  const blobStore = new MemoryBlobStore()
  const hub = new SubscriberHub(logger)
  const audit = new AuditLog({ repository: repositories.eventLogs, hub, logger, now })
  const analyzer = new DocumentAnalyzer({
    client: null,
    audit,
    logger,
    timeoutMs: 1000,
    mockDelayMs: 0,
    now,
    delay: async () => undefined,
  })
  const coordinator = new IngestionCoordinator({
    blobStore,
    documents: repositories.documents,
    users: repositories.users,
    analyzer,
    audit,
    logger,
    now,
    hashPassword: async (password) => `hashed:${password}`,
  })

  const app = createApp({
    coordinator,
    audit,
    logger,
    authSecret: TEST_SECRET,
    sse: { hub, invoke: createInvocationHandler({ audit, now }) },
  })

  return {
    app,
    repositories,
    blobStore,
    hub,
    entries,
    authHeader: async (identity) => ({ Authorization: `Bearer ${await createToken(identity, TEST_SECRET)}` }),
  }
}

export function uploadForm(content: string, fileName: string, type: string): FormData {
  const form = new FormData()
  form.append('file', new Blob([content], { type }), fileName)
  return form
}

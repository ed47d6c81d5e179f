import { BigQuery } from '@google-cloud/bigquery'
import { z } from 'zod'
import { USER_ROLES } from '../types/auth.js'
import type { DocumentRecord } from '../types/documents.js'
import type { AuditEvent } from '../types/events.js'
import type { UserAccount } from '../types/users.js'
import type { DocumentRepository, EventLogRepository, Repositories, UserRepository } from './types.js'

/** 名前付きパラメータの値。配列とオブジェクトは ARRAY / STRUCT として渡る */
export type QueryParam = string | number | boolean | null | readonly QueryParam[] | { readonly [key: string]: QueryParam }

export interface QueryRequest {
  readonly query: string
  readonly params?: Record<string, QueryParam>
  /** null を渡すパラメータの型 */
  readonly types?: Record<string, string>
}

/** BigQuery クライアントのうち、リポジトリが使う操作 */
export interface BigQueryGateway {
  readonly datasetId: string
  query(request: QueryRequest): Promise<unknown[]>
  insert(tableId: string, rows: readonly Record<string, unknown>[]): Promise<void>
}

export function openBigQuery(datasetId: string, projectId?: string): BigQueryGateway {
  const bigquery = new BigQuery(projectId ? { projectId } : {})
  return {
    datasetId,
    async query(request) {
      const [rows] = await bigquery.query({ query: request.query, params: request.params, types: request.types })
      return rows
    },
    async insert(tableId, rows) {
      await bigquery.dataset(datasetId).table(tableId).insert([...rows])
    },
  }
}

// タイムスタンプはミリ秒精度のISO 8601で読み出す
const iso = (column: string) => `FORMAT_TIMESTAMP('%Y-%m-%dT%H:%M:%E3SZ', ${column}) AS ${column}`

const documentRowSchema = z.object({
  id: z.string(),
  file_name: z.string(),
  storage_ref: z.string(),
  content_type: z.string(),
  size: z.coerce.number(),
  is_processed: z.boolean(),
  analysis_result: z.string().nullable(),
  owner_id: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
})

const userRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  password_hash: z.string(),
  role: z.enum(USER_ROLES),
  created_at: z.string(),
})

const eventRowSchema = z.object({
  id: z.string(),
  event_type: z.string(),
  description: z.string(),
  owner_id: z.string().nullable(),
  timestamp: z.string(),
})

function toDocument(row: z.infer<typeof documentRowSchema>): DocumentRecord {
  return {
    id: row.id,
    fileName: row.file_name,
    storageRef: row.storage_ref,
    contentType: row.content_type,
    size: row.size,
    isProcessed: row.is_processed,
    analysisResult: row.analysis_result,
    ownerId: row.owner_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

const DOCUMENT_COLUMNS = `id, file_name, storage_ref, content_type, size, is_processed, analysis_result, owner_id, ${iso('created_at')}, ${iso('updated_at')}`

// 作成直後に UPDATE / DELETE するため、ストリーミング挿入ではなく DML で書き込む
export class BigQueryDocumentRepository implements DocumentRepository {
  constructor(private readonly gateway: BigQueryGateway) {}

  private get table(): string {
    return `\`${this.gateway.datasetId}.documents\``
  }

  async add(record: DocumentRecord): Promise<void> {
    await this.gateway.query({
      query: `
        INSERT INTO ${this.table}
          (id, file_name, storage_ref, content_type, size, is_processed, analysis_result, owner_id, created_at, updated_at)
        VALUES
          (@id, @fileName, @storageRef, @contentType, @size, @isProcessed, @analysisResult, @ownerId,
           TIMESTAMP(@createdAt), TIMESTAMP(@updatedAt))
      `,
      params: {
        id: record.id,
        fileName: record.fileName,
        storageRef: record.storageRef,
        contentType: record.contentType,
        size: record.size,
        isProcessed: record.isProcessed,
        analysisResult: record.analysisResult,
        ownerId: record.ownerId,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      },
      types: { analysisResult: 'STRING' },
    })
  }

  async findById(id: string): Promise<DocumentRecord | null> {
    const rows = await this.gateway.query({
      query: `SELECT ${DOCUMENT_COLUMNS} FROM ${this.table} WHERE id = @id LIMIT 1`,
      params: { id },
    })
    const [row] = z.array(documentRowSchema).parse(rows)
    return row ? toDocument(row) : null
  }

  async listByOwner(ownerId: string): Promise<DocumentRecord[]> {
    const rows = await this.gateway.query({
      query: `SELECT ${DOCUMENT_COLUMNS} FROM ${this.table} WHERE owner_id = @ownerId ORDER BY created_at DESC`,
      params: { ownerId },
    })
    return z.array(documentRowSchema).parse(rows).map(toDocument)
  }

  async markProcessed(id: string, analysisResult: string, updatedAt: string): Promise<void> {
    await this.gateway.query({
      query: `
        UPDATE ${this.table}
        SET is_processed = TRUE, analysis_result = @analysisResult, updated_at = TIMESTAMP(@updatedAt)
        WHERE id = @id
      `,
      params: { id, analysisResult, updatedAt },
    })
  }

  async remove(id: string): Promise<void> {
    await this.gateway.query({
      query: `DELETE FROM ${this.table} WHERE id = @id`,
      params: { id },
    })
  }
}

export class BigQueryUserRepository implements UserRepository {
  constructor(private readonly gateway: BigQueryGateway) {}

  async findByUsername(username: string): Promise<UserAccount | null> {
    const rows = await this.gateway.query({
      query: `
        SELECT id, username, email, password_hash, role, ${iso('created_at')}
        FROM \`${this.gateway.datasetId}.users\`
        WHERE username = @username
        LIMIT 1
      `,
      params: { username },
    })
    const [row] = z.array(userRowSchema).parse(rows)
    if (!row) return null
    return {
      id: row.id,
      username: row.username,
      email: row.email,
      passwordHash: row.password_hash,
      role: row.role,
      createdAt: row.created_at,
    }
  }

  // ストリーミング挿入は行ごとに成否が分かれるため、単一の DML 文でまとめて書き込む
  async addMany(users: readonly UserAccount[]): Promise<void> {
    if (users.length === 0) return
    await this.gateway.query({
      query: `
        INSERT INTO \`${this.gateway.datasetId}.users\`
          (id, username, email, password_hash, role, created_at)
        SELECT u.id, u.username, u.email, u.passwordHash, u.role, TIMESTAMP(u.createdAt)
        FROM UNNEST(@users) AS u
      `,
      params: {
        users: users.map((user) => ({
          id: user.id,
          username: user.username,
          email: user.email,
          passwordHash: user.passwordHash,
          role: user.role,
          createdAt: user.createdAt,
        })),
      },
    })
  }
}

export class BigQueryEventLogRepository implements EventLogRepository {
  constructor(private readonly gateway: BigQueryGateway) {}

  async append(event: AuditEvent): Promise<void> {
    await this.gateway.insert('event_logs', [
      {
        id: event.id,
        event_type: event.eventType,
        description: event.description,
        owner_id: event.ownerId,
        timestamp: event.timestamp,
      },
    ])
  }

  async listAll(): Promise<AuditEvent[]> {
    return this.select('', {})
  }

  async listByOwner(ownerId: string): Promise<AuditEvent[]> {
    return this.select('WHERE owner_id = @ownerId', { ownerId })
  }

  private async select(where: string, params: Record<string, string>): Promise<AuditEvent[]> {
    const rows = await this.gateway.query({
      query: `
        SELECT id, event_type, description, owner_id, ${iso('timestamp')}
        FROM \`${this.gateway.datasetId}.event_logs\`
        ${where}
        ORDER BY timestamp DESC
      `,
      params,
    })
    return z
      .array(eventRowSchema)
      .parse(rows)
      .map((row) => ({
        id: row.id,
        eventType: row.event_type,
        description: row.description,
        ownerId: row.owner_id,
        timestamp: row.timestamp,
      }))
  }
}

export function createBigQueryRepositories(gateway: BigQueryGateway): Repositories {
  return {
    documents: new BigQueryDocumentRepository(gateway),
    users: new BigQueryUserRepository(gateway),
    eventLogs: new BigQueryEventLogRepository(gateway),
  }
}

import type { DocumentRecord } from '../types/documents.js'
import type { AuditEvent } from '../types/events.js'
import type { UserAccount } from '../types/users.js'

export interface DocumentRepository {
  add(record: DocumentRecord): Promise<void>
  findById(id: string): Promise<DocumentRecord | null>
  /** 新しい順 */
  listByOwner(ownerId: string): Promise<DocumentRecord[]>
  markProcessed(id: string, analysisResult: string, updatedAt: string): Promise<void>
  remove(id: string): Promise<void>
}

export interface UserRepository {
  findByUsername(username: string): Promise<UserAccount | null>
  /** 一括コミット。失敗時はどのアカウントも保存されない */
  addMany(users: readonly UserAccount[]): Promise<void>
}

export interface EventLogRepository {
  append(event: AuditEvent): Promise<void>
  /** 新しい順 */
  listAll(): Promise<AuditEvent[]>
  /** 新しい順 */
  listByOwner(ownerId: string): Promise<AuditEvent[]>
}

export interface Repositories {
  readonly documents: DocumentRepository
  readonly users: UserRepository
  readonly eventLogs: EventLogRepository
}

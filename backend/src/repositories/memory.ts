import type { DocumentRecord } from '../types/documents.js'
import type { AuditEvent } from '../types/events.js'
import type { UserAccount } from '../types/users.js'
import type { DocumentRepository, EventLogRepository, Repositories, UserRepository } from './types.js'

// 同時刻のものは後から追加したものを先にする
function newestFirst<T>(items: Iterable<T>, timestampOf: (item: T) => string): T[] {
  return [...items].reverse().sort((a, b) => {
    const left = timestampOf(a)
    const right = timestampOf(b)
    return left === right ? 0 : left < right ? 1 : -1
  })
}

export class MemoryDocumentRepository implements DocumentRepository {
  private readonly records = new Map<string, DocumentRecord>()

  async add(record: DocumentRecord): Promise<void> {
    this.records.set(record.id, record)
  }

  async findById(id: string): Promise<DocumentRecord | null> {
    return this.records.get(id) ?? null
  }

  async listByOwner(ownerId: string): Promise<DocumentRecord[]> {
    const owned = [...this.records.values()].filter((record) => record.ownerId === ownerId)
    return newestFirst(owned, (record) => record.createdAt)
  }

  async markProcessed(id: string, analysisResult: string, updatedAt: string): Promise<void> {
    const record = this.records.get(id)
    if (!record) return
    this.records.set(id, { ...record, isProcessed: true, analysisResult, updatedAt })
  }

  async remove(id: string): Promise<void> {
    this.records.delete(id)
  }
}

export class MemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, UserAccount>()

  async findByUsername(username: string): Promise<UserAccount | null> {
    return this.users.get(username) ?? null
  }

  async addMany(users: readonly UserAccount[]): Promise<void> {
    const duplicate = users.find((user) => this.users.has(user.username))
    if (duplicate) {
      throw new Error(`Duplicate username: ${duplicate.username}`)
    }
    for (const user of users) {
      this.users.set(user.username, user)
    }
  }
}

export class MemoryEventLogRepository implements EventLogRepository {
  private readonly events: AuditEvent[] = []

  async append(event: AuditEvent): Promise<void> {
    this.events.push(event)
  }

  async listAll(): Promise<AuditEvent[]> {
    return newestFirst(this.events, (event) => event.timestamp)
  }

  async listByOwner(ownerId: string): Promise<AuditEvent[]> {
    return newestFirst(
      this.events.filter((event) => event.ownerId === ownerId),
      (event) => event.timestamp,
    )
  }
}

export function createMemoryRepositories(): Repositories {
  return {
    documents: new MemoryDocumentRepository(),
    users: new MemoryUserRepository(),
    eventLogs: new MemoryEventLogRepository(),
  }
}

import { describe, it, expect } from '@jest/globals'
import type { DocumentRecord } from '../types/documents.js'
import type { AuditEvent } from '../types/events.js'
import type { UserAccount } from '../types/users.js'
import { MemoryDocumentRepository, MemoryEventLogRepository, MemoryUserRepository } from './memory.js'

function record(id: string, ownerId: string, createdAt: string): DocumentRecord {
  return {
    id,
    fileName: `${id}.pdf`,
    storageRef: `gs://test-bucket/${id}`,
    contentType: 'application/pdf',
    size: 10,
    isProcessed: false,
    analysisResult: null,
    ownerId,
    createdAt,
    updatedAt: createdAt,
  }
}

function event(id: string, ownerId: string | null, timestamp: string): AuditEvent {
  return { id, eventType: 'Document Upload', description: id, ownerId, timestamp }
}

function account(username: string): UserAccount {
  return {
    id: `id-${username}`,
    username,
    email: `${username}@example.com`,
    passwordHash: 'hash-salt',
    role: 'User',
    createdAt: '2024-01-01T00:00:00.000Z',
  }
}

describe('MemoryDocumentRepository', () => {
  it('should list only the owner records, newest first', async () => {
    const repository = new MemoryDocumentRepository()
    await repository.add(record('old', 'alice', '2024-01-01T00:00:00.000Z'))
    await repository.add(record('other', 'bob', '2024-01-03T00:00:00.000Z'))
    await repository.add(record('new', 'alice', '2024-01-02T00:00:00.000Z'))

    const listed = await repository.listByOwner('alice')

    expect(listed.map((r) => r.id)).toEqual(['new', 'old'])
  })

  it('should mark a record processed with its result', async () => {
    const repository = new MemoryDocumentRepository()
    await repository.add(record('doc', 'alice', '2024-01-01T00:00:00.000Z'))

    await repository.markProcessed('doc', '{"documentType":"Information"}', '2024-01-05T00:00:00.000Z')

    expect(await repository.findById('doc')).toMatchObject({
      isProcessed: true,
      analysisResult: '{"documentType":"Information"}',
      updatedAt: '2024-01-05T00:00:00.000Z',
      createdAt: '2024-01-01T00:00:00.000Z',
    })
  })

  it('should return null after removal', async () => {
    const repository = new MemoryDocumentRepository()
    await repository.add(record('doc', 'alice', '2024-01-01T00:00:00.000Z'))

    await repository.remove('doc')

    expect(await repository.findById('doc')).toBeNull()
  })
})

describe('MemoryUserRepository', () => {
  it('should commit a batch and find its accounts by username', async () => {
    const repository = new MemoryUserRepository()

    await repository.addMany([account('alice'), account('bob')])

    expect((await repository.findByUsername('bob'))?.email).toBe('bob@example.com')
    expect(await repository.findByUsername('carol')).toBeNull()
  })

  it('should reject the whole batch when a username exists', async () => {
    const repository = new MemoryUserRepository()
    await repository.addMany([account('alice')])

    await expect(repository.addMany([account('bob'), account('alice')])).rejects.toThrow('Duplicate username: alice')

    expect(await repository.findByUsername('bob')).toBeNull()
  })
})

describe('MemoryEventLogRepository', () => {
  it('should list events newest first, keeping append order for equal timestamps', async () => {
    const repository = new MemoryEventLogRepository()
    await repository.append(event('a', 'alice', '2024-01-01T00:00:00.000Z'))
    await repository.append(event('b', null, '2024-01-02T00:00:00.000Z'))
    await repository.append(event('c', 'bob', '2024-01-02T00:00:00.000Z'))

    const listed = await repository.listAll()

    expect(listed.map((e) => e.id)).toEqual(['c', 'b', 'a'])
  })

  it('should filter by owner id', async () => {
    const repository = new MemoryEventLogRepository()
    await repository.append(event('a', 'alice', '2024-01-01T00:00:00.000Z'))
    await repository.append(event('b', 'bob', '2024-01-02T00:00:00.000Z'))
    await repository.append(event('c', null, '2024-01-03T00:00:00.000Z'))

    const listed = await repository.listByOwner('alice')

    expect(listed.map((e) => e.id)).toEqual(['a'])
  })
})

import { describe, it, expect } from '@jest/globals'
import { MemoryUserRepository } from '../repositories/memory.js'
import type { UserRepository } from '../repositories/types.js'
import type { UserAccount } from '../types/users.js'
import { FatalPersistenceError } from './errors.js'
import { importUsers } from './user-import.js'

const fakeHash = async (password: string) => `hashed:${password}`
const fixedNow = () => new Date('2024-05-01T09:00:00.000Z')

function setup() {
  const users = new MemoryUserRepository()
  return { users, deps: { users, hash: fakeHash, now: fixedNow } }
}

describe('importUsers', () => {
  it('should import valid rows and report missing fields by line number', async () => {
    const { users, deps } = setup()
    const csv = 'Username,Email,Password,Role\nalice,a@x.com,pw123,User\nbob,bad,,Admin\n'

    const outcome = await importUsers(csv, deps)

    expect(outcome).toEqual({ successCount: 1, failureCount: 1, errors: ['Line 3: Missing required fields.'] })
    expect(await users.findByUsername('alice')).toMatchObject({
      email: 'a@x.com',
      passwordHash: 'hashed:pw123',
      role: 'User',
      createdAt: '2024-05-01T09:00:00.000Z',
    })
    expect(await users.findByUsername('bob')).toBeNull()
  })

  it('should return "Empty file" when there is no header', async () => {
    const { deps } = setup()

    expect(await importUsers('', deps)).toEqual({ successCount: 0, failureCount: 0, errors: ['Empty file'] })
  })

  it('should report zero rows for a header-only file', async () => {
    const { deps } = setup()

    expect(await importUsers('Username,Email,Password,Role\n', deps)).toEqual({
      successCount: 0,
      failureCount: 0,
      errors: [],
    })
  })

  it('should reject short rows, unknown roles and existing users without aborting the batch', async () => {
    const { users, deps } = setup()
    await users.addMany([
      {
        id: 'existing',
        username: 'carol',
        email: 'c@x.com',
        passwordHash: 'hash',
        role: 'User',
        createdAt: '2024-01-01T00:00:00.000Z',
      },
    ])
    const csv = [
      'Username,Email,Password,Role',
      'dave,d@x.com,pw',
      'erin,e@x.com,pw,Owner',
      'carol,c2@x.com,pw,User',
      'frank,f@x.com,pw,admin,extra',
    ].join('\n')

    const outcome = await importUsers(csv, deps)

    expect(outcome).toEqual({
      successCount: 1,
      failureCount: 3,
      errors: [
        'Line 2: Invalid format. Expected Username,Email,Password,Role',
        "Line 3: Invalid role 'Owner'.",
        "Line 4: User 'carol' already exists.",
      ],
    })
    expect((await users.findByUsername('frank'))?.role).toBe('Admin')
  })

  it('should count blank lines in line numbers while skipping them', async () => {
    const { deps } = setup()
    const csv = 'Username,Email,Password,Role\r\n\r\n   \r\ngina,,pw,User\r\n'

    const outcome = await importUsers(csv, deps)

    expect(outcome.errors).toEqual(['Line 4: Missing required fields.'])
    expect(outcome.successCount + outcome.failureCount).toBe(1)
  })

  it('should fail the second occurrence of a username within one file', async () => {
    const { deps } = setup()
    const csv = 'Username,Email,Password,Role\nhank,h@x.com,pw,User\nhank,h2@x.com,pw,User\n'

    const outcome = await importUsers(csv, deps)

    expect(outcome).toEqual({ successCount: 1, failureCount: 1, errors: ["Line 3: User 'hank' already exists."] })
  })

  it('should report a hashing failure as a row error', async () => {
    const { users } = setup()
    const hash = async (password: string) => {
      if (password === 'bad') throw new Error('weak password')
      return `hashed:${password}`
    }
    const csv = 'Username,Email,Password,Role\nivy,i@x.com,bad,User\njack,j@x.com,ok,User\n'

    const outcome = await importUsers(csv, { users, hash, now: fixedNow })

    expect(outcome).toEqual({
      successCount: 1,
      failureCount: 1,
      errors: ['Line 2: Error creating user. weak password'],
    })
  })

  it('should commit all created accounts in a single call', async () => {
    const batches: UserAccount[][] = []
    const users: UserRepository = {
      findByUsername: async () => null,
      addMany: async (accounts) => {
        batches.push([...accounts])
      },
    }
    const csv = 'Username,Email,Password,Role\na,a@x.com,pw,User\nb,b@x.com,pw,User\nc,c@x.com,pw,Admin\n'

    await importUsers(csv, { users, hash: fakeHash, now: fixedNow })

    expect(batches.map((batch) => batch.map((account) => account.username))).toEqual([['a', 'b', 'c']])
  })

  it('should not commit when every row failed', async () => {
    let commits = 0
    const users: UserRepository = {
      findByUsername: async () => null,
      addMany: async () => {
        commits++
      },
    }

    await importUsers('Username,Email,Password,Role\nx,,,\n', { users, hash: fakeHash })

    expect(commits).toBe(0)
  })

  it('should raise FatalPersistenceError when the commit fails', async () => {
    const users: UserRepository = {
      findByUsername: async () => null,
      addMany: async () => {
        throw new Error('quota exceeded')
      },
    }

    const result = importUsers('Username,Email,Password,Role\na,a@x.com,pw,User\n', { users, hash: fakeHash })

    await expect(result).rejects.toThrow(FatalPersistenceError)
    await expect(result).rejects.toThrow('Failed to commit imported users: quota exceeded')
  })
})

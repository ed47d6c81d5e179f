import { describe, it, expect } from '@jest/globals'
import { hashPassword, verifyPassword } from './password.js'

describe('password', () => {
  it('should store a 64-byte hash and a 64-byte salt as hex', async () => {
    const stored = await hashPassword('pw123')

    expect(stored).toMatch(/^[0-9a-f]{128}-[0-9a-f]{128}$/)
  })

  it('should use a fresh salt for every hash', async () => {
    const [first, second] = await Promise.all([hashPassword('pw123'), hashPassword('pw123')])

    expect(first).not.toBe(second)
  })

  it('should verify the original password only', async () => {
    const stored = await hashPassword('pw123')

    expect(await verifyPassword('pw123', stored)).toBe(true)
    expect(await verifyPassword('pw124', stored)).toBe(false)
  })

  it('should reject malformed stored values', async () => {
    expect(await verifyPassword('pw123', 'not-a-hash')).toBe(false)
    expect(await verifyPassword('pw123', '')).toBe(false)
  })
})

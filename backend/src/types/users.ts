import type { UserRole } from './auth.js'

export interface UserAccount {
  readonly id: string
  readonly username: string
  readonly email: string
  readonly passwordHash: string
  readonly role: UserRole
  readonly createdAt: string
}

export interface ImportOutcome {
  readonly successCount: number
  readonly failureCount: number
  readonly errors: readonly string[]
}

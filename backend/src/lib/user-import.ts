import { randomUUID } from 'node:crypto'
import type { UserRepository } from '../repositories/types.js'
import { USER_ROLES, type UserRole } from '../types/auth.js'
import type { ImportOutcome, UserAccount } from '../types/users.js'
import { FatalPersistenceError, errorMessage } from './errors.js'
import { hashPassword } from './password.js'

export const USER_CSV_HEADER = 'Username,Email,Password,Role'

export interface UserImportDeps {
  readonly users: UserRepository
  readonly hash?: (password: string) => Promise<string>
  readonly now?: () => Date
}

type RowResult = { ok: true; account: UserAccount } | { ok: false; error: string }

function parseRole(token: string): UserRole | undefined {
  return USER_ROLES.find((role) => role.toLowerCase() === token.toLowerCase())
}

/**
 * ヘッダー付きCSVからユーザーを一括作成する。
 * 行ごとの不備はエラー文字列として集計し、作成できたアカウントは最後に1回だけコミットする。
 * コミットの失敗のみ FatalPersistenceError として投げる。
 */
export async function importUsers(csv: string, deps: UserImportDeps): Promise<ImportOutcome> {
  const hash = deps.hash ?? hashPassword
  const now = deps.now ?? (() => new Date())

  const lines = csv.split(/\r?\n/)
  if (csv.length === 0) {
    return { successCount: 0, failureCount: 0, errors: ['Empty file'] }
  }

  const pending = new Map<string, UserAccount>()
  const errors: string[] = []

  const parseRow = async (line: string, lineNumber: number): Promise<RowResult> => {
    const values = line.split(',').map((value) => value.trim())
    const [username = '', email = '', password = '', roleToken = ''] = values
    if (values.length < 4) {
      return { ok: false, error: `Line ${lineNumber}: Invalid format. Expected ${USER_CSV_HEADER}` }
    }
    if (!username || !email || !password) {
      return { ok: false, error: `Line ${lineNumber}: Missing required fields.` }
    }
    const role = parseRole(roleToken)
    if (!role) {
      return { ok: false, error: `Line ${lineNumber}: Invalid role '${roleToken}'.` }
    }
    // 同じCSV内で先に出たユーザー名も既存として扱う
    if (pending.has(username) || (await deps.users.findByUsername(username))) {
      return { ok: false, error: `Line ${lineNumber}: User '${username}' already exists.` }
    }

    try {
      const account: UserAccount = {
        id: randomUUID(),
        username,
        email,
        passwordHash: await hash(password),
        role,
        createdAt: now().toISOString(),
      }
      return { ok: true, account }
    } catch (error) {
      return { ok: false, error: `Line ${lineNumber}: Error creating user. ${errorMessage(error)}` }
    }
  }

  // 1行目はヘッダー。行番号は1始まりで、空行も数える
  for (const [index, line] of lines.entries()) {
    if (index === 0 || line.trim() === '') continue
    const lineNumber = index + 1

    const result = await parseRow(line, lineNumber)
    if (result.ok) {
      pending.set(result.account.username, result.account)
    } else {
      errors.push(result.error)
    }
  }

  const created = [...pending.values()]
  if (created.length > 0) {
    try {
      await deps.users.addMany(created)
    } catch (error) {
      throw new FatalPersistenceError(`Failed to commit imported users: ${errorMessage(error)}`, { cause: error })
    }
  }

  return { successCount: created.length, failureCount: errors.length, errors }

}

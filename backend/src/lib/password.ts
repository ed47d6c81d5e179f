import { pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto'
import { promisify } from 'node:util'

const pbkdf2Async = promisify(pbkdf2)

const ITERATIONS = 350_000
const KEY_LENGTH = 64
const SALT_LENGTH = 64
const DIGEST = 'sha512'

// 保存形式: HEXHASH-HEXSALT
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH)
  const hash = await pbkdf2Async(password, salt, ITERATIONS, KEY_LENGTH, DIGEST)
  return `${hash.toString('hex')}-${salt.toString('hex')}`
}

export async function verifyPassword(password: string, stored: string): Promise<boolean> {
  const [hashHex, saltHex] = stored.split('-')
  if (!hashHex || !saltHex) return false

  const expected = Buffer.from(hashHex, 'hex')
  if (expected.length !== KEY_LENGTH) return false

  const actual = await pbkdf2Async(password, Buffer.from(saltHex, 'hex'), ITERATIONS, KEY_LENGTH, DIGEST)
  return timingSafeEqual(actual, expected)
}

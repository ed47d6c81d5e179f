import type { Context, MiddlewareHandler, Next } from 'hono'
import { getCookie } from 'hono/cookie'
import { verifyToken } from '../lib/jwt.js'
import type { Identity } from '../types/auth.js'

declare module 'hono' {
  interface ContextVariableMap {
    identity: Identity | null
  }
}

const BEARER_PREFIX = 'Bearer '

/** Authorization ヘッダー（Bearer）を優先し、なければ auth_token クッキーを使う */
export function extractToken(c: Context): string | undefined {
  const header = c.req.header('Authorization')
  if (header?.startsWith(BEARER_PREFIX)) {
    return header.slice(BEARER_PREFIX.length).trim() || undefined
  }
  return getCookie(c, 'auth_token')
}

export function createAuthMiddleware(secret: string): MiddlewareHandler {
  return async (c, next) => {
    const token = extractToken(c)
    c.set('identity', token ? await verifyToken(token, secret) : null)
    return next()
  }
}

export async function requireAuth(c: Context, next: Next) {
  const identity = c.get('identity')
  if (!identity) {
    return c.json({ error: 'Unauthorized' }, 401)
  }
  return next()
}

/** requireAuth 通過後のハンドラから呼ぶ */
export function currentIdentity(c: Context): Identity {
  const identity = c.get('identity')
  if (!identity) {
    throw new Error('currentIdentity() called without requireAuth')
  }
  return identity
}

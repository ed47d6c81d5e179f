import { sign, verify } from 'hono/jwt'
import { z } from 'zod'
import { USER_ROLES, type Identity, type JwtPayload } from '../types/auth.js'

const JWT_EXPIRY_DAYS = 90
const JWT_ALGORITHM = 'HS256'

const payloadSchema = z.object({
  sub: z.string().min(1),
  name: z.string().nullable().optional(),
  role: z.enum(USER_ROLES),
})

// トークン発行は認証基盤の責務。ここではツールとテスト向けに用意する
export async function createToken(identity: Identity, secret: string, now: Date = new Date()): Promise<string> {
  const iat = Math.floor(now.getTime() / 1000)
  const payload: JwtPayload = {
    sub: identity.userId,
    name: identity.name,
    role: identity.role,
    iat,
    exp: iat + JWT_EXPIRY_DAYS * 24 * 60 * 60,
  }
  return await sign({ ...payload }, secret, JWT_ALGORITHM)
}

/** 署名・有効期限・ペイロードを検証する。不正なトークンは null */
export async function verifyToken(token: string, secret: string): Promise<Identity | null> {
  let payload: unknown
  try {
    payload = await verify(token, secret, JWT_ALGORITHM)
  } catch {
    return null
  }
  const parsed = payloadSchema.safeParse(payload)
  if (!parsed.success) return null
  return { userId: parsed.data.sub, name: parsed.data.name ?? null, role: parsed.data.role }
}

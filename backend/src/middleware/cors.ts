import type { MiddlewareHandler } from 'hono'
import { cors } from 'hono/cors'

// 開発時のフロントエンド(Vite dev server)は別オリジンになる
const DEFAULT_ORIGINS = ['http://localhost:5173', 'http://localhost:3000']

export function createCorsMiddleware(frontendUrl?: string): MiddlewareHandler {
  return cors({
    origin: frontendUrl ? [...DEFAULT_ORIGINS, frontendUrl] : DEFAULT_ORIGINS,
    credentials: true,
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    maxAge: 86400,
  })
}

import type { ErrorHandler } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { isAppError } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'

/** AppError はそのステータスで { error, code } を返し、それ以外は 500 に丸める */
export function createErrorHandler(log: Logger): ErrorHandler {
  return (error, c) => {
    const path = new URL(c.req.url).pathname
    if (isAppError(error)) {
      if (error.status >= 500) {
        log.error({ err: error, code: error.code, 'url.path': path }, error.message)
      } else {
        log.warn({ code: error.code, 'url.path': path }, error.message)
      }
      return c.json({ error: error.message, code: error.code }, error.status)
    }

    if (error instanceof HTTPException) {
      return error.getResponse()
    }

    log.error({ err: error, 'url.path': path }, 'Unhandled error')
    return c.json({ error: 'Internal server error', code: 'INTERNAL' }, 500)
  }
}

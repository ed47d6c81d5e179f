import { describe, it, expect } from '@jest/globals'
import { Hono } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { FatalPersistenceError, NotFoundError, PermissionDeniedError } from '../lib/errors.js'
import { captureLogger } from '../testing/capture-logger.js'
import { createErrorHandler } from './error-handler.js'

function createApp(error: Error) {
  const { logger, entries } = captureLogger()
  const app = new Hono()
  app.onError(createErrorHandler(logger))
  app.get('/fail', () => {
    throw error
  })
  return { app, entries }
}

describe('createErrorHandler', () => {
  it.each([
    [new NotFoundError('Document not found.'), 404, 'NOT_FOUND'],
    [new PermissionDeniedError('Not allowed.'), 403, 'PERMISSION_DENIED'],
    [new FatalPersistenceError('Commit failed.'), 500, 'PERSISTENCE_FAILURE'],
  ])('should answer %p with its status and code', async (error, status, code) => {
    const { app } = createApp(error)

    const res = await app.request('/fail')

    expect(res.status).toBe(status)
    expect(await res.json()).toEqual({ error: error.message, code })
  })

  it('should log client errors at warn level and server errors at error level', async () => {
    const client = createApp(new NotFoundError('Document not found.'))
    const server = createApp(new FatalPersistenceError('Commit failed.'))

    await client.app.request('/fail')
    await server.app.request('/fail')

    expect(client.entries.map((entry) => entry.severity)).toEqual(['WARNING'])
    expect(server.entries.map((entry) => entry.severity)).toEqual(['ERROR'])
  })

  it('should hide unexpected errors behind a generic 500', async () => {
    const { app, entries } = createApp(new Error('connection reset'))

    const res = await app.request('/fail')

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ error: 'Internal server error', code: 'INTERNAL' })
    expect(entries[0]?.message).toBe('Unhandled error')
  })

  it('should pass HTTPException responses through', async () => {
    const { app } = createApp(new HTTPException(413, { message: 'Payload too large' }))

    const res = await app.request('/fail')

    expect(res.status).toBe(413)
  })
})

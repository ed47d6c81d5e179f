import { Hono } from 'hono'
import { z } from 'zod'
import { ValidationError } from '../lib/errors.js'
import type { IngestionCoordinator } from '../lib/ingestion.js'
import { currentIdentity, requireAuth } from '../middleware/auth.js'
import { PROCESS_HINTS, type DocumentRecord, type DocumentResponse } from '../types/documents.js'
import { readUpload } from './upload.js'

const processHintSchema = z.enum(PROCESS_HINTS).optional()

export function toDocumentResponse(
  record: DocumentRecord,
  validationErrors: readonly string[] | null = null,
): DocumentResponse {
  return {
    id: record.id,
    fileName: record.fileName,
    contentType: record.contentType,
    size: record.size,
    isProcessed: record.isProcessed,
    analysisResult: record.analysisResult,
    createdAt: record.createdAt,
    validationErrors,
  }
}

// Content-Disposition の filename はASCIIに限り、元の名前は filename* で渡す
export function contentDisposition(fileName: string): string {
  const fallback = fileName.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_')
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`
}

export function createDocumentRoutes(coordinator: IngestionCoordinator): Hono {
  const documents = new Hono()

  documents.use('*', requireAuth)

  documents.post('/upload', async (c) => {
    const hint = processHintSchema.safeParse(c.req.query('type') || undefined)
    if (!hint.success) {
      throw new ValidationError(`Unknown process type: ${c.req.query('type')}`)
    }

    const upload = await readUpload(c)
    const result = await coordinator.ingest({
      content: upload.content,
      fileName: upload.fileName,
      mediaType: upload.mediaType,
      owner: currentIdentity(c),
      processHint: hint.data,
    })

    return c.json(toDocumentResponse(result.record, result.validationErrors), 201)
  })

  documents.get('/', async (c) => {
    const records = await coordinator.listDocuments(currentIdentity(c).userId)
    return c.json({ documents: records.map((record) => toDocumentResponse(record)) })
  })

  documents.get('/:id/download', async (c) => {
    const file = await coordinator.download(c.req.param('id'), currentIdentity(c).userId)
    return c.body(new Uint8Array(file.bytes), 200, {
      'Content-Type': file.mediaType,
      'Content-Disposition': contentDisposition(file.fileName),
    })
  })

  documents.post('/:id/analyze', async (c) => {
    const { record, analysis } = await coordinator.reanalyze(c.req.param('id'), currentIdentity(c).userId)
    return c.json({ document: toDocumentResponse(record), analysis })
  })

  documents.delete('/:id', async (c) => {
    await coordinator.delete(c.req.param('id'), currentIdentity(c).userId)
    return c.body(null, 204)
  })

  return documents
}

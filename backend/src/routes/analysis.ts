import { Hono } from 'hono'
import type { IngestionCoordinator } from '../lib/ingestion.js'
import { currentIdentity, requireAuth } from '../middleware/auth.js'
import { readUpload } from './upload.js'

/** アップロードを常に解析モードで取り込み、解析結果を返す */
export function createAnalysisRoutes(coordinator: IngestionCoordinator): Hono {
  const analysis = new Hono()

  analysis.use('*', requireAuth)

  analysis.post('/analyze', async (c) => {
    const upload = await readUpload(c)
    const result = await coordinator.ingest({
      content: upload.content,
      fileName: upload.fileName,
      mediaType: upload.mediaType,
      owner: currentIdentity(c),
      processHint: 'Analyze',
    })

    return c.json({ documentId: result.record.id, analysis: result.analysis })
  })

  return analysis
}

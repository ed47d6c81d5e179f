import type { Context } from 'hono'
import { ValidationError } from '../lib/errors.js'

export interface UploadedFile {
  readonly content: Uint8Array
  readonly fileName: string
  readonly mediaType: string
}

/** multipart の file フィールドを読み出す。無い・空の場合は 400 */
export async function readUpload(c: Context): Promise<UploadedFile> {
  const body = await c.req.parseBody()
  const file = body['file']
  if (file === undefined || typeof file === 'string' || Array.isArray(file)) {
    throw new ValidationError('No file uploaded.')
  }

  return {
    content: new Uint8Array(await file.arrayBuffer()),
    fileName: file.name || 'upload',
    mediaType: file.type,
  }
}

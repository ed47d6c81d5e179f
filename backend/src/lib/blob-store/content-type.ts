import { extname } from 'node:path'
import { randomUUID } from 'node:crypto'

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.xml': 'application/xml',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xls': 'application/vnd.ms-excel',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
}

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

/** 拡張子からMIMEタイプを推定する */
export function inferContentType(fileName: string): string {
  return CONTENT_TYPES[extname(fileName).toLowerCase()] ?? DEFAULT_CONTENT_TYPE
}

/** パス区切りを含まない、衝突しないオブジェクト名を作る */
export function uniqueObjectName(fileName: string): string {
  const safeName = fileName.replace(/[\\/]/g, '_').replace(/^\.+/, '') || 'file'
  return `${randomUUID()}_${safeName}`
}

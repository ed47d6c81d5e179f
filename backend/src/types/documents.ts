export const PROCESS_HINTS = ['BulkImport', 'Analyze'] as const

export type ProcessHint = (typeof PROCESS_HINTS)[number]

/** Blob Storeが返す不透明な参照 (例: gs://bucket/uuid_name.pdf) */
export type StoredObjectRef = string

export interface DocumentRecord {
  readonly id: string
  readonly fileName: string
  readonly storageRef: StoredObjectRef
  readonly contentType: string
  readonly size: number
  readonly isProcessed: boolean
  readonly analysisResult: string | null
  readonly ownerId: string
  readonly createdAt: string
  readonly updatedAt: string
}

export interface DocumentResponse {
  readonly id: string
  readonly fileName: string
  readonly contentType: string
  readonly size: number
  readonly isProcessed: boolean
  readonly analysisResult: string | null
  readonly createdAt: string
  readonly validationErrors: readonly string[] | null
}

export interface DownloadedDocument {
  readonly bytes: Buffer
  readonly mediaType: string
  readonly fileName: string
}

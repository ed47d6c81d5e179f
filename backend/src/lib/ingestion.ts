import { randomUUID } from 'node:crypto'
import type { DocumentRepository, UserRepository } from '../repositories/types.js'
import type { AnalysisResult } from '../types/analysis.js'
import type { Identity } from '../types/auth.js'
import type { DocumentRecord, DownloadedDocument, ProcessHint } from '../types/documents.js'
import { EVENT_TYPES, type AuditRecorder } from './audit-log.js'
import type { BlobStore } from './blob-store/index.js'
import { inferContentType } from './blob-store/content-type.js'
import { ContentBuffer, type ContentSource } from './content-buffer.js'
import type { DocumentAnalyzer } from './document-analyzer.js'
import { FatalPersistenceError, NotFoundError, PermissionDeniedError, ValidationError, errorMessage, isAppError } from './errors.js'
import type { Logger } from './logger.js'
import { importUsers } from './user-import.js'

export interface IngestRequest {
  readonly content: ContentSource
  readonly fileName: string
  readonly mediaType: string
  readonly owner: Identity
  readonly processHint?: ProcessHint | null
}

export interface IngestResult {
  readonly record: DocumentRecord
  /** 一括インポートを実行した場合のみ行ごとのエラー */
  readonly validationErrors: readonly string[] | null
  readonly analysis: AnalysisResult | null
}

export interface IngestionDeps {
  readonly blobStore: BlobStore
  readonly documents: DocumentRepository
  readonly users: UserRepository
  readonly analyzer: DocumentAnalyzer
  readonly audit: AuditRecorder
  readonly logger: Logger
  readonly now?: () => Date
  readonly hashPassword?: (password: string) => Promise<string>
}

interface Processing {
  readonly analysisResult: string | null
  readonly validationErrors: readonly string[] | null
  readonly analysis: AnalysisResult | null
}

const UNPROCESSED: Processing = { analysisResult: null, validationErrors: null, analysis: null }

// "text/csv; charset=utf-8" → "text/csv"
function baseMediaType(mediaType: string): string {
  return (mediaType.split(';')[0] ?? '').trim().toLowerCase()
}

/**
 * アップロードを取り込み、処理・保存・記録・通知までを行う。
 * 処理結果が確定してから保存するため、レコードは常に完成した状態で作られる。
 */
export class IngestionCoordinator {
  private readonly now: () => Date

  constructor(private readonly deps: IngestionDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  async ingest(request: IngestRequest): Promise<IngestResult> {
    const { owner, fileName } = request
    const content = await ContentBuffer.capture(request.content)
    if (content.size === 0) {
      throw new ValidationError('No file uploaded.')
    }
    const mediaType = request.mediaType.trim() || inferContentType(fileName)

    const processing = await this.process(content, fileName, mediaType, owner, request.processHint ?? null)

    const storageRef = await this.persist('store uploaded file', () =>
      this.deps.blobStore.put(fileName, mediaType, content.toBuffer()),
    )
    const timestamp = this.now().toISOString()
    const record: DocumentRecord = {
      id: randomUUID(),
      fileName,
      storageRef,
      contentType: mediaType,
      size: content.size,
      isProcessed: processing.analysisResult !== null,
      analysisResult: processing.analysisResult,
      ownerId: owner.userId,
      createdAt: timestamp,
      updatedAt: timestamp,
    }

    try {
      await this.deps.documents.add(record)
    } catch (error) {
      await this.discardStoredObject(storageRef)
      throw new FatalPersistenceError(`Failed to save document record: ${errorMessage(error)}`, { cause: error })
    }

    await this.deps.audit.append(EVENT_TYPES.documentUpload, `User uploaded ${fileName}`, owner.userId)
    this.deps.logger.info(
      { documentId: record.id, size: record.size, processHint: request.processHint ?? null },
      'Document ingested',
    )

    return { record, validationErrors: processing.validationErrors, analysis: processing.analysis }
  }

  /** 所有者のドキュメントを新しい順で返す */
  async listDocuments(ownerId: string): Promise<DocumentRecord[]> {
    return this.deps.documents.listByOwner(ownerId)
  }

  async download(recordId: string, ownerId: string): Promise<DownloadedDocument> {
    const record = await this.findOwned(recordId, ownerId)
    const stored = await this.deps.blobStore.get(record.storageRef)
    return { bytes: stored.bytes, mediaType: record.contentType, fileName: record.fileName }
  }

  async delete(recordId: string, ownerId: string): Promise<void> {
    const record = await this.findOwned(recordId, ownerId)

    try {
      await this.deps.blobStore.delete(record.storageRef)
    } catch (error) {
      // 実体が既に無い場合はレコードの削除を続ける
      if (!(error instanceof NotFoundError)) throw error
      this.deps.logger.warn({ documentId: record.id, storageRef: record.storageRef }, 'Stored object already missing')
    }
    await this.persist('delete document record', () => this.deps.documents.remove(record.id))

    await this.deps.audit.append(EVENT_TYPES.documentDelete, `User deleted ${record.fileName}`, ownerId)
  }

  /** 保存済みドキュメントを解析し直し、結果で処理済みにする */
  async reanalyze(recordId: string, ownerId: string): Promise<{ record: DocumentRecord; analysis: AnalysisResult }> {
    const record = await this.findOwned(recordId, ownerId)
    const stored = await this.deps.blobStore.get(record.storageRef)

    const analysis = await this.deps.analyzer.analyze(ContentBuffer.fromBytes(stored.bytes), record.fileName, ownerId)
    const analysisResult = JSON.stringify(analysis)
    const updatedAt = this.now().toISOString()
    await this.persist('update document record', () =>
      this.deps.documents.markProcessed(record.id, analysisResult, updatedAt),
    )

    return { record: { ...record, isProcessed: true, analysisResult, updatedAt }, analysis }
  }

  private async process(
    content: ContentBuffer,
    fileName: string,
    mediaType: string,
    owner: Identity,
    hint: ProcessHint | null,
  ): Promise<Processing> {
    if (hint === 'BulkImport' && baseMediaType(mediaType) === 'text/csv') {
      if (owner.role !== 'Admin') {
        throw new PermissionDeniedError('Only administrators can bulk import users.')
      }
      const outcome = await importUsers(content.text(), { users: this.deps.users, hash: this.deps.hashPassword, now: this.now })
      return {
        analysisResult: `Processed: ${outcome.successCount} success, ${outcome.failureCount} failed.`,
        validationErrors: outcome.errors,
        analysis: null,
      }
    }

    if (hint === 'Analyze') {
      const analysis = await this.deps.analyzer.analyze(content, fileName, owner.userId)
      return { analysisResult: JSON.stringify(analysis), validationErrors: null, analysis }
    }

    return UNPROCESSED
  }

  private async findOwned(recordId: string, ownerId: string): Promise<DocumentRecord> {
    const record = await this.deps.documents.findById(recordId)
    if (!record) {
      throw new NotFoundError('Document not found.')
    }
    // 所有者以外は管理者でも操作できない
    if (record.ownerId !== ownerId) {
      throw new PermissionDeniedError('You do not have access to this document.')
    }
    return record
  }

  private async persist<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation()
    } catch (error) {
      if (isAppError(error)) throw error
      throw new FatalPersistenceError(`Failed to ${action}: ${errorMessage(error)}`, { cause: error })
    }
  }

  private async discardStoredObject(storageRef: string): Promise<void> {
    try {
      await this.deps.blobStore.delete(storageRef)
    } catch (error) {
      this.deps.logger.error({ err: error, storageRef }, 'Failed to remove orphaned stored object')
    }
  }
}

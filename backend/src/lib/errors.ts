export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFIGURATION_ERROR'
  | 'PERSISTENCE_FAILURE'
  | 'EXTERNAL_SERVICE_ERROR'

export type ErrorStatus = 400 | 403 | 404 | 500 | 502

/** HTTPステータスとコードを持つアプリケーションエラーの基底クラス */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode
  abstract readonly status: ErrorStatus

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR'
  readonly status = 400
}

/** アップロード元ストリームがコピー途中で失敗した */
export class IOError extends AppError {
  readonly code = 'IO_ERROR'
  readonly status = 400
}

export class PermissionDeniedError extends AppError {
  readonly code = 'PERMISSION_DENIED'
  readonly status = 403
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND'
  readonly status = 404
}

export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR'
  readonly status = 500
}

/** レコード書き込み・一括コミットの失敗（集計結果は破棄される） */
export class FatalPersistenceError extends AppError {
  readonly code = 'PERSISTENCE_FAILURE'
  readonly status = 500
}

/** 解析クライアントの失敗。呼び出し元には返さずフォールバック結果に変換する */
export class ExternalServiceError extends AppError {
  readonly code = 'EXTERNAL_SERVICE_ERROR'
  readonly status = 502
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

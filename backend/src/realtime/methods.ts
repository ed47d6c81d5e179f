import { toLogNotification, type AuditLog } from '../lib/audit-log.js'
import { ValidationError, isAppError } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import type { Identity } from '../types/auth.js'
import { invokeMessageSchema, type ReplyMessage } from './protocol.js'

export type InvocationHandler = (identity: Identity, method: string, args: readonly unknown[]) => Promise<unknown>

export interface InvocationDeps {
  readonly audit: Pick<AuditLog, 'list'>
  readonly now?: () => Date
}

/** ライブ接続から呼び出せるサーバーメソッド */
export function createInvocationHandler(deps: InvocationDeps): InvocationHandler {
  const now = deps.now ?? (() => new Date())

  return async (identity, method) => {
    switch (method) {
      case 'Ping':
        return { serverTime: now().toISOString() }
      case 'GetLogs':
        return (await deps.audit.list(identity)).map(toLogNotification)
      default:
        throw new ValidationError(`Unknown method: ${method}`)
    }
  }
}

function invocationId(input: unknown): string | null {
  return typeof input === 'object' && input !== null && 'id' in input && typeof input.id === 'string' ? input.id : null
}

/** 受信した呼び出しメッセージを検証して実行し、返信メッセージを作る。例外は返信に変換する */
export async function answerInvocation(
  invoke: InvocationHandler,
  identity: Identity,
  input: unknown,
  logger: Logger,
): Promise<ReplyMessage> {
  const parsed = invokeMessageSchema.safeParse(input)
  if (!parsed.success) {
    return { type: 'error', id: invocationId(input), message: 'Invalid invocation message' }
  }

  const { id, method, args } = parsed.data
  try {
    return { type: 'result', id, result: await invoke(identity, method, args) }
  } catch (error) {
    if (isAppError(error)) {
      return { type: 'error', id, message: error.message }
    }
    logger.error({ err: error, method }, 'Realtime invocation failed')
    return { type: 'error', id, message: 'Internal server error' }
  }
}

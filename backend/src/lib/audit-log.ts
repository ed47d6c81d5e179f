import { randomUUID } from 'node:crypto'
import type { SubscriberHub } from '../realtime/hub.js'
import type { EventLogRepository } from '../repositories/types.js'
import type { Identity } from '../types/auth.js'
import { RECEIVE_LOG, type AuditEvent, type LogNotification, type RealtimeMessage } from '../types/events.js'
import { FatalPersistenceError, errorMessage } from './errors.js'
import type { Logger } from './logger.js'

export const EVENT_TYPES = {
  documentUpload: 'Document Upload',
  documentDelete: 'Document Delete',
  analysis: 'AI Analysis',
  analysisWarning: 'AI Analysis Warning',
  analysisError: 'AI Analysis Error',
} as const

/** 監査イベントを記録する側が必要とする操作 */
export interface AuditRecorder {
  append(eventType: string, description: string, ownerId?: string | null): Promise<AuditEvent>
}

export function toLogNotification(event: AuditEvent): LogNotification {
  return {
    id: event.id,
    eventType: event.eventType,
    details: event.description,
    ownerId: event.ownerId,
    timestamp: event.timestamp,
  }
}

/** 管理者はすべて、それ以外は自分のイベントだけを見られる */
export function canSeeEvent(identity: Identity, ownerId: string | null): boolean {
  return identity.role === 'Admin' || ownerId === identity.userId
}

export function canSeeMessage(identity: Identity, message: RealtimeMessage): boolean {
  if (message.type !== RECEIVE_LOG) return true
  const { payload } = message
  const ownerId =
    typeof payload === 'object' && payload !== null && 'ownerId' in payload && typeof payload.ownerId === 'string'
      ? payload.ownerId
      : null
  return canSeeEvent(identity, ownerId)
}

export interface AuditLogDeps {
  readonly repository: EventLogRepository
  readonly hub: SubscriberHub
  readonly logger: Logger
  readonly now?: () => Date
}

/**
 * 追記専用の監査ログ。永続化してからライブ購読者へ配信する。
 * 配信の失敗は記録済みのイベントに影響しない。
 */
export class AuditLog implements AuditRecorder {
  private readonly now: () => Date

  constructor(private readonly deps: AuditLogDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  async append(eventType: string, description: string, ownerId: string | null = null): Promise<AuditEvent> {
    const event: AuditEvent = {
      id: randomUUID(),
      eventType,
      description,
      ownerId,
      timestamp: this.now().toISOString(),
    }
    try {
      await this.deps.repository.append(event)
    } catch (error) {
      throw new FatalPersistenceError(`Failed to record audit event: ${errorMessage(error)}`, { cause: error })
    }

    await this.publish(RECEIVE_LOG, toLogNotification(event))
    return event
  }

  async publish(type: string, payload: unknown): Promise<void> {
    try {
      await this.deps.hub.publish({ type, payload })
    } catch (error) {
      this.deps.logger.warn({ err: error, messageType: type }, 'Failed to publish realtime message')
    }
  }

  /** 呼び出し元に見える範囲のイベントを新しい順で返す */
  async list(identity: Identity): Promise<AuditEvent[]> {
    return identity.role === 'Admin'
      ? this.deps.repository.listAll()
      : this.deps.repository.listByOwner(identity.userId)
  }
}

export interface AuditEvent {
  readonly id: string
  readonly eventType: string
  readonly description: string
  readonly ownerId: string | null
  readonly timestamp: string
}

/** ライブ購読者へ配信されるメッセージ */
export interface RealtimeMessage {
  readonly type: string
  readonly payload: unknown
}

export interface LogNotification {
  readonly id: string
  readonly eventType: string
  readonly details: string
  readonly ownerId: string | null
  readonly timestamp: string
}

export const RECEIVE_LOG = 'ReceiveLog'

import type { Logger } from '../lib/logger.js'
import { errorMessage } from '../lib/errors.js'
import type { RealtimeMessage } from '../types/events.js'

export interface Subscriber {
  readonly id: string
  readonly transport: 'websocket' | 'sse'
  send(message: RealtimeMessage): void | Promise<void>
  /** false を返したメッセージは届けない */
  accepts?(message: RealtimeMessage): boolean
}

/** ライブ購読者の集合。配信はベストエフォートで、送信に失敗した購読者は外す */
export class SubscriberHub {
  private readonly subscribers = new Set<Subscriber>()

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.subscribers.size
  }

  subscribe(subscriber: Subscriber): () => void {
    this.subscribers.add(subscriber)
    this.logger.debug({ subscriberId: subscriber.id, transport: subscriber.transport }, 'Subscriber connected')
    return () => this.unsubscribe(subscriber)
  }

  unsubscribe(subscriber: Subscriber): void {
    if (this.subscribers.delete(subscriber)) {
      this.logger.debug({ subscriberId: subscriber.id, transport: subscriber.transport }, 'Subscriber disconnected')
    }
  }

  /** 呼び出し時点の購読者のスナップショットに配信する。失敗は呼び出し元に伝えない */
  async publish(message: RealtimeMessage): Promise<void> {
    const snapshot = [...this.subscribers]
    const results = await Promise.allSettled(
      snapshot.map(async (subscriber) => {
        if (subscriber.accepts && !subscriber.accepts(message)) return
        await subscriber.send(message)
      }),
    )

    results.forEach((result, index) => {
      const subscriber = snapshot[index]
      if (result.status === 'fulfilled' || !subscriber) return
      this.subscribers.delete(subscriber)
      this.logger.warn(
        { subscriberId: subscriber.id, transport: subscriber.transport, messageType: message.type },
        `Dropped subscriber after failed delivery: ${errorMessage(result.reason)}`,
      )
    })
  }
}

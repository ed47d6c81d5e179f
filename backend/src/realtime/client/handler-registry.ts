import type { Logger } from '../../lib/logger.js'
import type { RealtimeHandler } from './types.js'

/** イベント名ごとのハンドラ集合。同じハンドラを二度登録しても配信は一回 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, Set<RealtimeHandler>>()

  constructor(private readonly logger: Logger) {}

  on(event: string, handler: RealtimeHandler): void {
    const set = this.handlers.get(event) ?? new Set<RealtimeHandler>()
    set.add(handler)
    this.handlers.set(event, set)
  }

  off(event: string, handler?: RealtimeHandler): void {
    if (!handler) {
      this.handlers.delete(event)
      return
    }
    const set = this.handlers.get(event)
    if (!set) return
    set.delete(handler)
    if (set.size === 0) this.handlers.delete(event)
  }

  count(event: string): number {
    return this.handlers.get(event)?.size ?? 0
  }

  emit(event: string, payload: unknown): void {
    const set = this.handlers.get(event)
    if (!set) return
    for (const handler of [...set]) {
      try {
        handler(payload)
      } catch (error) {
        this.logger.error({ err: error, event }, 'Realtime handler threw')
      }
    }
  }
}

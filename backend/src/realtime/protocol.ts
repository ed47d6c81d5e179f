import type { RawData } from 'ws'
import { z } from 'zod'

/** クライアント → サーバー: メソッド呼び出し */
export const invokeMessageSchema = z.object({
  type: z.literal('invoke'),
  id: z.string().min(1),
  method: z.string().min(1),
  args: z.array(z.unknown()).default([]),
})

export type InvokeMessage = z.infer<typeof invokeMessageSchema>

/** サーバー → クライアント: 呼び出し結果 */
export const replyMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('result'), id: z.string(), result: z.unknown() }),
  z.object({ type: z.literal('error'), id: z.string().nullable(), message: z.string() }),
])

export type ReplyMessage = z.infer<typeof replyMessageSchema>

/** サーバー → クライアント: 配信イベント */
export const eventMessageSchema = z.object({
  type: z.string().min(1),
  payload: z.unknown(),
})

export const INVOKE_PATH = 'invoke'

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8')
  return data.toString('utf-8')
}

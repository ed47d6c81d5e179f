import { Readable } from 'node:stream'
import { IOError, ValidationError, errorMessage } from './errors.js'

export type ContentSource = Uint8Array | string | AsyncIterable<Uint8Array | string>

/**
 * アップロード内容を一度だけメモリに取り込んだもの。
 * 保存と解析の両方が先頭から独立して読めるよう、読み出しのたびに新しいビューを返す。
 */
export class ContentBuffer {
  private readonly data: Buffer

  private constructor(data: Buffer) {
    this.data = data
  }

  get size(): number {
    return this.data.length
  }

  /** 呼び出しごとに独立したコピーを返す */
  toBuffer(): Buffer {
    return Buffer.from(this.data)
  }

  /** 先頭から読み直すストリームを毎回新しく作る */
  createReadStream(): Readable {
    return Readable.from([this.toBuffer()])
  }

  text(encoding: BufferEncoding = 'utf-8'): string {
    return this.data.toString(encoding)
  }

  base64(): string {
    return this.data.toString('base64')
  }

  static fromBytes(bytes: Uint8Array | string): ContentBuffer {
    return new ContentBuffer(typeof bytes === 'string' ? Buffer.from(bytes, 'utf-8') : Buffer.from(bytes))
  }

  /** ソースを最後まで読み切る。途中で失敗した場合は IOError */
  static async capture(source: ContentSource): Promise<ContentBuffer> {
    if (typeof source === 'string' || source instanceof Uint8Array) {
      return ContentBuffer.fromBytes(source)
    }
    if (!isAsyncIterable(source)) {
      throw new ValidationError('Upload content is not readable')
    }

    const chunks: Buffer[] = []
    try {
      for await (const chunk of source) {
        chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk))
      }
    } catch (error) {
      throw new IOError(`Failed to read upload content: ${errorMessage(error)}`, { cause: error })
    }
    return new ContentBuffer(Buffer.concat(chunks))
  }
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array | string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === 'function'
  )
}

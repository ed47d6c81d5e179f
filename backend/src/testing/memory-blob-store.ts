import type { BlobStore, StoredObject } from '../lib/blob-store/index.js'
import { NotFoundError } from '../lib/errors.js'

/** テスト用: メモリ上のブロブストア */
export class MemoryBlobStore implements BlobStore {
  readonly kind = 'local'
  readonly objects = new Map<string, StoredObject>()
  private sequence = 0

  async put(name: string, mediaType: string | undefined, bytes: Buffer): Promise<string> {
    const ref = `memory://test/${++this.sequence}_${name}`
    this.objects.set(ref, { bytes: Buffer.from(bytes), mediaType: mediaType ?? 'application/octet-stream' })
    return ref
  }

  async get(ref: string): Promise<StoredObject> {
    const object = this.objects.get(ref)
    if (!object) throw new NotFoundError(`Stored object not found: ${ref}`)
    return { bytes: Buffer.from(object.bytes), mediaType: object.mediaType }
  }

  async delete(ref: string): Promise<void> {
    if (!this.objects.delete(ref)) throw new NotFoundError(`Stored object not found: ${ref}`)
  }
}

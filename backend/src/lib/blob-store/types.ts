import type { StoredObjectRef } from '../../types/documents.js'

export interface StoredObject {
  readonly bytes: Buffer
  readonly mediaType: string
}

/**
 * バイト列の永続化先。ローカルファイルシステムとリモートオブジェクトストアで同じ振る舞いをする。
 * put は呼び出しごとに一意な名前を生成するため、同名ファイルの再アップロードで上書きされない。
 */
export interface BlobStore {
  readonly kind: 'local' | 'remote'
  put(name: string, mediaType: string | undefined, bytes: Buffer): Promise<StoredObjectRef>
  /** 存在しない参照は NotFoundError */
  get(ref: StoredObjectRef): Promise<StoredObject>
  /** 存在しない参照は NotFoundError */
  delete(ref: StoredObjectRef): Promise<void>
}

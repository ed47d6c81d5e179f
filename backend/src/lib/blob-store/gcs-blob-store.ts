import { Storage, type Bucket } from '@google-cloud/storage'
import type { StoredObjectRef } from '../../types/documents.js'
import type { RemoteStorageConfig } from '../config.js'
import { ConfigurationError, NotFoundError, errorMessage } from '../errors.js'
import { DEFAULT_CONTENT_TYPE, inferContentType, uniqueObjectName } from './content-type.js'
import type { BlobStore, StoredObject } from './types.js'

const SCHEME = 'gs://'

/** Cloud Storage の操作のうち、このストアが使うものだけ */
export interface ObjectBucket {
  readonly name: string
  exists(): Promise<boolean>
  location(): Promise<string | undefined>
  file(objectName: string): ObjectFile
}

export interface ObjectFile {
  save(data: Buffer, contentType: string): Promise<void>
  download(): Promise<Buffer>
  contentType(): Promise<string | undefined>
  delete(): Promise<void>
}

export type RequiredRemoteStorageConfig = Required<Pick<RemoteStorageConfig, 'accessKey' | 'secret' | 'region' | 'bucket'>> &
  Pick<RemoteStorageConfig, 'kmsKeyName'>

export function requireRemoteConfig(config: RemoteStorageConfig): RequiredRemoteStorageConfig {
  const { accessKey, secret, region, bucket, kmsKeyName } = config
  if (!accessKey || !secret || !region || !bucket) {
    const required = {
      STORAGE_ACCESS_KEY: accessKey,
      STORAGE_SECRET: secret,
      STORAGE_REGION: region,
      STORAGE_BUCKET: bucket,
    }
    const missing = Object.entries(required)
      .filter(([, value]) => !value)
      .map(([key]) => key)
    throw new ConfigurationError(`Remote storage is not configured: ${missing.join(', ')}`)
  }
  return { accessKey, secret, region, bucket, kmsKeyName }
}

/** @google-cloud/storage の Bucket を ObjectBucket に合わせる */
export function openGcsBucket(config: RequiredRemoteStorageConfig): ObjectBucket {
  const storage = new Storage({
    credentials: {
      client_email: config.accessKey,
      // 環境変数では改行がエスケープされている
      private_key: config.secret.replace(/\\n/g, '\n'),
    },
  })
  return wrapBucket(storage.bucket(config.bucket), config.kmsKeyName)
}

function wrapBucket(bucket: Bucket, kmsKeyName: string | undefined): ObjectBucket {
  return {
    name: bucket.name,
    async exists() {
      const [exists] = await bucket.exists()
      return exists
    },
    async location() {
      const [metadata] = await bucket.getMetadata()
      return metadata.location
    },
    file(objectName) {
      const file = bucket.file(objectName, kmsKeyName ? { kmsKeyName } : {})
      return {
        async save(data, contentType) {
          await file.save(data, { contentType, resumable: false })
        },
        async download() {
          const [contents] = await file.download()
          return contents
        },
        async contentType() {
          const [metadata] = await file.getMetadata()
          return metadata.contentType
        },
        async delete() {
          await file.delete()
        },
      }
    },
  }
}

/** Cloud Storage に保存する。参照は gs://<bucket>/<オブジェクト名> */
export class GcsBlobStore implements BlobStore {
  readonly kind = 'remote'

  private constructor(private readonly bucket: ObjectBucket) {}

  /**
   * バケットに到達できることを確認してから生成する。
   * 到達できない・リージョンが一致しない場合は ConfigurationError。
   */
  static async create(bucket: ObjectBucket, region: string): Promise<GcsBlobStore> {
    let exists: boolean
    let location: string | undefined
    try {
      exists = await bucket.exists()
      location = exists ? await bucket.location() : undefined
    } catch (error) {
      throw new ConfigurationError(`Storage bucket ${bucket.name} is not reachable: ${errorMessage(error)}`, {
        cause: error,
      })
    }
    if (!exists) {
      throw new ConfigurationError(`Storage bucket ${bucket.name} does not exist`)
    }
    if (location && location.toLowerCase() !== region.toLowerCase()) {
      throw new ConfigurationError(`Storage bucket ${bucket.name} is in ${location}, expected ${region}`)
    }
    return new GcsBlobStore(bucket)
  }

  async put(name: string, mediaType: string | undefined, bytes: Buffer): Promise<StoredObjectRef> {
    const objectName = uniqueObjectName(name)
    await this.bucket.file(objectName).save(bytes, mediaType || inferContentType(name))
    return `${SCHEME}${this.bucket.name}/${objectName}`
  }

  async get(ref: StoredObjectRef): Promise<StoredObject> {
    const file = this.bucket.file(this.objectNameOf(ref))
    try {
      const bytes = await file.download()
      const mediaType = (await file.contentType()) ?? DEFAULT_CONTENT_TYPE
      return { bytes, mediaType }
    } catch (error) {
      throw toNotFound(error, ref)
    }
  }

  async delete(ref: StoredObjectRef): Promise<void> {
    try {
      await this.bucket.file(this.objectNameOf(ref)).delete()
    } catch (error) {
      throw toNotFound(error, ref)
    }
  }

  private objectNameOf(ref: StoredObjectRef): string {
    const prefix = `${SCHEME}${this.bucket.name}/`
    if (!ref.startsWith(prefix) || ref.length === prefix.length) {
      throw new NotFoundError(`Stored object not found: ${ref}`)
    }
    return ref.slice(prefix.length)
  }
}

function toNotFound(error: unknown, ref: StoredObjectRef): unknown {
  if (typeof error === 'object' && error !== null && 'code' in error && error.code === 404) {
    return new NotFoundError(`Stored object not found: ${ref}`, { cause: error })
  }
  return error
}

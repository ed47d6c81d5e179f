import type { AppConfig } from '../config.js'
import { errorMessage } from '../errors.js'
import type { Logger } from '../logger.js'
import { GcsBlobStore, openGcsBucket, requireRemoteConfig, type ObjectBucket, type RequiredRemoteStorageConfig } from './gcs-blob-store.js'
import { LocalBlobStore } from './local-blob-store.js'
import type { BlobStore } from './types.js'

export type { BlobStore, StoredObject } from './types.js'
export { LocalBlobStore } from './local-blob-store.js'
export { GcsBlobStore, type ObjectBucket, type ObjectFile } from './gcs-blob-store.js'

/**
 * 設定に従ってストアを1つ生成する。
 * リモートストアを生成できない場合はローカルに切り替え、警告を出して続行する。
 */
export async function createBlobStore(
  config: AppConfig['storage'],
  logger: Logger,
  openBucket: (config: RequiredRemoteStorageConfig) => ObjectBucket = openGcsBucket,
): Promise<BlobStore> {
  if (config.useRemote) {
    try {
      const remote = requireRemoteConfig(config.remote)
      const store = await GcsBlobStore.create(openBucket(remote), remote.region)
      logger.info({ bucket: remote.bucket }, 'Using remote blob store')
      return store
    } catch (error) {
      logger.warn(
        { err: error, directory: config.localDirectory },
        `Remote blob store unavailable, falling back to local storage: ${errorMessage(error)}`,
      )
    }
  }
  logger.info({ directory: config.localDirectory }, 'Using local blob store')
  return new LocalBlobStore(config.localDirectory)
}

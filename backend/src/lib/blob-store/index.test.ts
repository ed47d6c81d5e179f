import { describe, it, expect } from '@jest/globals'
import { captureLogger } from '../../testing/capture-logger.js'
import { createBlobStore, type ObjectBucket } from './index.js'

const unreachableBucket: ObjectBucket = {
  name: 'test-bucket',
  async exists() {
    throw new Error('invalid_grant')
  },
  async location() {
    return undefined
  },
  file() {
    throw new Error('not used')
  },
}

const reachableBucket: ObjectBucket = { ...unreachableBucket, exists: async () => true }

const remote = {
  accessKey: 'test-access-key',
  secret: 'test-secret',
  region: 'us',
  bucket: 'test-bucket',
}

describe('createBlobStore', () => {
  it('should use local storage when remote storage is disabled', async () => {
    const { logger } = captureLogger()

    const store = await createBlobStore({ useRemote: false, localDirectory: './uploads', remote }, logger, () => {
      throw new Error('should not open a bucket')
    })

    expect(store.kind).toBe('local')
  })

  it('should use the remote store when the bucket is reachable', async () => {
    const { logger } = captureLogger()

    const store = await createBlobStore({ useRemote: true, localDirectory: './uploads', remote }, logger, () => reachableBucket)

    expect(store.kind).toBe('remote')
  })

  it('should fall back to local storage with a warning when the bucket is unreachable', async () => {
    const { logger, entries } = captureLogger()

    const store = await createBlobStore({ useRemote: true, localDirectory: './uploads', remote }, logger, () => unreachableBucket)

    expect(store.kind).toBe('local')
    const warnings = entries.filter((entry) => entry.severity === 'WARNING')
    expect(warnings.map((entry) => entry.message)).toEqual([
      'Remote blob store unavailable, falling back to local storage: Storage bucket test-bucket is not reachable: invalid_grant',
    ])
  })

  it('should fall back to local storage when credentials are missing', async () => {
    const { logger, entries } = captureLogger()

    const store = await createBlobStore(
      { useRemote: true, localDirectory: './uploads', remote: { bucket: 'test-bucket' } },
      logger,
    )

    expect(store.kind).toBe('local')
    expect(entries.some((entry) => entry.severity === 'WARNING')).toBe(true)
  })
})

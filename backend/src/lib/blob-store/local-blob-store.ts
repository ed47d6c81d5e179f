import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join, resolve, sep } from 'node:path'
import { fileURLToPath, pathToFileURL } from 'node:url'
import type { StoredObjectRef } from '../../types/documents.js'
import { NotFoundError } from '../errors.js'
import { DEFAULT_CONTENT_TYPE, inferContentType, uniqueObjectName } from './content-type.js'
import type { BlobStore, StoredObject } from './types.js'

const META_SUFFIX = '.meta.json'

interface ObjectMeta {
  contentType: string
}

/** ローカルディレクトリに保存する。参照は file:// URL */
export class LocalBlobStore implements BlobStore {
  readonly kind = 'local'
  private readonly directory: string
  private directoryReady = false

  constructor(directory: string) {
    this.directory = resolve(directory)
  }

  async put(name: string, mediaType: string | undefined, bytes: Buffer): Promise<StoredObjectRef> {
    await this.ensureDirectory()
    const path = join(this.directory, uniqueObjectName(name))
    const meta: ObjectMeta = { contentType: mediaType || inferContentType(name) }

    // 一時ファイルを経由せず1回で書き込む。wx で既存ファイルの上書きを防ぐ
    await writeFile(path, bytes, { flag: 'wx' })
    await writeFile(path + META_SUFFIX, JSON.stringify(meta))

    return pathToFileURL(path).href
  }

  async get(ref: StoredObjectRef): Promise<StoredObject> {
    const path = this.resolveRef(ref)
    const bytes = await readFile(path).catch((error: unknown) => {
      throw toNotFound(error, ref)
    })
    return { bytes, mediaType: await readContentType(path) }
  }

  async delete(ref: StoredObjectRef): Promise<void> {
    const path = this.resolveRef(ref)
    await rm(path).catch((error: unknown) => {
      throw toNotFound(error, ref)
    })
    await rm(path + META_SUFFIX, { force: true })
  }

  private async ensureDirectory(): Promise<void> {
    if (this.directoryReady) return
    await mkdir(this.directory, { recursive: true })
    this.directoryReady = true
  }

  // 保存先ディレクトリ外を指す参照は存在しないものとして扱う
  private resolveRef(ref: StoredObjectRef): string {
    let path: string
    try {
      path = fileURLToPath(ref)
    } catch (error) {
      throw new NotFoundError(`Stored object not found: ${ref}`, { cause: error })
    }
    if (!resolve(path).startsWith(this.directory + sep) || path.endsWith(META_SUFFIX)) {
      throw new NotFoundError(`Stored object not found: ${ref}`)
    }
    return resolve(path)
  }
}

async function readContentType(path: string): Promise<string> {
  let text: string
  try {
    text = await readFile(path + META_SUFFIX, 'utf-8')
  } catch (error) {
    if (isMissingFile(error)) return DEFAULT_CONTENT_TYPE
    throw error
  }
  const meta: unknown = JSON.parse(text)
  if (typeof meta === 'object' && meta !== null && 'contentType' in meta && typeof meta.contentType === 'string') {
    return meta.contentType
  }
  return DEFAULT_CONTENT_TYPE
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
}

function toNotFound(error: unknown, ref: StoredObjectRef): unknown {
  return isMissingFile(error) ? new NotFoundError(`Stored object not found: ${ref}`, { cause: error }) : error
}

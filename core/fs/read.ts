/**
 * Read helpers - list, read, stat and narrow any filesystem
 *
 * Each helper uses the filesystem's own capability when it has one and
 * otherwise falls back to `open` and the returned handle. Only `sub` has no
 * fallback.
 *
 * ## Error Codes
 *
 * | Code | Description |
 * |------|-------------|
 * | ENOTDIR | `readDir` fallback opened something that cannot be listed |
 * | ENOSYS | `sub` on a filesystem without `SubFS` |
 *
 * @module fs/read
 */

import { ENOSYS, ENOTDIR } from '../errors.js'
import type { DirEntry, File, FileInfo, FS } from '../types.js'
import { isReadDirFile, isReadDirFS, isReadFileFS, isStatFS, isSubFS } from './capabilities.js'

const CHUNK_SIZE = 512

async function withFile<T>(fsys: FS, name: string, fn: (file: File) => Promise<T>): Promise<T> {
  const file = await fsys.open(name)
  try {
    return await fn(file)
  } finally {
    await file.close()
  }
}

/**
 * Entries of `dir`, sorted by name.
 */
export async function readDir(fsys: FS, dir: string): Promise<DirEntry[]> {
  if (isReadDirFS(fsys)) {
    return fsys.readDir(dir)
  }
  const entries = await withFile(fsys, dir, async (file) => {
    if (!isReadDirFile(file)) {
      throw new ENOTDIR('ReadDir', dir)
    }
    return (await file.readDir(-1)) ?? []
  })
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
}

/**
 * Whole content of `name`.
 */
export async function readFile(fsys: FS, name: string): Promise<Uint8Array> {
  if (isReadFileFS(fsys)) {
    return fsys.readFile(name)
  }
  return withFile(fsys, name, async (file) => {
    const chunks: Uint8Array[] = []
    let total = 0
    for (;;) {
      const { bytesRead, buffer } = await file.read(new Uint8Array(CHUNK_SIZE))
      if (bytesRead === 0) break
      chunks.push(buffer.subarray(0, bytesRead))
      total += bytesRead
    }
    const content = new Uint8Array(total)
    let offset = 0
    for (const chunk of chunks) {
      content.set(chunk, offset)
      offset += chunk.length
    }
    return content
  })
}

export async function stat(fsys: FS, name: string): Promise<FileInfo> {
  if (isStatFS(fsys)) {
    return fsys.stat(name)
  }
  return withFile(fsys, name, (file) => file.stat())
}

/**
 * View of the sub-tree at `dir`.
 *
 * @throws {ENOSYS} If `fsys` has no `sub`
 */
export async function sub(fsys: FS, dir: string): Promise<FS> {
  if (!isSubFS(fsys)) {
    throw new ENOSYS('Sub', dir)
  }
  return fsys.sub(dir)
}

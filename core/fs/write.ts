/**
 * Write helpers - create directories and files on any filesystem
 *
 * Each helper hands the call to the filesystem's own `WriteFileFS` methods.
 * A filesystem without the write capability cannot be written through, so
 * the helpers fail instead of emulating it.
 *
 * ## Error Codes
 *
 * | Code | Description |
 * |------|-------------|
 * | ENOSYS | `fsys` does not implement `WriteFileFS` |
 *
 * Errors raised by the filesystem itself propagate unchanged.
 *
 * @module fs/write
 */

import { ENOSYS } from '../errors.js'
import type { FS, WriterFile } from '../types.js'
import { isWriteFileFS } from './capabilities.js'

/**
 * Create `dir` and any missing parents.
 *
 * @throws {ENOSYS} If `fsys` cannot write
 */
export async function mkdirAll(fsys: FS, dir: string, mode?: number): Promise<void> {
  if (!isWriteFileFS(fsys)) {
    throw new ENOSYS('MkdirAll', dir)
  }
  return fsys.mkdirAll(dir, mode)
}

/**
 * Create (or reuse) `name` and return a writable handle.
 *
 * @throws {ENOSYS} If `fsys` cannot write
 */
export async function createFile(fsys: FS, name: string, mode?: number): Promise<WriterFile> {
  if (!isWriteFileFS(fsys)) {
    throw new ENOSYS('CreateFile', name)
  }
  return fsys.createFile(name, mode)
}

/**
 * Replace the content of `name`.
 *
 * @returns Number of bytes written
 * @throws {ENOSYS} If `fsys` cannot write
 */
export async function writeFile(fsys: FS, name: string, data: Uint8Array | string, mode?: number): Promise<number> {
  if (!isWriteFileFS(fsys)) {
    throw new ENOSYS('WriteFile', name)
  }
  return fsys.writeFile(name, data, mode)
}

/**
 * Remove helpers
 *
 * ## Error Codes
 *
 * | Code | Description |
 * |------|-------------|
 * | ENOSYS | `fsys` does not implement `RemoveFileFS` |
 *
 * @module fs/remove
 */

import { ENOSYS } from '../errors.js'
import type { FS } from '../types.js'
import { isRemoveFileFS } from './capabilities.js'

export async function removeFile(fsys: FS, name: string): Promise<void> {
  if (!isRemoveFileFS(fsys)) {
    throw new ENOSYS('RemoveFile', name)
  }
  return fsys.removeFile(name)
}

/**
 * Remove `path` and everything beneath it.
 */
export async function removeAll(fsys: FS, path: string): Promise<void> {
  if (!isRemoveFileFS(fsys)) {
    throw new ENOSYS('RemoveAll', path)
  }
  return fsys.removeAll(path)
}

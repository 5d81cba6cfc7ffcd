/**
 * walkDir - pre-order traversal of a filesystem tree
 *
 * Visits `root` and then every path beneath it in lexical order, directories
 * before their contents. The visitor may return {@link SKIP_DIR}: from a
 * directory it skips that directory's contents, from a file it skips the
 * file's remaining siblings. Any error thrown by the visitor or raised while
 * listing aborts the walk and is rethrown.
 *
 * @example
 * ```typescript
 * await walkDir(fsys, '.', (path, entry) => {
 *   if (entry.isDirectory() && path === 'node_modules') return SKIP_DIR
 *   console.log(path)
 * })
 * ```
 *
 * @module fs/walk
 */

import { S_IFMT } from '../constants.js'
import type { DirEntry, FileInfo, FS } from '../types.js'
import { readDir, stat } from './read.js'

/**
 * Returned by a visitor to prune the walk.
 */
export const SKIP_DIR: unique symbol = Symbol('SKIP_DIR')

export type WalkDirResult = void | typeof SKIP_DIR

export type WalkDirFunc = (path: string, entry: DirEntry) => WalkDirResult | Promise<WalkDirResult>

/**
 * Directory entry for a path known only through its metadata (the walk
 * root).
 */
function entryFromInfo(info: FileInfo): DirEntry {
  return {
    name: info.name,
    type: info.mode & S_IFMT,
    isDirectory: () => info.isDirectory(),
    isFile: () => info.isFile(),
    info: async () => info,
  }
}

export async function walkDir(fsys: FS, root: string, visit: WalkDirFunc): Promise<void> {
  const info = await stat(fsys, root)
  await walk(fsys, root, entryFromInfo(info), visit)
}

async function walk(fsys: FS, path: string, entry: DirEntry, visit: WalkDirFunc): Promise<WalkDirResult> {
  const result = await visit(path, entry)
  if (result === SKIP_DIR || !entry.isDirectory()) {
    return result
  }

  for (const child of await readDir(fsys, path)) {
    const childPath = path === '.' ? child.name : `${path}/${child.name}`
    if ((await walk(fsys, childPath, child, visit)) === SKIP_DIR && !child.isDirectory()) {
      break
    }
  }
  return undefined
}

/**
 * glob - match paths on any filesystem
 *
 * Uses the filesystem's own `glob` when it has one. Otherwise the pattern is
 * split at its last `/`; the directory part is expanded first (recursively,
 * when it has wildcards of its own) and each resulting directory is listed
 * and its entry names matched against the final element.
 *
 * @module fs/glob
 */

import { isFSError } from '../errors.js'
import { createMatcher, hasMeta } from '../glob/match.js'
import type { DirEntry, FS } from '../types.js'
import { isGlobFS } from './capabilities.js'
import { readDir, stat } from './read.js'

/**
 * Paths of `fsys` matching `pattern`.
 *
 * @throws {GlobSyntaxError} If the pattern is malformed
 *
 * @example
 * ```typescript
 * await glob(fsys, 'dir0/*.txt') // ['dir0/file00.txt', 'dir0/file01.txt']
 * ```
 */
export async function glob(fsys: FS, pattern: string): Promise<string[]> {
  if (isGlobFS(fsys)) {
    return fsys.glob(pattern)
  }
  return globWalk(fsys, pattern)
}

/**
 * Glob by listing directories, ignoring any `glob` method `fsys` has.
 * Backends without an index of their own implement `glob` with this.
 *
 * @throws {GlobSyntaxError} If the pattern is malformed
 */
export async function globWalk(fsys: FS, pattern: string): Promise<string[]> {
  createMatcher(pattern)
  return expand(fsys, pattern)
}

async function expand(fsys: FS, pattern: string): Promise<string[]> {
  if (!hasMeta(pattern)) {
    try {
      await stat(fsys, pattern)
      return [pattern]
    } catch (error) {
      if (isFSError(error)) return []
      throw error
    }
  }

  const slash = pattern.lastIndexOf('/')
  const dir = slash === -1 ? '.' : pattern.slice(0, slash)
  const matchesName = createMatcher(pattern.slice(slash + 1))
  const dirs = hasMeta(dir) ? await expand(fsys, dir) : [dir]

  const matches: string[] = []
  for (const parent of dirs) {
    let entries: DirEntry[]
    try {
      entries = await readDir(fsys, parent)
    } catch (error) {
      // files and unreadable directories contribute no matches
      if (isFSError(error)) continue
      throw error
    }
    for (const entry of entries) {
      if (matchesName(entry.name)) {
        matches.push(parent === '.' ? entry.name : `${parent}/${entry.name}`)
      }
    }
  }
  return matches
}

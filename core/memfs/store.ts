/**
 * Store - sorted path-indexed key/value container
 *
 * Keys are absolute POSIX paths (`/`, `/a`, `/a/b.txt`). The key list is kept
 * sorted after every insertion, which lets point lookups use binary search and
 * lets every subtree be addressed as one contiguous run: all keys that start
 * with `p + "/"` sit next to each other in sorted order, beginning at the
 * lower bound of `p + "/"`.
 *
 * The run does not necessarily begin right after `p` itself: siblings such as
 * `/a-b` or `/a.txt` sort between `/a` and `/a/...` because `-` and `.` come
 * before `/`. Range operations therefore always search for `p + "/"` rather
 * than scanning forward from `p`.
 *
 * Store methods are not synchronized; callers serialize access.
 *
 * @module memfs/store
 */

import { createMatcher } from '../glob/match.js'
import type { Entry } from './entry.js'

/**
 * Sorted key/value store mapping absolute keys to entries.
 */
export class Store {
  private sortedKeys: string[] = []
  private readonly values = new Map<string, Entry>()

  /**
   * Number of stored keys.
   */
  get size(): number {
    return this.sortedKeys.length
  }

  /**
   * Snapshot of all keys in sorted order.
   */
  keys(): readonly string[] {
    return [...this.sortedKeys]
  }

  get(key: string): Entry | undefined {
    return this.values.get(key)
  }

  /**
   * Insert or replace. A new key is appended and the key list re-sorted.
   */
  put(key: string, entry: Entry): Entry {
    if (!this.values.has(key)) {
      this.sortedKeys.push(key)
      this.sortedKeys.sort()
    }
    this.values.set(key, entry)
    return entry
  }

  /**
   * Remove exactly one key.
   *
   * @returns The removed entry, or `undefined` if the key was absent
   */
  remove(key: string): Entry | undefined {
    const index = this.indexOf(key)
    if (index === -1) {
      return undefined
    }
    const entry = this.values.get(key)
    this.sortedKeys.splice(index, 1)
    this.values.delete(key)
    return entry
  }

  /**
   * Remove `prefix` itself and every key beneath it.
   */
  removeAll(prefix: string): void {
    this.remove(prefix)

    const [from, to] = this.childRange(prefix)
    for (let i = from; i < to; i++) {
      this.values.delete(this.sortedKeys[i])
    }
    this.sortedKeys.splice(from, to - from)
  }

  /**
   * Keys of the direct children of `prefix`, in sorted order.
   * Empty if `prefix` is not stored.
   */
  prefixKeys(prefix: string): string[] {
    if (!this.values.has(prefix)) {
      return []
    }
    const childPrefix = toChildPrefix(prefix)
    const [from, to] = this.childRange(prefix)

    const keys: string[] = []
    for (let i = from; i < to; i++) {
      const key = this.sortedKeys[i]
      const rest = key.slice(childPrefix.length)
      if (rest !== '' && !rest.includes('/')) {
        keys.push(key)
      }
    }
    return keys
  }

  /**
   * Keys beneath `prefix` whose path relative to `prefix` matches the glob
   * `pattern`, in sorted order. Empty if `prefix` is not stored.
   *
   * @throws {GlobSyntaxError} If the pattern is malformed, even when nothing
   *   would be scanned
   */
  prefixGlobKeys(prefix: string, pattern: string): string[] {
    const matches = createMatcher(pattern)
    if (!this.values.has(prefix)) {
      return []
    }
    const childPrefix = toChildPrefix(prefix)
    const [from, to] = this.childRange(prefix)

    const keys: string[] = []
    for (let i = from; i < to; i++) {
      const key = this.sortedKeys[i]
      const rest = key.slice(childPrefix.length)
      if (rest !== '' && matches(rest)) {
        keys.push(key)
      }
    }
    return keys
  }

  // ===========================================================================
  // Binary search helpers
  // ===========================================================================

  /**
   * First index whose key is >= `target`.
   */
  private lowerBound(target: string): number {
    let lo = 0
    let hi = this.sortedKeys.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.sortedKeys[mid] < target) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }
    return lo
  }

  private indexOf(key: string): number {
    const i = this.lowerBound(key)
    return i < this.sortedKeys.length && this.sortedKeys[i] === key ? i : -1
  }

  /**
   * Half-open index range of the keys starting with `prefix + "/"`.
   */
  private childRange(prefix: string): [number, number] {
    const childPrefix = toChildPrefix(prefix)
    const from = this.lowerBound(childPrefix)
    let to = from
    while (to < this.sortedKeys.length && this.sortedKeys[to].startsWith(childPrefix)) {
      to++
    }
    return [from, to]
  }
}

function toChildPrefix(prefix: string): string {
  return prefix.endsWith('/') ? prefix : prefix + '/'
}

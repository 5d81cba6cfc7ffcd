/**
 * Entry - the value stored for every path of an in-memory filesystem
 *
 * One record serves as both the directory-listing entry and the file
 * metadata: `readDir` returns entries, `stat` returns an entry, and
 * `DirEntry.info()` resolves to the entry itself.
 *
 * @module memfs/entry
 */

import { S_IFDIR, S_IFMT, S_IFREG, getFullModeString, isDirMode, withFileType } from '../constants.js'
import type { DirEntry, FileInfo } from '../types.js'

const EMPTY = new Uint8Array(0)

/**
 * A file or directory held by the store.
 *
 * Whether an entry is a directory is read from the file-type bits of its
 * mode, so `isDir` and the mode can never disagree. Directories hold no data
 * and report a size of 0.
 */
export class Entry implements FileInfo, DirEntry {
  /** Base name, not the full key */
  readonly name: string

  private readonly bits: number
  private content: Uint8Array
  private written: Date

  private constructor(name: string, mode: number, modTime: Date, data: Uint8Array) {
    this.name = name
    this.bits = mode
    this.written = modTime
    this.content = data
  }

  /**
   * A directory entry; `mode` is stored with `S_IFDIR` set.
   */
  static directory(name: string, mode: number, modTime: Date): Entry {
    return new Entry(name, withFileType(mode, S_IFDIR), modTime, EMPTY)
  }

  /**
   * A regular file entry; `mode` is stored with `S_IFREG` set.
   */
  static file(name: string, mode: number, modTime: Date, data: Uint8Array = EMPTY): Entry {
    return new Entry(name, withFileType(mode, S_IFREG), modTime, data)
  }

  /** File-type and permission bits */
  get mode(): number {
    return this.bits
  }

  /** Last write time */
  get modTime(): Date {
    return this.written
  }

  /** Content bytes, replaced (never mutated) on write */
  get data(): Uint8Array {
    return this.content
  }

  /**
   * Swap in new content. Only the owning filesystem calls this, with the
   * store's lock held.
   * @internal
   */
  replaceData(data: Uint8Array, modTime: Date): void {
    this.content = data
    this.written = modTime
  }

  get isDir(): boolean {
    return isDirMode(this.mode)
  }

  get size(): number {
    return this.isDir ? 0 : this.data.length
  }

  get type(): number {
    return this.mode & S_IFMT
  }

  isDirectory(): boolean {
    return this.isDir
  }

  isFile(): boolean {
    return !this.isDir
  }

  async info(): Promise<FileInfo> {
    return this
  }

  /**
   * ls-style one-line summary, e.g. `-rw-r--r-- 5 2024-01-01T00:00:00.000Z a.txt`.
   */
  toString(): string {
    return `${getFullModeString(this.mode)} ${this.size} ${this.modTime.toISOString()} ${this.name}`
  }
}

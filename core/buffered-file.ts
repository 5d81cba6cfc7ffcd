/**
 * BufferedFile - file handle returned by `open` and `createFile`
 *
 * A handle holds the content as it was when opened and does not touch the
 * owning filesystem again until `close`. Reads walk
 * that snapshot, writes append to it, and `close` commits it back through the
 * owner's `writeFile` if anything was written. Directory handles carry no
 * content and page through the owner's listing instead.
 *
 * Handles do not hold the owner's lock between calls: a read observes the
 * data as it was at open time, not later writes made through the filesystem.
 *
 * @module buffered-file
 */

import { EISDIR } from './errors.js'
import type { DirEntry, FileInfo, ReadDirFile, ReadResult, WriterFile } from './types.js'

const encoder = new TextEncoder()

/**
 * The filesystem operations a handle calls back into.
 */
export interface FileOwner {
  stat(name: string): Promise<FileInfo>
  readDir(name: string): Promise<DirEntry[]>
  writeFile(name: string, data: Uint8Array, mode?: number): Promise<number>
}

/**
 * File or directory handle.
 *
 * @example
 * ```typescript
 * const file = await fsys.createFile('notes.txt')
 * await file.write('hello')
 * await file.write(', world')
 * await file.close() // commits "hello, world"
 * ```
 */
export class BufferedFile implements ReadDirFile, WriterFile {
  private content: Uint8Array | null
  private readOffset = 0
  private wrote = false
  private dirEntries: DirEntry[] | null = null
  private dirIndex = 0

  /**
   * @param owner - Filesystem the handle was opened on
   * @param name - Path the handle was opened with, relative to `owner`
   * @param mode - Mode passed to `writeFile` when the buffer is committed
   * @param content - Initial content, or `null` for a directory handle
   */
  constructor(
    private readonly owner: FileOwner,
    readonly name: string,
    readonly mode: number,
    content: Uint8Array | null
  ) {
    this.content = content
  }

  async read(buffer: Uint8Array): Promise<ReadResult> {
    if (this.content === null) {
      throw new EISDIR('Read', this.name)
    }
    const bytesRead = Math.min(buffer.length, this.content.length - this.readOffset)
    buffer.set(this.content.subarray(this.readOffset, this.readOffset + bytesRead))
    this.readOffset += bytesRead
    return { bytesRead, buffer }
  }

  async write(data: Uint8Array | string): Promise<{ bytesWritten: number }> {
    if (this.content === null) {
      throw new EISDIR('Write', this.name)
    }
    const bytes = typeof data === 'string' ? encoder.encode(data) : data
    const grown = new Uint8Array(this.content.length + bytes.length)
    grown.set(this.content)
    grown.set(bytes, this.content.length)
    this.content = grown
    this.wrote = true
    return { bytesWritten: bytes.length }
  }

  async stat(): Promise<FileInfo> {
    return this.owner.stat(this.name)
  }

  /**
   * Commit buffered writes, if any, through the owner's `writeFile`.
   *
   * The dirty flag is left set, so closing a written handle twice commits
   * the same content twice.
   */
  async close(): Promise<void> {
    if (this.wrote && this.content !== null) {
      await this.owner.writeFile(this.name, this.content, this.mode)
      return
    }
    this.dirEntries = null
  }

  async readDir(n = -1): Promise<DirEntry[] | null> {
    if (this.dirEntries === null) {
      this.dirEntries = await this.owner.readDir(this.name)
      this.dirIndex = 0
    }

    const total = this.dirEntries.length
    if (this.dirIndex >= total) {
      return n > 0 ? null : []
    }
    const end = n > 0 ? Math.min(this.dirIndex + n, total) : total
    const page = this.dirEntries.slice(this.dirIndex, end)
    this.dirIndex = end
    return page
  }
}

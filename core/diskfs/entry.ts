/**
 * DiskEntry - metadata of a path on the host disk
 *
 * @module diskfs/entry
 */

import { S_IFMT, isDirMode } from '../constants.js'
import type { DirEntry, FileInfo } from '../types.js'
import type { DiskStats } from './ops.js'

/**
 * Directory entry and file metadata in one, read from a single `stat`.
 * Directories report a size of 0 whatever the host says.
 */
export class DiskEntry implements FileInfo, DirEntry {
  readonly name: string
  readonly size: number
  readonly mode: number
  readonly modTime: Date

  constructor(name: string, stats: DiskStats) {
    this.name = name
    this.size = isDirMode(stats.mode) ? 0 : stats.size
    this.mode = stats.mode
    this.modTime = stats.mtime
  }

  get type(): number {
    return this.mode & S_IFMT
  }

  isDirectory(): boolean {
    return isDirMode(this.mode)
  }

  isFile(): boolean {
    return !this.isDirectory()
  }

  async info(): Promise<FileInfo> {
    return this
  }
}

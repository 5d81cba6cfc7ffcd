/**
 * Host system calls used by {@link DiskFS}
 *
 * The disk backend never touches `node:fs` directly; it goes through a
 * `DiskOps` provider given to its constructor. Tests pass a provider that
 * wraps {@link nodeDiskOps} and fails selected calls.
 *
 * All paths handed to a provider are host paths, already joined onto the
 * filesystem's directory.
 *
 * @module diskfs/ops
 */

import { lstat, mkdir, readdir, readFile, rm, rmdir, stat, unlink, writeFile } from 'node:fs/promises'

/**
 * The subset of `fs.Stats` the disk backend reads.
 */
export interface DiskStats {
  readonly size: number
  readonly mode: number
  readonly mtime: Date
}

export interface DiskOps {
  stat(path: string): Promise<DiskStats>
  /** Entry names of a directory, in any order */
  readdir(path: string): Promise<string[]>
  readFile(path: string): Promise<Uint8Array>
  /** Create or truncate `path` and write `data` */
  writeFile(path: string, data: Uint8Array, mode: number): Promise<void>
  /** `mkdir -p` */
  mkdirAll(path: string, mode: number): Promise<void>
  /** Remove a file or an empty directory */
  remove(path: string): Promise<void>
  /** `rm -rf`; succeeds if `path` does not exist */
  removeAll(path: string): Promise<void>
}

/**
 * Provider backed by `node:fs/promises`.
 */
export const nodeDiskOps: DiskOps = {
  stat: (path) => stat(path),
  readdir: (path) => readdir(path),
  readFile: (path) => readFile(path),
  writeFile: (path, data, mode) => writeFile(path, data, { mode }),
  async mkdirAll(path, mode) {
    await mkdir(path, { recursive: true, mode })
  },
  async remove(path) {
    if ((await lstat(path)).isDirectory()) {
      await rmdir(path)
    } else {
      await unlink(path)
    }
  },
  removeAll: (path) => rm(path, { recursive: true, force: true }),
}

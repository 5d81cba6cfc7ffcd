/**
 * DiskFS - filesystem rooted at a directory on the host disk
 *
 * Request paths are validated the same way as for the in-memory backend
 * (plus, on Windows hosts, no `\` or `:`), joined onto the root directory and
 * passed to a {@link DiskOps} provider. Host errors with a known POSIX code
 * are re-raised as the matching `FSError` class, labelled with the operation
 * and the caller's relative path.
 *
 * Writes through `createFile` are buffered in a {@link BufferedFile} and
 * written out on close.
 *
 * @example
 * ```typescript
 * const fsys = new DiskFS('/srv/data')
 * await fsys.writeFile('reports/today.txt', 'ok')
 * await fsys.readDir('reports') // [DiskEntry { name: 'today.txt' }]
 * ```
 *
 * @module diskfs
 */

import { dirname as hostDirname, join as hostJoin } from 'node:path'
import { BufferedFile } from '../buffered-file.js'
import { createConfig, type FsConfig, type FsConfigOptions } from '../config.js'
import { MODE_BITS } from '../constants.js'
import { EINVAL, fromSystemError } from '../errors.js'
import { globWalk } from '../fs/glob.js'
import { basename, isValidPath } from '../path.js'
import type { GlobFS, ReadDirFS, ReadFileFS, RemoveFileFS, StatFS, SubFS, WriteFileFS } from '../types.js'
import { DiskEntry } from './entry.js'
import { nodeDiskOps, type DiskOps } from './ops.js'

const encoder = new TextEncoder()
const EMPTY = new Uint8Array(0)

export interface DiskFSOptions extends FsConfigOptions {
  /** System-call provider; defaults to {@link nodeDiskOps} */
  ops?: DiskOps
  /** Host platform deciding the extra path checks; defaults to `process.platform` */
  platform?: NodeJS.Platform
}

/**
 * Whether `name` may be used on a host running `platform`.
 */
export function isValidDiskPath(name: string, platform: NodeJS.Platform): boolean {
  return isValidPath(name) && !(platform === 'win32' && /[\\:]/.test(name))
}

export class DiskFS implements ReadDirFS, ReadFileFS, StatFS, GlobFS, SubFS, WriteFileFS, RemoveFileFS {
  /** Host directory this filesystem is rooted at */
  readonly dir: string

  private readonly ops: DiskOps
  private readonly platform: NodeJS.Platform
  private readonly config: FsConfig

  constructor(dir: string, options: DiskFSOptions = {}) {
    const { ops = nodeDiskOps, platform = process.platform, ...config } = options
    this.dir = dir
    this.ops = ops
    this.platform = platform
    this.config = createConfig(config)
  }

  private check(op: string, name: string): string {
    if (!isValidDiskPath(name, this.platform)) {
      throw new EINVAL(op, name)
    }
    return hostJoin(this.dir, name)
  }

  /**
   * Run a host call, translating its failure for `op` on `name`.
   */
  private async host<T>(op: string, name: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call()
    } catch (error) {
      throw fromSystemError(error, op, name)
    }
  }

  // ===========================================================================
  // Read capabilities
  // ===========================================================================

  async open(name: string): Promise<BufferedFile> {
    const path = this.check('Open', name)
    return this.host('Open', name, async () => {
      const entry = new DiskEntry(basename(name), await this.ops.stat(path))
      const content = entry.isDirectory() ? null : await this.ops.readFile(path)
      return new BufferedFile(this, name, entry.mode, content)
    })
  }

  async glob(pattern: string): Promise<string[]> {
    return globWalk(this, pattern)
  }

  /**
   * Entries of `dir`, sorted by name.
   */
  async readDir(dir: string): Promise<DiskEntry[]> {
    const path = this.check('ReadDir', dir)
    return this.host('ReadDir', dir, async () => {
      const names = (await this.ops.readdir(path)).sort()
      const entries: DiskEntry[] = []
      for (const name of names) {
        entries.push(new DiskEntry(name, await this.ops.stat(hostJoin(path, name))))
      }
      return entries
    })
  }

  async readFile(name: string): Promise<Uint8Array> {
    const path = this.check('ReadFile', name)
    return this.host('ReadFile', name, () => this.ops.readFile(path))
  }

  async stat(name: string): Promise<DiskEntry> {
    const path = this.check('Open', name)
    return this.host('Open', name, async () => new DiskEntry(basename(name), await this.ops.stat(path)))
  }

  /**
   * A filesystem rooted at the directory `dir`, sharing this one's provider
   * and configuration.
   *
   * @throws EINVAL if `dir` is a file
   */
  async sub(dir: string): Promise<DiskFS> {
    const path = this.check('Sub', dir)
    const entry = await this.stat(dir)
    if (!entry.isDirectory()) {
      throw new EINVAL('Sub', dir)
    }
    return new DiskFS(path, { ...this.config, ops: this.ops, platform: this.platform })
  }

  // ===========================================================================
  // Write capabilities
  // ===========================================================================

  async mkdirAll(dir: string, mode: number = this.config.dirMode): Promise<void> {
    const path = this.check('MkdirAll', dir)
    return this.host('MkdirAll', dir, () => this.ops.mkdirAll(path, mode & MODE_BITS))
  }

  /**
   * Create or truncate `name`, creating its parents, and return an empty
   * handle whose writes are written out on close.
   */
  async createFile(name: string, mode: number = this.config.fileMode): Promise<BufferedFile> {
    await this.write(name, EMPTY, mode)
    return new BufferedFile(this, name, mode, EMPTY)
  }

  async writeFile(name: string, data: Uint8Array | string, mode: number = this.config.fileMode): Promise<number> {
    const bytes = typeof data === 'string' ? encoder.encode(data) : data
    await this.write(name, bytes, mode)
    return bytes.length
  }

  private async write(name: string, data: Uint8Array, mode: number): Promise<void> {
    const path = this.check('Create', name)
    const parent = hostDirname(path)
    await this.host('MkdirAll', name, () => this.ops.mkdirAll(parent, this.config.dirMode & MODE_BITS))
    await this.host('Create', name, () => this.ops.writeFile(path, data, mode & MODE_BITS))
  }

  // ===========================================================================
  // Remove capabilities
  // ===========================================================================

  /**
   * Remove a file or an empty directory.
   *
   * @throws ENOENT if `name` does not exist
   * @throws ENOTEMPTY if `name` is a directory with entries
   */
  async removeFile(name: string): Promise<void> {
    const path = this.check('RemoveFile', name)
    return this.host('RemoveFile', name, () => this.ops.remove(path))
  }

  /**
   * Remove `path` and everything beneath it. A missing path is not an error.
   */
  async removeAll(path: string): Promise<void> {
    const hostPath = this.check('RemoveAll', path)
    return this.host('RemoveAll', path, () => this.ops.removeAll(hostPath))
  }
}

/**
 * MemFS - in-memory filesystem
 *
 * A facade over one {@link Store}. Every request path is a relative path
 * validated with `isValidPath`, joined onto the instance's root prefix and
 * normalized into a store key. Sub-filesystems returned by `sub` are views
 * with a deeper root prefix over the very same store, so writes through a
 * view are visible to its parent and the other way round.
 *
 * Modes are stored but never enforced.
 *
 * @example
 * ```typescript
 * import { MemFS } from 'layerfs'
 *
 * const fsys = new MemFS()
 * await fsys.mkdirAll('a/b')
 * await fsys.writeFile('a/b/f.txt', 'hi')
 * await fsys.readDir('a/b')       // [Entry { name: 'f.txt' }]
 * await fsys.glob('a/*\/f.txt')   // ['a/b/f.txt']
 * ```
 *
 * @module memfs
 */

import { BufferedFile } from '../buffered-file.js'
import { createConfig, type FsConfig, type FsConfigOptions } from '../config.js'
import { EINVAL, ENOENT, ENOTDIR } from '../errors.js'
import { Mutex } from '../mutex.js'
import { basename, dirname, isValidPath, join, normalize, segments } from '../path.js'
import type { DirEntry, FileInfo, GlobFS, ReadDirFS, ReadFileFS, RemoveFileFS, StatFS, SubFS, WriteFileFS } from '../types.js'
import { Entry } from './entry.js'
import { Store } from './store.js'

const encoder = new TextEncoder()

/**
 * Options for a new in-memory filesystem.
 */
export type MemFSOptions = FsConfigOptions

/**
 * In-memory filesystem implementing every read, write and remove capability.
 *
 * Each instance serializes its own operations with one mutex. Views created
 * by {@link MemFS.sub} own separate mutexes over the shared store, so
 * operations issued through a parent and through one of its views are not
 * mutually excluded.
 */
export class MemFS implements ReadDirFS, ReadFileFS, StatFS, GlobFS, SubFS, WriteFileFS, RemoveFileFS {
  private readonly mutex = new Mutex()
  private readonly config: FsConfig
  private root = '/'
  private store = new Store()

  constructor(options: MemFSOptions = {}) {
    this.config = createConfig(options)
    this.store.put('/', Entry.directory('.', this.config.dirMode, this.config.now()))
  }

  /** A filesystem rooted at `root` over an existing store */
  private static view(config: FsConfig, root: string, store: Store): MemFS {
    const fsys = new MemFS(config)
    fsys.root = root
    fsys.store = store
    return fsys
  }

  // ===========================================================================
  // Key mapping
  // ===========================================================================

  /** Store key of a relative request path */
  private key(name: string): string {
    return normalize(join(this.root, name))
  }

  /** Relative request path of a store key beneath this instance's root */
  private rel(key: string): string {
    return this.root === '/' ? key.slice(1) : key.slice(this.root.length + 1)
  }

  // ===========================================================================
  // Unlocked helpers (callers hold the mutex)
  // ===========================================================================

  private lookup(name: string): Entry {
    if (!isValidPath(name)) {
      throw new EINVAL('Open', name)
    }
    const entry = this.store.get(this.key(name))
    if (!entry) {
      throw new ENOENT('Open', name)
    }
    return entry
  }

  private mkdirAllLocked(dir: string, mode: number): void {
    if (!isValidPath(dir)) {
      throw new EINVAL('MkdirAll', dir)
    }
    const parts = segments(dir)
    for (let depth = 0; depth <= parts.length; depth++) {
      const key = this.key(depth === 0 ? '.' : parts.slice(0, depth).join('/'))
      const existing = this.store.get(key)
      if (existing) {
        if (!existing.isDir) {
          throw new EINVAL('MkdirAll', dir)
        }
        continue
      }
      const name = depth === 0 ? basename(key) || '.' : parts[depth - 1]
      this.store.put(key, Entry.directory(name, mode, this.config.now()))
    }
  }

  private create(name: string, mode: number): Entry {
    if (!isValidPath(name)) {
      throw new EINVAL('Create', name)
    }
    this.mkdirAllLocked(dirname(name), this.config.dirMode)

    const key = this.key(name)
    const existing = this.store.get(key)
    if (!existing) {
      return this.store.put(key, Entry.file(basename(key), mode, this.config.now()))
    }
    if (existing.isDir) {
      throw new EINVAL('Create', name)
    }
    return existing
  }

  // ===========================================================================
  // Read capabilities
  // ===========================================================================

  /**
   * Open a file or directory. File handles are loaded with the content as it
   * is now; directory handles list lazily through {@link MemFS.readDir}.
   *
   * @throws ENOENT if nothing is stored at `name`
   */
  async open(name: string): Promise<BufferedFile> {
    return this.mutex.runExclusive(() => {
      const entry = this.lookup(name)
      return new BufferedFile(this, name, entry.mode, entry.isDir ? null : entry.data)
    })
  }

  /**
   * Paths beneath this filesystem's root matching `pattern`, sorted.
   *
   * @throws GlobSyntaxError if the pattern is malformed
   */
  async glob(pattern: string): Promise<string[]> {
    return this.mutex.runExclusive(() =>
      this.store.prefixGlobKeys(this.root, pattern).map((key) => this.rel(key))
    )
  }

  /**
   * Direct children of `dir`, sorted by name.
   *
   * @throws ENOTDIR if `dir` is a file
   */
  async readDir(dir: string): Promise<DirEntry[]> {
    return this.mutex.runExclusive(() => {
      const entry = this.lookup(dir)
      if (!entry.isDir) {
        throw new ENOTDIR('ReadDir', dir)
      }
      return this.store.prefixKeys(this.key(dir)).flatMap((key) => {
        const child = this.store.get(key)
        return child ? [child] : []
      })
    })
  }

  /**
   * Stored content of `name`. The returned bytes are the stored bytes, not a
   * copy.
   *
   * @throws EINVAL if `name` is a directory
   */
  async readFile(name: string): Promise<Uint8Array> {
    return this.mutex.runExclusive(() => {
      const entry = this.lookup(name)
      if (entry.isDir) {
        throw new EINVAL('ReadFile', name)
      }
      return entry.data
    })
  }

  async stat(name: string): Promise<FileInfo> {
    return this.mutex.runExclusive(() => this.lookup(name))
  }

  /**
   * A view of the sub-tree at `dir` sharing this filesystem's store.
   *
   * @throws EINVAL if `dir` is a file
   */
  async sub(dir: string): Promise<MemFS> {
    return this.mutex.runExclusive(() => {
      if (!isValidPath(dir)) {
        throw new EINVAL('Sub', dir)
      }
      const entry = this.lookup(dir)
      if (!entry.isDir) {
        throw new EINVAL('Sub', dir)
      }
      return MemFS.view(this.config, this.key(dir), this.store)
    })
  }

  // ===========================================================================
  // Write capabilities
  // ===========================================================================

  /**
   * Create `dir` and every missing parent. Existing directories are left
   * untouched.
   *
   * @throws EINVAL if any element of `dir` is an existing file
   */
  async mkdirAll(dir: string, mode: number = this.config.dirMode): Promise<void> {
    return this.mutex.runExclusive(() => this.mkdirAllLocked(dir, mode))
  }

  /**
   * Create `name` (or reuse the existing file) and return an empty writable
   * handle. Nothing is written until the handle is closed.
   *
   * @throws EINVAL if `name` is a directory or lies beneath a file
   */
  async createFile(name: string, mode: number = this.config.fileMode): Promise<BufferedFile> {
    return this.mutex.runExclusive(() => {
      this.create(name, mode)
      return new BufferedFile(this, name, mode, new Uint8Array(0))
    })
  }

  /**
   * Replace the content of `name`. Byte arrays are stored as given, without
   * a copy.
   *
   * @returns Number of bytes written
   */
  async writeFile(name: string, data: Uint8Array | string, mode: number = this.config.fileMode): Promise<number> {
    return this.mutex.runExclusive(() => {
      const entry = this.create(name, mode)
      const bytes = typeof data === 'string' ? encoder.encode(data) : data
      entry.replaceData(bytes, this.config.now())
      return bytes.length
    })
  }

  // ===========================================================================
  // Remove capabilities
  // ===========================================================================

  /**
   * Remove the single entry at `name`. Removing a missing path is a no-op.
   */
  async removeFile(name: string): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (!isValidPath(name)) {
        throw new EINVAL('RemoveFile', name)
      }
      this.store.remove(this.key(name))
    })
  }

  /**
   * Remove `path` and everything beneath it. Removing a missing path is a
   * no-op.
   */
  async removeAll(path: string): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (!isValidPath(path)) {
        throw new EINVAL('RemoveAll', path)
      }
      this.store.removeAll(this.key(path))
    })
  }

  /**
   * Sorted store keys, for inspection in tests and debugging.
   */
  keys(): readonly string[] {
    return this.store.keys()
  }
}

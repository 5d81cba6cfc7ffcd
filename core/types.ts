/**
 * Capability interfaces for layerfs
 *
 * A filesystem is anything with `open`. Every further ability is an optional
 * capability described by its own small interface: listing, reading, stat,
 * glob and sub-tree views on the read side, plus the write and remove
 * capabilities this library adds. Generic code asks a filesystem for a
 * capability once (see the guards in `./fs/capabilities.ts`) and branches on
 * the answer.
 *
 * All paths are relative, slash-separated request paths (see
 * `isValidPath`); `.` names the root.
 *
 * @module types
 */

// =============================================================================
// Metadata
// =============================================================================

/**
 * Metadata describing a file or directory.
 *
 * @example
 * ```typescript
 * const info = await fsys.stat('notes.txt')
 * console.log(`${info.name}: ${info.size} bytes, modified ${info.modTime.toISOString()}`)
 * ```
 */
export interface FileInfo {
  /** Base name of the file */
  readonly name: string
  /** Length in bytes; 0 for directories */
  readonly size: number
  /** File-type and permission bits (see `S_IFDIR`, `S_IFREG`) */
  readonly mode: number
  /** Last modification time */
  readonly modTime: Date
  isDirectory(): boolean
  isFile(): boolean
}

/**
 * An entry read from a directory listing.
 */
export interface DirEntry {
  /** Base name of the entry */
  readonly name: string
  /** File-type bits of the mode (`mode & S_IFMT`) */
  readonly type: number
  isDirectory(): boolean
  isFile(): boolean
  /** Full metadata for the entry */
  info(): Promise<FileInfo>
}

// =============================================================================
// File Handles
// =============================================================================

/**
 * Result of a `read` call. `bytesRead` is 0 once the data is exhausted.
 */
export interface ReadResult {
  bytesRead: number
  buffer: Uint8Array
}

/**
 * An open file.
 */
export interface File {
  /**
   * Read into `buffer`, advancing the handle's cursor.
   *
   * @returns Bytes copied; `bytesRead === 0` signals end of data
   */
  read(buffer: Uint8Array): Promise<ReadResult>

  /** Metadata of the file the handle was opened on */
  stat(): Promise<FileInfo>

  close(): Promise<void>
}

/**
 * A directory handle that can list its entries in pages.
 */
export interface ReadDirFile extends File {
  /**
   * Read the next `n` entries in name order.
   *
   * With `n > 0`, returns at most `n` entries, or `null` once the listing
   * is exhausted. With `n <= 0` (the default), returns every remaining
   * entry, possibly `[]`.
   */
  readDir(n?: number): Promise<DirEntry[] | null>
}

/**
 * A file handle that accepts writes.
 */
export interface WriterFile extends File {
  write(data: Uint8Array | string): Promise<{ bytesWritten: number }>
}

// =============================================================================
// Read Capabilities
// =============================================================================

/**
 * The minimal filesystem: something that can open a path.
 */
export interface FS {
  /**
   * @throws ENOENT if the path does not exist
   * @throws EINVAL if the path is invalid
   */
  open(name: string): Promise<File>
}

/** A filesystem that lists directories directly. */
export interface ReadDirFS extends FS {
  /** Entries of `dir`, sorted by name */
  readDir(dir: string): Promise<DirEntry[]>
}

/** A filesystem that reads whole files directly. */
export interface ReadFileFS extends FS {
  readFile(name: string): Promise<Uint8Array>
}

/** A filesystem that returns metadata without opening. */
export interface StatFS extends FS {
  stat(name: string): Promise<FileInfo>
}

/** A filesystem with its own glob implementation. */
export interface GlobFS extends FS {
  /**
   * Paths matching `pattern`, in lexical order.
   *
   * @throws GlobSyntaxError if the pattern is malformed
   */
  glob(pattern: string): Promise<string[]>
}

/** A filesystem that can produce a view of one of its sub-trees. */
export interface SubFS extends FS {
  sub(dir: string): Promise<FS>
}

// =============================================================================
// Write / Remove Capabilities
// =============================================================================

/**
 * A filesystem that can create directories and files.
 */
export interface WriteFileFS extends FS {
  /**
   * Create `dir` and any missing parents. Succeeds if `dir` already exists
   * as a directory.
   */
  mkdirAll(dir: string, mode?: number): Promise<void>

  /**
   * Create (or reuse) the file `name`, creating parents as needed, and
   * return a handle whose writes are committed on close.
   */
  createFile(name: string, mode?: number): Promise<WriterFile>

  /**
   * Replace the content of `name`, creating it and its parents as needed.
   *
   * @returns Number of bytes written
   */
  writeFile(name: string, data: Uint8Array | string, mode?: number): Promise<number>
}

/**
 * A filesystem that can delete files and trees.
 */
export interface RemoveFileFS extends FS {
  removeFile(name: string): Promise<void>
  /** Remove `path` and everything beneath it */
  removeAll(path: string): Promise<void>
}

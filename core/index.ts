/**
 * layerfs - writable filesystem layer
 *
 * Small capability interfaces (`FS`, `ReadDirFS`, `WriteFileFS`,
 * `RemoveFileFS`, ...), helpers that work on any filesystem through them,
 * and two backends: an in-memory filesystem and one rooted on the host disk.
 *
 * @example
 * ```typescript
 * import { MemFS, DiskFS, copyFS, glob } from 'layerfs'
 *
 * const memory = new MemFS()
 * await memory.writeFile('docs/readme.txt', 'hello')
 * await glob(memory, 'docs/*.txt') // ['docs/readme.txt']
 *
 * await copyFS(new DiskFS('/tmp/out'), memory, '.')
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Types
// =============================================================================

export type {
  FileInfo,
  DirEntry,
  ReadResult,
  File,
  ReadDirFile,
  WriterFile,
  FS,
  ReadDirFS,
  ReadFileFS,
  StatFS,
  GlobFS,
  SubFS,
  WriteFileFS,
  RemoveFileFS,
} from './types.js'

// =============================================================================
// Backends
// =============================================================================

export { MemFS, type MemFSOptions, Entry, Store } from './memfs/index.js'
export {
  DiskFS,
  DiskEntry,
  isValidDiskPath,
  nodeDiskOps,
  type DiskFSOptions,
  type DiskOps,
  type DiskStats,
} from './diskfs/index.js'
export { BufferedFile, type FileOwner } from './buffered-file.js'

// =============================================================================
// Capability Helpers
// =============================================================================

export {
  isReadDirFS,
  isReadFileFS,
  isStatFS,
  isGlobFS,
  isSubFS,
  isWriteFileFS,
  isRemoveFileFS,
  isReadDirFile,
  isWriterFile,
  mkdirAll,
  createFile,
  writeFile,
  removeFile,
  removeAll,
  readDir,
  readFile,
  stat,
  sub,
  glob,
  globWalk,
  walkDir,
  SKIP_DIR,
  type WalkDirFunc,
  type WalkDirResult,
  copyFS,
} from './fs/index.js'

// =============================================================================
// Errors
// =============================================================================

export {
  FSError,
  ENOENT,
  EEXIST,
  EISDIR,
  ENOTDIR,
  EACCES,
  EPERM,
  ENOTEMPTY,
  EINVAL,
  ENOSYS,
  isFSError,
  isEnoent,
  isEexist,
  isEisdir,
  isEnotdir,
  isEacces,
  isEperm,
  isEnotempty,
  isEinval,
  isEnosys,
  isErrorCode,
  hasErrorCode,
  getErrorCode,
  createError,
  fromSystemError,
  ALL_ERROR_CODES,
  type ErrorCode,
  type Errno,
} from './errors.js'

// =============================================================================
// Utilities
// =============================================================================

export { normalize, join, dirname, basename, isValidPath, segments, sep } from './path.js'
export { match, createMatcher, hasMeta, GlobSyntaxError, type Matcher } from './glob/index.js'
export {
  S_IFMT,
  S_IFREG,
  S_IFDIR,
  MODE_PERM,
  MODE_BITS,
  withFileType,
  isDirMode,
  modeToString,
  getFullModeString,
} from './constants.js'
export { createConfig, defaultConfig, type FsConfig, type FsConfigOptions } from './config.js'
export { Mutex } from './mutex.js'
export { testWriteFileFS } from './fstest/index.js'

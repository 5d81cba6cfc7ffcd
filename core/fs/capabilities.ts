/**
 * Capability guards
 *
 * Filesystems advertise optional abilities by implementing extra methods.
 * These guards ask a filesystem (or a handle) for one capability, narrowing
 * it to the matching interface when present.
 *
 * ```typescript
 * if (isWriteFileFS(fsys)) {
 *   await fsys.writeFile('a.txt', 'hi')
 * }
 * ```
 *
 * @module fs/capabilities
 */

import type {
  File,
  FS,
  GlobFS,
  ReadDirFile,
  ReadDirFS,
  ReadFileFS,
  RemoveFileFS,
  StatFS,
  SubFS,
  WriteFileFS,
  WriterFile,
} from '../types.js'

function hasMethod(value: object, name: string): boolean {
  return name in value && typeof Reflect.get(value, name) === 'function'
}

export function isReadDirFS(fsys: FS): fsys is ReadDirFS {
  return hasMethod(fsys, 'readDir')
}

export function isReadFileFS(fsys: FS): fsys is ReadFileFS {
  return hasMethod(fsys, 'readFile')
}

export function isStatFS(fsys: FS): fsys is StatFS {
  return hasMethod(fsys, 'stat')
}

export function isGlobFS(fsys: FS): fsys is GlobFS {
  return hasMethod(fsys, 'glob')
}

export function isSubFS(fsys: FS): fsys is SubFS {
  return hasMethod(fsys, 'sub')
}

/**
 * Whether `fsys` can create directories and files. All three write methods
 * must be present.
 */
export function isWriteFileFS(fsys: FS): fsys is WriteFileFS {
  return hasMethod(fsys, 'mkdirAll') && hasMethod(fsys, 'createFile') && hasMethod(fsys, 'writeFile')
}

/**
 * Whether `fsys` can remove files and trees. Both remove methods must be
 * present.
 */
export function isRemoveFileFS(fsys: FS): fsys is RemoveFileFS {
  return hasMethod(fsys, 'removeFile') && hasMethod(fsys, 'removeAll')
}

export function isReadDirFile(file: File): file is ReadDirFile {
  return hasMethod(file, 'readDir')
}

export function isWriterFile(file: File): file is WriterFile {
  return hasMethod(file, 'write')
}

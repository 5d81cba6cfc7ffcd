/**
 * Capability helpers
 *
 * Functions that work on any {@link FS}, using optional capabilities where
 * the filesystem has them.
 *
 * @module fs
 */

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
} from './capabilities.js'
export { mkdirAll, createFile, writeFile } from './write.js'
export { removeFile, removeAll } from './remove.js'
export { readDir, readFile, stat, sub } from './read.js'
export { glob, globWalk } from './glob.js'
export { walkDir, SKIP_DIR, type WalkDirFunc, type WalkDirResult } from './walk.js'
export { copyFS } from './copy.js'

/**
 * In-memory filesystem
 *
 * @module memfs
 */

export { MemFS, type MemFSOptions } from './memfs.js'
export { Entry } from './entry.js'
export { Store } from './store.js'

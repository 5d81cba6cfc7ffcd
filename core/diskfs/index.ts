/**
 * Disk-backed filesystem
 *
 * @module diskfs
 */

export { DiskFS, isValidDiskPath, type DiskFSOptions } from './diskfs.js'
export { DiskEntry } from './entry.js'
export { nodeDiskOps, type DiskOps, type DiskStats } from './ops.js'

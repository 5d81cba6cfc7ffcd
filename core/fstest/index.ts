/**
 * Helpers for testing filesystem implementations
 *
 * @module fstest
 */

export { testWriteFileFS } from './write-file-fs.js'

/**
 * Filesystem configuration
 *
 * Both backends take these options in their constructors. The resulting
 * configuration is validated, defaulted and frozen.
 *
 * @module core/config
 */

import { MODE_BITS, MODE_PERM } from './constants.js'
import { EINVAL } from './errors.js'

/**
 * Resolved configuration.
 */
export interface FsConfig {
  /** Mode used when `writeFile`/`createFile` are called without one */
  readonly fileMode: number

  /** Mode used when `mkdirAll` is called without one, and for the root */
  readonly dirMode: number

  /** Clock used for modification times */
  readonly now: () => Date
}

/**
 * Configuration options (partial, for user input)
 */
export interface FsConfigOptions {
  fileMode?: number
  dirMode?: number
  now?: () => Date
}

/**
 * Default configuration values
 */
export const defaultConfig: FsConfig = Object.freeze({
  fileMode: MODE_PERM,
  dirMode: MODE_PERM,
  now: () => new Date(),
})

function validateMode(mode: unknown, name: string): number {
  if (typeof mode !== 'number' || !Number.isInteger(mode)) {
    throw new EINVAL('createConfig', name)
  }
  if (mode < 0 || mode > MODE_BITS) {
    throw new EINVAL('createConfig', name)
  }
  return mode
}

function validateClock(now: () => unknown): () => Date {
  if (typeof now !== 'function') {
    throw new EINVAL('createConfig', 'now')
  }
  return () => {
    const value = now()
    if (!(value instanceof Date)) {
      throw new EINVAL('createConfig', 'now')
    }
    return value
  }
}

/**
 * Create a validated, frozen configuration.
 *
 * @throws {EINVAL} If any option is invalid
 *
 * @example
 * ```typescript
 * const config = createConfig({ fileMode: 0o644, dirMode: 0o755 })
 * const fixed = createConfig({ now: () => new Date(0) })
 * ```
 */
export function createConfig(options: FsConfigOptions = {}): FsConfig {
  const config: FsConfig = {
    fileMode:
      options.fileMode !== undefined ? validateMode(options.fileMode, 'fileMode') : defaultConfig.fileMode,
    dirMode:
      options.dirMode !== undefined ? validateMode(options.dirMode, 'dirMode') : defaultConfig.dirMode,
    now: options.now !== undefined ? validateClock(options.now) : defaultConfig.now,
  }

  return Object.freeze(config)
}

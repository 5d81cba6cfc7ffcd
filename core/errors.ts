/**
 * @fileoverview POSIX-compatible filesystem error classes for layerfs
 *
 * Every failure surfaced by a layerfs filesystem is an {@link FSError}
 * subclass carrying the POSIX code, the operation name (`syscall`) and the
 * relative path the caller passed in. Operation names are the capability
 * method names in PascalCase (`Open`, `MkdirAll`, `Create`, `ReadDir`, ...),
 * so generic consumers can match on them across backends.
 *
 * @example
 * ```typescript
 * import { ENOENT, isEnoent } from 'layerfs'
 *
 * throw new ENOENT('Open', 'missing.txt')
 * // Error: ENOENT: no such file or directory, Open 'missing.txt'
 *
 * try {
 *   await fsys.readFile('missing.txt')
 * } catch (err) {
 *   if (isEnoent(err)) {
 *     console.log('File not found:', err.path)
 *   }
 * }
 * ```
 *
 * @module errors
 */

// ============================================================================
// Error Code Definitions
// ============================================================================

/**
 * Maps POSIX error codes to their numeric errno values and messages.
 */
const ERROR_CODES = {
  ENOENT: { errno: -2, message: 'no such file or directory' },
  EEXIST: { errno: -17, message: 'file already exists' },
  EISDIR: { errno: -21, message: 'illegal operation on a directory' },
  ENOTDIR: { errno: -20, message: 'not a directory' },
  EACCES: { errno: -13, message: 'permission denied' },
  EPERM: { errno: -1, message: 'operation not permitted' },
  ENOTEMPTY: { errno: -39, message: 'directory not empty' },
  EINVAL: { errno: -22, message: 'invalid argument' },
  ENOSYS: { errno: -38, message: 'function not implemented' },
} as const

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Union type of all supported POSIX error codes.
 */
export type ErrorCode = keyof typeof ERROR_CODES

/**
 * Numeric errno values corresponding to POSIX error codes.
 */
export type Errno = (typeof ERROR_CODES)[ErrorCode]['errno']

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for all filesystem errors.
 *
 * Messages follow the Node.js fs convention: `CODE: message, syscall 'path'`.
 *
 * @example
 * ```typescript
 * const error = new FSError('ENOENT', -2, 'no such file or directory', 'Open', 'a.txt')
 * error.message  // "ENOENT: no such file or directory, Open 'a.txt'"
 * error.syscall  // "Open"
 * ```
 */
export class FSError extends Error {
  /** POSIX error code string (e.g., 'ENOENT', 'EINVAL') */
  code: string

  /** Numeric errno value (negative, following Node.js convention) */
  errno: number

  /** Operation that raised the error (e.g., 'Open', 'MkdirAll') */
  syscall?: string

  /** Path as given by the caller */
  path?: string

  constructor(code: string, errno: number, message: string, syscall?: string, path?: string) {
    const fullMessage = `${code}: ${message}${syscall ? `, ${syscall}` : ''}${path ? ` '${path}'` : ''}`
    super(fullMessage)
    this.name = 'FSError'
    this.code = code
    this.errno = errno
    this.syscall = syscall
    this.path = path
  }
}

// ============================================================================
// Error Class Factory
// ============================================================================

/**
 * @internal
 */
function createErrorClass<T extends ErrorCode>(code: T) {
  const { errno, message } = ERROR_CODES[code]

  return class extends FSError {
    constructor(syscall?: string, path?: string) {
      super(code, errno, message, syscall, path)
      this.name = code
    }
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
 * ENOENT - No such file or directory.
 *
 * Raised when a lookup misses: `open`, `stat`, `readFile` or `readDir` on a
 * path that has no entry.
 *
 * @example
 * ```typescript
 * throw new ENOENT('Open', 'missing/file.txt')
 * // ENOENT: no such file or directory, Open 'missing/file.txt'
 * ```
 */
export class ENOENT extends createErrorClass('ENOENT') {}

/**
 * EEXIST - File exists.
 *
 * Only surfaced by the disk backend, passed through from the host.
 */
export class EEXIST extends createErrorClass('EEXIST') {}

/**
 * EISDIR - Is a directory.
 *
 * Raised by `read` or `write` on a handle opened against a directory.
 *
 * @example
 * ```typescript
 * throw new EISDIR('Read', 'some/directory')
 * ```
 */
export class EISDIR extends createErrorClass('EISDIR') {}

/**
 * ENOTDIR - Not a directory.
 *
 * Raised by `readDir` on a file.
 *
 * @example
 * ```typescript
 * throw new ENOTDIR('ReadDir', 'dir/file.txt')
 * // ENOTDIR: not a directory, ReadDir 'dir/file.txt'
 * ```
 */
export class ENOTDIR extends createErrorClass('ENOTDIR') {}

/**
 * EACCES - Permission denied. Passed through from the host disk.
 */
export class EACCES extends createErrorClass('EACCES') {}

/**
 * EPERM - Operation not permitted. Passed through from the host disk.
 */
export class EPERM extends createErrorClass('EPERM') {}

/**
 * ENOTEMPTY - Directory not empty.
 *
 * Raised by the disk backend's `removeFile` on a non-empty directory.
 */
export class ENOTEMPTY extends createErrorClass('ENOTEMPTY') {}

/**
 * EINVAL - Invalid argument.
 *
 * Raised for paths failing validation and for directory/file conflicts:
 * creating a file where a directory exists, creating a directory through a
 * file, reading a directory as a file, or `sub` on a file.
 *
 * @example
 * ```typescript
 * throw new EINVAL('Create', '../escape.txt')
 * // EINVAL: invalid argument, Create '../escape.txt'
 * ```
 */
export class EINVAL extends createErrorClass('EINVAL') {}

/**
 * ENOSYS - Function not implemented.
 *
 * Raised by the capability helpers when a filesystem lacks the write or
 * remove capability the caller asked for.
 *
 * @example
 * ```typescript
 * throw new ENOSYS('WriteFile', 'a.txt')
 * // ENOSYS: function not implemented, WriteFile 'a.txt'
 * ```
 */
export class ENOSYS extends createErrorClass('ENOSYS') {}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if an error is an FSError.
 */
export function isFSError(error: unknown): error is FSError {
  return error instanceof FSError
}

/**
 * Type guard to check if an error is ENOENT (no such file or directory).
 */
export function isEnoent(error: unknown): error is ENOENT {
  return error instanceof ENOENT
}

/**
 * Type guard to check if an error is EEXIST (file exists).
 */
export function isEexist(error: unknown): error is EEXIST {
  return error instanceof EEXIST
}

/**
 * Type guard to check if an error is EISDIR (is a directory).
 */
export function isEisdir(error: unknown): error is EISDIR {
  return error instanceof EISDIR
}

/**
 * Type guard to check if an error is ENOTDIR (not a directory).
 */
export function isEnotdir(error: unknown): error is ENOTDIR {
  return error instanceof ENOTDIR
}

/**
 * Type guard to check if an error is EACCES (permission denied).
 */
export function isEacces(error: unknown): error is EACCES {
  return error instanceof EACCES
}

/**
 * Type guard to check if an error is EPERM (operation not permitted).
 */
export function isEperm(error: unknown): error is EPERM {
  return error instanceof EPERM
}

/**
 * Type guard to check if an error is ENOTEMPTY (directory not empty).
 */
export function isEnotempty(error: unknown): error is ENOTEMPTY {
  return error instanceof ENOTEMPTY
}

/**
 * Type guard to check if an error is EINVAL (invalid argument).
 */
export function isEinval(error: unknown): error is EINVAL {
  return error instanceof EINVAL
}

/**
 * Type guard to check if an error is ENOSYS (not implemented).
 */
export function isEnosys(error: unknown): error is ENOSYS {
  return error instanceof ENOSYS
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Whether `code` is one of the codes this module has a class for.
 */
export function isErrorCode(code: unknown): code is ErrorCode {
  return typeof code === 'string' && Object.prototype.hasOwnProperty.call(ERROR_CODES, code)
}

/**
 * Checks if an error has a specific error code.
 *
 * @example
 * ```typescript
 * if (hasErrorCode(err, 'ENOENT')) {
 *   // Handle file not found
 * }
 * ```
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isFSError(error) && error.code === code
}

/**
 * Gets the error code from an error if it's an FSError.
 *
 * @returns The error code or undefined if not an FSError
 */
export function getErrorCode(error: unknown): ErrorCode | undefined {
  if (isFSError(error) && isErrorCode(error.code)) {
    return error.code
  }
  return undefined
}

/**
 * Creates a new error from just a code, operation and path.
 *
 * @example
 * ```typescript
 * throw createError('ENOENT', 'Open', 'missing.txt')
 * ```
 */
export function createError(code: ErrorCode, syscall?: string, path?: string): FSError {
  const ErrorClass = {
    ENOENT,
    EEXIST,
    EISDIR,
    ENOTDIR,
    EACCES,
    EPERM,
    ENOTEMPTY,
    EINVAL,
    ENOSYS,
  }[code]

  return new ErrorClass(syscall, path)
}

/**
 * Re-raises a host (Node.js) system error as the matching FSError class,
 * labelled with the layerfs operation and the caller's relative path.
 *
 * Errors whose code has no class here are returned unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   await readFile(join(root, name))
 * } catch (err) {
 *   throw fromSystemError(err, 'ReadFile', name)
 * }
 * ```
 */
export function fromSystemError(error: unknown, syscall: string, path: string): unknown {
  if (isFSError(error)) {
    return error
  }
  if (error instanceof Error && 'code' in error && isErrorCode(error.code)) {
    return createError(error.code, syscall, path)
  }
  return error
}

/**
 * All supported error codes as a constant array.
 */
export const ALL_ERROR_CODES: readonly ErrorCode[] = [
  'ENOENT',
  'EEXIST',
  'EISDIR',
  'ENOTDIR',
  'EACCES',
  'EPERM',
  'ENOTEMPTY',
  'EINVAL',
  'ENOSYS',
]

// ============================================================================
// Default Export
// ============================================================================

export default FSError

/**
 * POSIX mode constants
 *
 * File-type and permission bits carried in the `mode` field of every entry.
 * Values follow POSIX.1-2017 `<sys/stat.h>`, so modes read from the host
 * disk and modes stored in memory share one encoding.
 *
 * @see https://pubs.opengroup.org/onlinepubs/9699919799/basedefs/sys_stat.h.html
 *
 * @module
 */

// =============================================================================
// File Type Bits (mode & S_IFMT)
// =============================================================================

/**
 * File type mask for extracting file type from mode.
 * Value: 0o170000
 *
 * @example
 * ```typescript
 * const isRegular = (mode & S_IFMT) === S_IFREG
 * ```
 */
export const S_IFMT = 0o170000

/**
 * Regular file type.
 * Value: 0o100000
 */
export const S_IFREG = 0o100000

/**
 * Directory type.
 * Value: 0o040000
 */
export const S_IFDIR = 0o040000

// =============================================================================
// Permission Bits
// =============================================================================

/**
 * Every permission bit (rwxrwxrwx).
 * Value: 0o777
 *
 * Default mode for created files and directories. Modes are stored but
 * never enforced.
 */
export const MODE_PERM = 0o777

/**
 * Permission and special bits: everything except the file type.
 * Value: 0o7777
 */
export const MODE_BITS = 0o7777

// =============================================================================
// Helpers
// =============================================================================

/**
 * Returns `mode` with its file-type bits replaced by `type`.
 *
 * @example
 * ```typescript
 * withFileType(0o644, S_IFREG)            // 0o100644
 * withFileType(S_IFREG | 0o755, S_IFDIR)  // 0o040755
 * ```
 */
export function withFileType(mode: number, type: typeof S_IFREG | typeof S_IFDIR): number {
  return type | (mode & MODE_BITS)
}

/**
 * Whether the file-type bits of `mode` mark a directory.
 */
export function isDirMode(mode: number): boolean {
  return (mode & S_IFMT) === S_IFDIR
}

/**
 * Convert the permission bits of a mode to an ls-style string.
 *
 * @example
 * ```typescript
 * modeToString(0o755) // "rwxr-xr-x"
 * ```
 */
export function modeToString(mode: number): string {
  const chars = 'rwxrwxrwx'
  let out = ''
  for (let i = 0; i < 9; i++) {
    out += mode & (1 << (8 - i)) ? chars[i] : '-'
  }
  return out
}

/**
 * Full ls-style mode string including the file type character.
 *
 * @example
 * ```typescript
 * getFullModeString(S_IFDIR | 0o755) // "drwxr-xr-x"
 * getFullModeString(S_IFREG | 0o644) // "-rw-r--r--"
 * ```
 */
export function getFullModeString(mode: number): string {
  return (isDirMode(mode) ? 'd' : '-') + modeToString(mode)
}

/**
 * Path utilities for layerfs - POSIX-style path manipulation
 *
 * Request paths handed to a filesystem are *relative* and must pass
 * {@link isValidPath}. Backends turn them into absolute store keys with
 * {@link join} and {@link normalize}; keys always start with `/` and use `/`
 * as the only separator.
 *
 * @module path
 * @example
 * ```typescript
 * import { normalize, join, dirname, basename, isValidPath } from './path.js'
 *
 * normalize('/foo//bar/../baz')  // '/foo/baz'
 * join('/', 'a/b')               // '/a/b'
 * dirname('a/b/c.txt')           // 'a/b'
 * basename('/a/b/c.txt')         // 'c.txt'
 * isValidPath('a/../b')          // false
 * ```
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * POSIX path separator character.
 */
export const sep = '/' as const

/** ASCII code for '/' */
const SLASH = 47

/** ASCII code for '.' */
const DOT = 46

// =============================================================================
// INTERNAL UTILITIES
// =============================================================================

/**
 * Single-pass resolution of `.`, `..` and repeated separators.
 * The result carries neither a leading nor a trailing slash.
 *
 * @internal
 */
function collapseSegments(path: string, allowAboveRoot: boolean): string {
  let out = ''
  let lastSegmentLength = 0
  let lastSlash = -1
  let dots = 0
  let code = 0

  for (let i = 0; i <= path.length; ++i) {
    if (i < path.length) {
      code = path.charCodeAt(i)
    } else if (code === SLASH) {
      break
    } else {
      code = SLASH
    }

    if (code !== SLASH) {
      dots = code === DOT && dots !== -1 ? dots + 1 : -1
      continue
    }

    if (lastSlash === i - 1 || dots === 1) {
      // empty segment or '.'
    } else if (dots === 2) {
      const endsWithDotDot =
        out.length >= 2 &&
        lastSegmentLength === 2 &&
        out.charCodeAt(out.length - 1) === DOT &&
        out.charCodeAt(out.length - 2) === DOT
      if (!endsWithDotDot && out.length !== 0) {
        const cut = out.lastIndexOf(sep)
        out = cut === -1 ? '' : out.slice(0, cut)
        lastSegmentLength = cut === -1 ? 0 : out.length - 1 - out.lastIndexOf(sep)
        lastSlash = i
        dots = 0
        continue
      }
      if (allowAboveRoot) {
        out += out.length > 0 ? '/..' : '..'
        lastSegmentLength = 2
      }
    } else {
      const segment = path.slice(lastSlash + 1, i)
      out = out.length > 0 ? `${out}/${segment}` : segment
      lastSegmentLength = i - lastSlash - 1
    }
    lastSlash = i
    dots = 0
  }
  return out
}

// =============================================================================
// CORE PATH OPERATIONS
// =============================================================================

/**
 * Normalize a path by resolving `.` and `..` segments and collapsing slashes.
 *
 * Trailing slashes are dropped (except for the root); absolute paths cannot
 * climb above `/`.
 *
 * @example
 * ```typescript
 * normalize('/foo/bar//baz')     // '/foo/bar/baz'
 * normalize('/foo/bar/../baz')   // '/foo/baz'
 * normalize('/foo/../..')        // '/'
 * normalize('foo/../../bar')     // '../bar'
 * normalize('')                  // '.'
 * ```
 */
export function normalize(path: string): string {
  if (path === '' || path === '.') return '.'
  if (path === '/') return '/'

  const absolute = path.charCodeAt(0) === SLASH
  const collapsed = collapseSegments(path, !absolute)

  if (collapsed.length === 0) {
    return absolute ? '/' : '.'
  }
  return absolute ? '/' + collapsed : collapsed
}

/**
 * Join path segments and normalize the result. Empty segments are ignored.
 *
 * @example
 * ```typescript
 * join('/', 'a/b')        // '/a/b'
 * join('/a', '.')         // '/a'
 * join('foo', '..', 'bar') // 'bar'
 * join()                  // '.'
 * ```
 */
export function join(...paths: string[]): string {
  const joined = paths.filter((p) => p.length > 0).join(sep)
  return joined === '' ? '.' : normalize(joined)
}

/**
 * Get the directory portion of a path.
 *
 * @example
 * ```typescript
 * dirname('/foo/bar/baz.txt')    // '/foo/bar'
 * dirname('/foo')                // '/'
 * dirname('foo/bar')             // 'foo'
 * dirname('file.txt')            // '.'
 * ```
 */
export function dirname(path: string): string {
  if (path.length === 0) return '.'

  let end = path.length
  while (end > 1 && path.charCodeAt(end - 1) === SLASH) {
    end--
  }

  const lastSlash = path.lastIndexOf(sep, end - 1)
  if (lastSlash === -1) return '.'
  if (lastSlash === 0) return '/'

  let dirEnd = lastSlash
  while (dirEnd > 1 && path.charCodeAt(dirEnd - 1) === SLASH) {
    dirEnd--
  }
  return path.slice(0, dirEnd)
}

/**
 * Get the last element of a path. Trailing slashes are ignored; the root
 * and the empty path yield `''`.
 *
 * @example
 * ```typescript
 * basename('/foo/bar/baz.txt')   // 'baz.txt'
 * basename('/foo/bar/')          // 'bar'
 * basename('/')                  // ''
 * ```
 */
export function basename(path: string): string {
  let end = path.length
  while (end > 0 && path.charCodeAt(end - 1) === SLASH) {
    end--
  }
  if (end === 0) return ''
  return path.slice(path.lastIndexOf(sep, end - 1) + 1, end)
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Reports whether `name` is a valid request path.
 *
 * Valid paths are unrooted, slash-separated sequences of elements. No
 * element may be empty, `.` or `..`; the path may not begin or end with a
 * slash. The single exception is `.`, which names the root of the
 * filesystem. Paths are case-sensitive.
 *
 * @example
 * ```typescript
 * isValidPath('.')             // true
 * isValidPath('a/b/c.txt')     // true
 * isValidPath('')              // false
 * isValidPath('/a')            // false
 * isValidPath('a/')            // false
 * isValidPath('a//b')          // false
 * isValidPath('a/./b')         // false
 * isValidPath('../a')          // false
 * ```
 */
export function isValidPath(name: string): boolean {
  if (name === '.') return true
  if (name === '') return false
  return name.split(sep).every((element) => element !== '' && element !== '.' && element !== '..')
}

/**
 * Splits a valid request path into its elements; `.` has none.
 *
 * @example
 * ```typescript
 * segments('a/b/c')  // ['a', 'b', 'c']
 * segments('.')      // []
 * ```
 */
export function segments(name: string): string[] {
  return name === '.' ? [] : name.split(sep)
}

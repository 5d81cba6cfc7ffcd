/**
 * Pattern matching for glob patterns
 *
 * Shell-style patterns matched against whole slash-separated paths:
 *
 * - `*` matches any run of characters except `/`
 * - `?` matches any single character except `/`
 * - `[abc]`, `[a-z]` match one character from the class; `[^abc]` and
 *   `[!abc]` negate it. Classes never match `/`.
 * - `\c` matches `c` literally, inside or outside a class
 *
 * Patterns are compiled once and validated as a whole, so a malformed
 * pattern raises {@link GlobSyntaxError} whether or not any path is ever
 * tested against it.
 *
 * @example
 * ```typescript
 * match('*.txt', 'notes.txt')       // true
 * match('a/*\/f.txt', 'a/b/f.txt')  // true
 * match('*', 'a/b')                 // false
 * match('[[', 'x')                  // throws GlobSyntaxError
 * ```
 *
 * @module glob/match
 */

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown when a glob pattern is malformed: an unterminated or empty
 * character class, a range with a missing end, or a trailing backslash.
 */
export class GlobSyntaxError extends Error {
  readonly pattern: string

  constructor(pattern: string) {
    super('syntax error in pattern')
    this.name = 'GlobSyntaxError'
    this.pattern = pattern
  }
}

// =============================================================================
// Compiled Form
// =============================================================================

type Range = readonly [lo: number, hi: number]

type Token =
  | { readonly kind: 'star' }
  | { readonly kind: 'any' }
  | { readonly kind: 'char'; readonly code: number }
  | { readonly kind: 'class'; readonly negated: boolean; readonly ranges: readonly Range[] }

/**
 * A compiled pattern: returns whether a path matches.
 */
export type Matcher = (path: string) => boolean

const SLASH = 0x2f
const BACKSLASH = 0x5c
const STAR = 0x2a
const QUESTION = 0x3f
const OPEN_BRACKET = 0x5b
const CLOSE_BRACKET = 0x5d
const CARET = 0x5e
const BANG = 0x21
const DASH = 0x2d

function codePoints(value: string): number[] {
  return Array.from(value, (ch) => ch.codePointAt(0) ?? 0)
}

/**
 * Reads one (possibly escaped) class character at `pos`.
 * Returns the character and the position after it.
 */
function classChar(chars: number[], pos: number, pattern: string): [number, number] {
  const c = chars[pos]
  if (c === undefined || c === DASH || c === CLOSE_BRACKET) {
    throw new GlobSyntaxError(pattern)
  }
  if (c === BACKSLASH) {
    const escaped = chars[pos + 1]
    if (escaped === undefined) {
      throw new GlobSyntaxError(pattern)
    }
    return [escaped, pos + 2]
  }
  return [c, pos + 1]
}

function compileClass(chars: number[], start: number, pattern: string): [Token, number] {
  let pos = start
  let negated = false
  if (chars[pos] === CARET || chars[pos] === BANG) {
    negated = true
    pos++
  }

  const ranges: Range[] = []
  for (;;) {
    if (chars[pos] === CLOSE_BRACKET && ranges.length > 0) {
      return [{ kind: 'class', negated, ranges }, pos + 1]
    }
    const [lo, afterLo] = classChar(chars, pos, pattern)
    pos = afterLo
    let hi = lo
    if (chars[pos] === DASH) {
      const [end, afterHi] = classChar(chars, pos + 1, pattern)
      hi = end
      pos = afterHi
    }
    ranges.push([lo, hi])
  }
}

function compileTokens(pattern: string): Token[] {
  const chars = codePoints(pattern)
  const tokens: Token[] = []
  let pos = 0

  while (pos < chars.length) {
    const c = chars[pos]
    switch (c) {
      case STAR:
        // consecutive stars behave as one
        if (tokens[tokens.length - 1]?.kind !== 'star') {
          tokens.push({ kind: 'star' })
        }
        pos++
        break
      case QUESTION:
        tokens.push({ kind: 'any' })
        pos++
        break
      case OPEN_BRACKET: {
        const [token, next] = compileClass(chars, pos + 1, pattern)
        tokens.push(token)
        pos = next
        break
      }
      case BACKSLASH: {
        const escaped = chars[pos + 1]
        if (escaped === undefined) {
          throw new GlobSyntaxError(pattern)
        }
        tokens.push({ kind: 'char', code: escaped })
        pos += 2
        break
      }
      default:
        tokens.push({ kind: 'char', code: c })
        pos++
    }
  }
  return tokens
}

// =============================================================================
// Matching
// =============================================================================

function matchesOne(token: Token, c: number): boolean {
  switch (token.kind) {
    case 'any':
      return c !== SLASH
    case 'char':
      return c === token.code
    case 'class': {
      if (c === SLASH) return false
      const inClass = token.ranges.some(([lo, hi]) => lo <= c && c <= hi)
      return inClass !== token.negated
    }
    case 'star':
      return false
  }
}

/**
 * Iterative wildcard matching with backtracking to the most recent star.
 * A star may grow only over non-separator characters.
 */
function matchTokens(tokens: readonly Token[], chars: readonly number[]): boolean {
  let t = 0
  let c = 0
  let starToken = -1
  let starChar = 0

  while (c < chars.length) {
    if (t < tokens.length) {
      const token = tokens[t]
      if (token.kind === 'star') {
        starToken = t
        starChar = c
        t++
        continue
      }
      if (matchesOne(token, chars[c])) {
        t++
        c++
        continue
      }
    }
    if (starToken !== -1 && chars[starChar] !== SLASH) {
      starChar++
      c = starChar
      t = starToken + 1
      continue
    }
    return false
  }

  while (t < tokens.length && tokens[t].kind === 'star') {
    t++
  }
  return t === tokens.length
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Compile a pattern into a reusable matcher.
 *
 * @throws {GlobSyntaxError} If the pattern is malformed
 *
 * @example
 * ```typescript
 * const isText = createMatcher('*.txt')
 * ['a.txt', 'b.md'].filter(isText) // ['a.txt']
 * ```
 */
export function createMatcher(pattern: string): Matcher {
  const tokens = compileTokens(pattern)
  return (path: string) => matchTokens(tokens, codePoints(path))
}

/**
 * Match a whole path against a glob pattern.
 *
 * @throws {GlobSyntaxError} If the pattern is malformed
 */
export function match(pattern: string, path: string): boolean {
  return createMatcher(pattern)(path)
}

/**
 * Reports whether a pattern contains any of the special characters
 * recognised by {@link match}.
 */
export function hasMeta(pattern: string): boolean {
  return /[*?[\\]/.test(pattern)
}

import { describe, it, expect } from 'vitest'
import { GlobSyntaxError, createMatcher, hasMeta, match } from './match.js'

describe('match', () => {
  describe('wildcards', () => {
    it('should match * within one path element', () => {
      expect(match('*.txt', 'notes.txt')).toBe(true)
      expect(match('*1.txt', 'file01.txt')).toBe(true)
      expect(match('*.txt', 'notes.md')).toBe(false)
    })

    it('should never let * cross a separator', () => {
      expect(match('*', 'a/b')).toBe(false)
      expect(match('**', 'a/b')).toBe(false)
      expect(match('*/*1.txt', 'dir0/file01.txt')).toBe(true)
      expect(match('*/*1.txt', 'dir0/sub/file01.txt')).toBe(false)
    })

    it('should backtrack over several stars', () => {
      expect(match('a*b*c', 'axxbyyc')).toBe(true)
      expect(match('a*b*c', 'axxbyy')).toBe(false)
      expect(match('a/*/f.txt', 'a/b/f.txt')).toBe(true)
    })

    it('should match the empty run with *', () => {
      expect(match('a*', 'a')).toBe(true)
      expect(match('*', '')).toBe(true)
    })

    it('should match exactly one non-separator character with ?', () => {
      expect(match('a?c', 'abc')).toBe(true)
      expect(match('a?c', 'ac')).toBe(false)
      expect(match('a?c', 'a/c')).toBe(false)
    })

    it('should treat a multi-byte character as one character', () => {
      expect(match('?', 'é')).toBe(true)
      expect(match('x?y', 'x😀y')).toBe(true)
    })
  })

  describe('character classes', () => {
    it('should match sets and ranges', () => {
      expect(match('[abc]x', 'bx')).toBe(true)
      expect(match('[a-c]x', 'cx')).toBe(true)
      expect(match('[a-c]x', 'dx')).toBe(false)
    })

    it('should negate with ^ and !', () => {
      expect(match('[^a]', 'a')).toBe(false)
      expect(match('[^a]', 'b')).toBe(true)
      expect(match('[!a-c]x', 'dx')).toBe(true)
      expect(match('[!a-c]x', 'bx')).toBe(false)
    })

    it('should never match a separator, even when negated', () => {
      expect(match('a[/]b', 'a/b')).toBe(false)
      expect(match('a[^x]b', 'a/b')).toBe(false)
    })

    it('should accept escaped characters inside a class', () => {
      expect(match('[\\]]', ']')).toBe(true)
      expect(match('[\\-]', '-')).toBe(true)
    })
  })

  describe('escapes and literals', () => {
    it('should match an escaped metacharacter literally', () => {
      expect(match('\\*', '*')).toBe(true)
      expect(match('\\*', 'a')).toBe(false)
      expect(match('\\[x', '[x')).toBe(true)
    })

    it('should treat a lone ] as a literal', () => {
      expect(match(']', ']')).toBe(true)
    })

    it('should require the whole path to match', () => {
      expect(match('dir0', 'dir0/file01.txt')).toBe(false)
      expect(match('file', 'file01')).toBe(false)
    })
  })

  describe('syntax errors', () => {
    it.each(['[[', '[', '[a', '[]', '[]a]', '[a-]', '[-a]', '[^]', 'abc\\', '[a\\'])(
      'should reject %s',
      (pattern) => {
        expect(() => match(pattern, 'x')).toThrow(GlobSyntaxError)
      }
    )

    it('should report the pattern and the fixed message', () => {
      try {
        createMatcher('[[')
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(GlobSyntaxError)
        if (error instanceof GlobSyntaxError) {
          expect(error.message).toBe('syntax error in pattern')
          expect(error.pattern).toBe('[[')
        }
      }
    })

    it('should fail at compile time, before any path is tested', () => {
      expect(() => createMatcher('a/[')).toThrow(GlobSyntaxError)
    })
  })
})

describe('createMatcher', () => {
  it('should return a reusable predicate', () => {
    const isText = createMatcher('*.txt')
    expect(['a.txt', 'b.md', 'c.txt'].filter(isText)).toEqual(['a.txt', 'c.txt'])
  })
})

describe('hasMeta', () => {
  it('should detect wildcard characters', () => {
    expect(hasMeta('a/*.txt')).toBe(true)
    expect(hasMeta('a?')).toBe(true)
    expect(hasMeta('[ab]')).toBe(true)
    expect(hasMeta('a\\b')).toBe(true)
  })

  it('should return false for literal paths', () => {
    expect(hasMeta('a/b.txt')).toBe(false)
    expect(hasMeta(']')).toBe(false)
  })
})

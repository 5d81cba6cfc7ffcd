/**
 * Tests for POSIX mode constants and helpers
 */

import { describe, expect, it } from 'vitest'
import {
  MODE_BITS,
  MODE_PERM,
  S_IFDIR,
  S_IFMT,
  S_IFREG,
  getFullModeString,
  isDirMode,
  modeToString,
  withFileType,
} from './constants.js'

describe('File Type Bits', () => {
  it('should have POSIX values', () => {
    expect(S_IFMT).toBe(0o170000)
    expect(S_IFREG).toBe(0o100000)
    expect(S_IFDIR).toBe(0o040000)
  })

  it('should have non-overlapping permission masks', () => {
    expect(MODE_PERM).toBe(0o777)
    expect(MODE_BITS).toBe(0o7777)
    expect(S_IFMT & MODE_BITS).toBe(0)
  })
})

describe('withFileType', () => {
  it('should add the file type to permission bits', () => {
    expect(withFileType(0o644, S_IFREG)).toBe(0o100644)
    expect(withFileType(0o755, S_IFDIR)).toBe(0o040755)
  })

  it('should replace an existing file type', () => {
    expect(withFileType(S_IFREG | 0o755, S_IFDIR)).toBe(0o040755)
    expect(withFileType(S_IFDIR | 0o700, S_IFREG)).toBe(0o100700)
  })
})

describe('isDirMode', () => {
  it('should read the directory bit', () => {
    expect(isDirMode(S_IFDIR | 0o755)).toBe(true)
    expect(isDirMode(S_IFREG | 0o755)).toBe(false)
    expect(isDirMode(0o777)).toBe(false)
  })
})

describe('modeToString', () => {
  it('should render rwx triplets', () => {
    expect(modeToString(0o755)).toBe('rwxr-xr-x')
    expect(modeToString(0o644)).toBe('rw-r--r--')
    expect(modeToString(0)).toBe('---------')
  })

  it('should prefix the file type', () => {
    expect(getFullModeString(S_IFDIR | 0o755)).toBe('drwxr-xr-x')
    expect(getFullModeString(S_IFREG | 0o644)).toBe('-rw-r--r--')
  })
})

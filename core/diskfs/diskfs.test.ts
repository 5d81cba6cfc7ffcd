/**
 * Tests for DiskFS
 *
 * Each test gets a fresh temporary directory. Fault injection replaces
 * single calls of the node provider.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile as hostReadFile, rm, writeFile as hostWriteFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { S_IFMT, S_IFREG } from '../constants.js'
import { EACCES, EINVAL, EISDIR, ENOENT, ENOTDIR, ENOTEMPTY } from '../errors.js'
import { copyFS } from '../fs/copy.js'
import { MemFS } from '../memfs/memfs.js'
import type { DirEntry } from '../types.js'
import { DiskFS, isValidDiskPath } from './diskfs.js'
import { nodeDiskOps, type DiskOps } from './ops.js'

const decoder = new TextDecoder()
const names = (entries: DirEntry[] | null) => (entries ?? []).map((e) => e.name)

function hostError(code: string): Error {
  return Object.assign(new Error(`${code}: injected`), { code })
}

function withOps(overrides: Partial<DiskOps>): DiskOps {
  return { ...nodeDiskOps, ...overrides }
}

describe('DiskFS', () => {
  let root: string
  let fsys: DiskFS

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'layerfs-'))
    fsys = new DiskFS(root)
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  // ===========================================================================
  // Read and write
  // ===========================================================================

  describe('writeFile / readFile', () => {
    it('should round-trip content through the host disk', async () => {
      expect(await fsys.writeFile('notes/today.txt', 'hello')).toBe(5)

      expect(decoder.decode(await fsys.readFile('notes/today.txt'))).toBe('hello')
      expect(await hostReadFile(join(root, 'notes', 'today.txt'), 'utf8')).toBe('hello')
    })

    it('should round-trip empty content', async () => {
      expect(await fsys.writeFile('empty.txt', new Uint8Array(0))).toBe(0)
      expect((await fsys.readFile('empty.txt')).length).toBe(0)
    })

    it('should translate a missing file', async () => {
      await expect(fsys.readFile('missing.txt')).rejects.toThrow(ENOENT)
      await expect(fsys.readFile('missing.txt')).rejects.toThrow(
        "ENOENT: no such file or directory, ReadFile 'missing.txt'"
      )
    })

    it('should reject a directory as file name', async () => {
      await fsys.mkdirAll('dir')
      await expect(fsys.writeFile('dir', 'x')).rejects.toThrow(EISDIR)
      await expect(fsys.writeFile('dir', 'x')).rejects.toThrow("EISDIR: illegal operation on a directory, Create 'dir'")
    })
  })

  describe('mkdirAll', () => {
    it('should create nested directories idempotently', async () => {
      await fsys.mkdirAll('a/b/c')
      await fsys.mkdirAll('a/b/c')
      expect((await fsys.stat('a/b/c')).isDirectory()).toBe(true)
    })

    it('should reject an invalid path', async () => {
      await expect(fsys.mkdirAll('../invalid')).rejects.toThrow("EINVAL: invalid argument, MkdirAll '../invalid'")
    })
  })

  describe('readDir', () => {
    it('should list entries sorted by name with metadata', async () => {
      await fsys.writeFile('d/b.txt', 'abc')
      await fsys.mkdirAll('d/a')

      const entries = await fsys.readDir('d')
      expect(names(entries)).toEqual(['a', 'b.txt'])
      expect(entries.map((e) => e.size)).toEqual([0, 3])
      expect(entries[0].isDirectory()).toBe(true)
    })

    it('should reject a file', async () => {
      await fsys.writeFile('f.txt', 'x')
      await expect(fsys.readDir('f.txt')).rejects.toThrow(ENOTDIR)
      await expect(fsys.readDir('f.txt')).rejects.toThrow("ENOTDIR: not a directory, ReadDir 'f.txt'")
    })
  })

  describe('stat', () => {
    it('should describe a file', async () => {
      await fsys.writeFile('f.txt', 'four')
      const info = await fsys.stat('f.txt')

      expect(info.name).toBe('f.txt')
      expect(info.size).toBe(4)
      expect(info.isFile()).toBe(true)
      expect(info.mode & S_IFMT).toBe(S_IFREG)
    })

    it('should translate a missing path', async () => {
      await expect(fsys.stat('missing')).rejects.toThrow("ENOENT: no such file or directory, Open 'missing'")
    })
  })

  describe('open', () => {
    it('should read a file through the handle', async () => {
      await hostWriteFile(join(root, 'f.txt'), 'abcdef')
      const file = await fsys.open('f.txt')
      const buffer = new Uint8Array(4)

      expect((await file.read(buffer)).bytesRead).toBe(4)
      expect((await file.read(buffer)).bytesRead).toBe(2)
      expect((await file.read(buffer)).bytesRead).toBe(0)
      await file.close()
    })

    it('should page through a directory', async () => {
      await fsys.writeFile('d/1.txt', '1')
      await fsys.writeFile('d/2.txt', '2')
      const dir = await fsys.open('d')

      expect(names(await dir.readDir(1))).toEqual(['1.txt'])
      expect(names(await dir.readDir(1))).toEqual(['2.txt'])
      expect(await dir.readDir(1)).toBeNull()
    })

    it('should translate a missing path', async () => {
      await expect(fsys.open('missing')).rejects.toThrow("ENOENT: no such file or directory, Open 'missing'")
    })
  })

  describe('createFile', () => {
    it('should create the file at once and write it out on close', async () => {
      const file = await fsys.createFile('out/file.txt')
      expect(await hostReadFile(join(root, 'out', 'file.txt'), 'utf8')).toBe('')

      await file.write('hello')
      await file.write(',world')
      await file.close()

      expect(await hostReadFile(join(root, 'out', 'file.txt'), 'utf8')).toBe('hello,world')
    })

    it('should truncate an existing file', async () => {
      await fsys.writeFile('f.txt', 'old')
      await fsys.createFile('f.txt')
      expect((await fsys.readFile('f.txt')).length).toBe(0)
    })
  })

  describe('glob', () => {
    it('should match by walking directories', async () => {
      await fsys.writeFile('dir0/file01.txt', '1')
      await fsys.writeFile('dir0/file02.txt', '2')

      expect(await fsys.glob('*/*1.txt')).toEqual(['dir0/file01.txt'])
      expect(await fsys.glob('dir0/*.txt')).toEqual(['dir0/file01.txt', 'dir0/file02.txt'])
      expect(await fsys.glob('no-match')).toEqual([])
    })
  })

  // ===========================================================================
  // Sub-filesystems
  // ===========================================================================

  describe('sub', () => {
    it('should root a new filesystem at the directory', async () => {
      await fsys.mkdirAll('dir0')
      const dir0 = await fsys.sub('dir0')
      await dir0.writeFile('test.txt', 'test')

      expect(dir0.dir).toBe(join(root, 'dir0'))
      expect(decoder.decode(await fsys.readFile('dir0/test.txt'))).toBe('test')
    })

    it('should reject a file, a missing path and an invalid path', async () => {
      await fsys.writeFile('f.txt', 'x')
      await expect(fsys.sub('f.txt')).rejects.toThrow("EINVAL: invalid argument, Sub 'f.txt'")
      await expect(fsys.sub('missing')).rejects.toThrow(ENOENT)
      await expect(fsys.sub('../invalid')).rejects.toThrow("EINVAL: invalid argument, Sub '../invalid'")
    })
  })

  // ===========================================================================
  // Remove
  // ===========================================================================

  describe('removeFile', () => {
    it('should remove a file and an empty directory', async () => {
      await fsys.writeFile('f.txt', 'x')
      await fsys.mkdirAll('empty')

      await fsys.removeFile('f.txt')
      await fsys.removeFile('empty')
      expect(await fsys.readDir('.')).toEqual([])
    })

    it('should refuse a non-empty directory', async () => {
      await fsys.writeFile('d/f.txt', 'x')
      await expect(fsys.removeFile('d')).rejects.toThrow(ENOTEMPTY)
      await expect(fsys.removeFile('d')).rejects.toThrow("ENOTEMPTY: directory not empty, RemoveFile 'd'")
    })

    it('should translate a missing path', async () => {
      await expect(fsys.removeFile('missing')).rejects.toThrow(
        "ENOENT: no such file or directory, RemoveFile 'missing'"
      )
    })
  })

  describe('removeAll', () => {
    it('should remove a tree and ignore a missing path', async () => {
      await fsys.writeFile('d/e/f.txt', 'x')
      await fsys.removeAll('d')
      await fsys.removeAll('d')
      expect(await fsys.readDir('.')).toEqual([])
    })

    it('should reject an invalid path', async () => {
      await expect(fsys.removeAll('a/../b')).rejects.toThrow("EINVAL: invalid argument, RemoveAll 'a/../b'")
    })
  })

  // ===========================================================================
  // Paths and faults
  // ===========================================================================

  describe('host path rules', () => {
    it('should reject separators and drive markers on Windows hosts', () => {
      expect(isValidDiskPath('a\\b', 'win32')).toBe(false)
      expect(isValidDiskPath('c:x', 'win32')).toBe(false)
      expect(isValidDiskPath('a/b', 'win32')).toBe(true)
    })

    it('should allow them elsewhere', () => {
      expect(isValidDiskPath('a\\b', 'linux')).toBe(true)
      expect(isValidDiskPath('c:x', 'linux')).toBe(true)
      expect(isValidDiskPath('../x', 'linux')).toBe(false)
    })

    it('should apply the configured platform', async () => {
      const windows = new DiskFS(root, { platform: 'win32' })
      await expect(windows.writeFile('c:x', 'x')).rejects.toThrow("EINVAL: invalid argument, Create 'c:x'")
    })
  })

  describe('fault injection', () => {
    it('should label a failed parent mkdir with the file name', async () => {
      const faulty = new DiskFS(root, {
        ops: withOps({
          mkdirAll: async () => {
            throw hostError('EACCES')
          },
        }),
      })

      await expect(faulty.createFile('x/y.txt')).rejects.toThrow(EACCES)
      await expect(faulty.createFile('x/y.txt')).rejects.toThrow("EACCES: permission denied, MkdirAll 'x/y.txt'")
    })

    it('should pass on host errors without a known code', async () => {
      const failure = hostError('ENOSPC')
      const faulty = new DiskFS(root, {
        ops: withOps({
          writeFile: async () => {
            throw failure
          },
        }),
      })

      await expect(faulty.writeFile('f.txt', 'x')).rejects.toBe(failure)
    })

    it('should propagate a failed commit from close', async () => {
      let calls = 0
      const faulty = new DiskFS(root, {
        ops: withOps({
          writeFile: async (path, data, mode) => {
            if (calls++ > 0) throw hostError('EACCES')
            await nodeDiskOps.writeFile(path, data, mode)
          },
        }),
      })

      const file = await faulty.createFile('f.txt')
      await file.write('x')
      await expect(file.close()).rejects.toThrow("EACCES: permission denied, Create 'f.txt'")
    })

    it('should hand the provider to sub-filesystems', async () => {
      const seen: string[] = []
      const tracing = new DiskFS(root, {
        ops: withOps({
          readFile: async (path) => {
            seen.push(path)
            return nodeDiskOps.readFile(path)
          },
        }),
      })
      await tracing.writeFile('d/f.txt', 'x')

      const d = await tracing.sub('d')
      await d.readFile('f.txt')
      expect(seen).toEqual([join(root, 'd', 'f.txt')])
    })
  })

  // ===========================================================================
  // Interplay with the in-memory backend
  // ===========================================================================

  describe('copyFS', () => {
    it('should copy from memory to disk and back', async () => {
      const memory = new MemFS()
      await memory.writeFile('site/index.html', '<h1>hi</h1>')
      await memory.writeFile('site/css/main.css', 'body {}')

      await copyFS(fsys, memory, '.')
      expect(await hostReadFile(join(root, 'site', 'css', 'main.css'), 'utf8')).toBe('body {}')

      const back = new MemFS()
      await copyFS(back, fsys, 'site')
      expect(back.keys()).toEqual(['/', '/site', '/site/css', '/site/css/main.css', '/site/index.html'])
      expect(decoder.decode(await back.readFile('site/index.html'))).toBe('<h1>hi</h1>')
    })
  })
})

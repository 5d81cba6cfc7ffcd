import { describe, it, expect, beforeEach } from 'vitest'
import { ENOENT } from '../errors.js'
import { MemFS } from '../memfs/memfs.js'
import type { FS } from '../types.js'
import { SKIP_DIR, walkDir } from './walk.js'

describe('walkDir', () => {
  let fsys: MemFS

  beforeEach(async () => {
    fsys = new MemFS()
    await fsys.writeFile('a/b/c.txt', 'c')
    await fsys.writeFile('dir0/file01.txt', '1')
    await fsys.writeFile('dir0/file02.txt', '2')
    await fsys.writeFile('z.txt', 'z')
  })

  async function visited(fs: FS, root: string, skip?: string): Promise<string[]> {
    const paths: string[] = []
    await walkDir(fs, root, (path) => {
      paths.push(path)
      if (path === skip) return SKIP_DIR
    })
    return paths
  }

  it('should visit every path in lexical pre-order', async () => {
    expect(await visited(fsys, '.')).toEqual([
      '.',
      'a',
      'a/b',
      'a/b/c.txt',
      'dir0',
      'dir0/file01.txt',
      'dir0/file02.txt',
      'z.txt',
    ])
  })

  it('should start from a sub-directory', async () => {
    expect(await visited(fsys, 'dir0')).toEqual(['dir0', 'dir0/file01.txt', 'dir0/file02.txt'])
  })

  it('should visit a single file root', async () => {
    expect(await visited(fsys, 'z.txt')).toEqual(['z.txt'])
  })

  it('should skip the contents of a directory returning SKIP_DIR', async () => {
    expect(await visited(fsys, '.', 'a')).toEqual(['.', 'a', 'dir0', 'dir0/file01.txt', 'dir0/file02.txt', 'z.txt'])
  })

  it('should skip the remaining siblings of a file returning SKIP_DIR', async () => {
    expect(await visited(fsys, '.', 'dir0/file01.txt')).toEqual([
      '.',
      'a',
      'a/b',
      'a/b/c.txt',
      'dir0',
      'dir0/file01.txt',
      'z.txt',
    ])
  })

  it('should pass directory entries with metadata', async () => {
    const kinds: string[] = []
    await walkDir(fsys, 'dir0', async (path, entry) => {
      const info = await entry.info()
      kinds.push(`${path}:${entry.isDirectory() ? 'dir' : 'file'}:${info.size}`)
    })
    expect(kinds).toEqual(['dir0:dir:0', 'dir0/file01.txt:file:1', 'dir0/file02.txt:file:1'])
  })

  it('should abort on the first visitor error', async () => {
    const paths: string[] = []
    const walking = walkDir(fsys, '.', (path) => {
      paths.push(path)
      if (path === 'a/b') throw new Error('stop here')
    })

    await expect(walking).rejects.toThrow('stop here')
    expect(paths).toEqual(['.', 'a', 'a/b'])
  })

  it('should reject a missing root', async () => {
    await expect(walkDir(fsys, 'missing', () => {})).rejects.toThrow(ENOENT)
  })

  it('should walk a filesystem that only opens', async () => {
    const bare: FS = { open: (name) => fsys.open(name) }
    expect(await visited(bare, 'dir0')).toEqual(['dir0', 'dir0/file01.txt', 'dir0/file02.txt'])
  })
})

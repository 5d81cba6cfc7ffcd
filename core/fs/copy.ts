/**
 * copyFS - copy a tree from one filesystem to another
 *
 * Walks `root` on `src` and recreates it on `dest`: directories through
 * `mkdirAll`, files by streaming the source handle into a handle from
 * `createFile`. Permission bits are carried over; file-type bits are not.
 * The first error aborts the copy, leaving whatever was copied so far.
 *
 * @example
 * ```typescript
 * const memory = new MemFS()
 * await copyFS(memory, new DiskFS('/srv/site'), '.')
 * ```
 *
 * @module fs/copy
 */

import { MODE_PERM } from '../constants.js'
import type { File, FS, WriterFile } from '../types.js'
import { walkDir } from './walk.js'
import { createFile, mkdirAll } from './write.js'

const COPY_BUFFER_SIZE = 32 * 1024

async function copyContents(source: File, target: WriterFile): Promise<void> {
  for (;;) {
    const { bytesRead, buffer } = await source.read(new Uint8Array(COPY_BUFFER_SIZE))
    if (bytesRead === 0) return
    await target.write(buffer.subarray(0, bytesRead))
  }
}

/**
 * @throws {ENOSYS} If `dest` cannot write
 */
export async function copyFS(dest: FS, src: FS, root: string): Promise<void> {
  await walkDir(src, root, async (path, entry) => {
    const perm = (await entry.info()).mode & MODE_PERM
    if (entry.isDirectory()) {
      await mkdirAll(dest, path, perm)
      return
    }

    const source = await src.open(path)
    try {
      const target = await createFile(dest, path, perm)
      try {
        await copyContents(source, target)
      } finally {
        await target.close()
      }
    } finally {
      await source.close()
    }
  })
}

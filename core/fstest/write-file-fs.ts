/**
 * Conformance check for writable filesystems
 *
 * Replays the sequence of creates a generic consumer performs and verifies
 * each successful one by writing, closing, re-opening and reading back.
 * Any `WriteFileFS` + `RemoveFileFS` implementation should pass.
 *
 * @example
 * ```typescript
 * it('behaves as a writable filesystem', async () => {
 *   await testWriteFileFS(new MemFS(), 'tmp')
 * })
 * ```
 *
 * @module fstest/write-file-fs
 */

import { MODE_PERM } from '../constants.js'
import { createFile } from '../fs/write.js'
import { readFile } from '../fs/read.js'
import { removeAll, removeFile } from '../fs/remove.js'
import type { FS, WriterFile } from '../types.js'

interface CreateCase {
  name: string
  wantErr: boolean
}

const CASES: readonly CreateCase[] = [
  // plain create
  { name: 'file.txt', wantErr: false },
  // parent created on the way
  { name: 'dir/file.txt', wantErr: false },
  // exists as a directory
  { name: 'dir', wantErr: true },
  // parent exists as a file
  { name: 'dir/file.txt/invalid', wantErr: true },
  // invalid path
  { name: 'file.txt/.', wantErr: true },
  // update
  { name: 'dir/file.txt', wantErr: false },
]

const CHUNKS = ['hello', ',world']
const decoder = new TextDecoder()

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

async function checkFileWrite(fsys: FS, file: WriterFile, name: string): Promise<void> {
  const want = CHUNKS.join('')
  let written = 0
  for (const chunk of CHUNKS) {
    try {
      written += (await file.write(chunk)).bytesWritten
    } catch (error) {
      await file.close()
      throw new Error(`${name}: WriterFile.write: ${message(error)}`, { cause: error })
    }
  }

  try {
    await file.close()
  } catch (error) {
    throw new Error(`${name}: WriterFile.close: ${message(error)}`, { cause: error })
  }

  if (written !== want.length) {
    throw new Error(`${name}: write size got ${written}; want ${want.length}`)
  }

  let got: string
  try {
    got = decoder.decode(await readFile(fsys, name))
  } catch (error) {
    throw new Error(`${name}: read back: ${message(error)}`, { cause: error })
  }
  if (got !== want) {
    throw new Error(`${name}: read back ${JSON.stringify(got)}; want ${JSON.stringify(want)}`)
  }
}

/**
 * Exercise `fsys` below the directory `dir` (`.` for its root), then remove
 * what was created.
 *
 * @throws {Error} Describing the first deviation
 */
export async function testWriteFileFS(fsys: FS, dir: string): Promise<void> {
  const under = (name: string) => (dir === '.' ? name : `${dir}/${name}`)

  for (const { name: relative, wantErr } of CASES) {
    const name = under(relative)

    let file: WriterFile
    try {
      file = await createFile(fsys, name, MODE_PERM)
    } catch (error) {
      if (wantErr) continue
      throw new Error(`${name}: createFile: ${message(error)}`, { cause: error })
    }
    if (wantErr) {
      await file.close()
      throw new Error(`${name}: createFile returned no error`)
    }
    await checkFileWrite(fsys, file, name)
  }

  try {
    await removeFile(fsys, under('file.txt'))
  } catch (error) {
    throw new Error(`file.txt: removeFile: ${message(error)}`, { cause: error })
  }
  try {
    await removeAll(fsys, under('dir'))
  } catch (error) {
    throw new Error(`dir: removeAll: ${message(error)}`, { cause: error })
  }
}

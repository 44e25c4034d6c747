/**
 * Atomic file replacement: write to a sibling temp file, then rename over the target.
 * Readers only ever see the previous file or the complete new one.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { randomBytes } from 'node:crypto'

export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })
  const tempPath = join(dir, `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`)

  try {
    await writeFile(tempPath, data, { flag: 'wx' })
    await rename(tempPath, path)
  } catch (err) {
    await rm(tempPath, { force: true })
    throw err
  }
}

/** Serialize as pretty JSON with a trailing newline and write atomically. */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await writeFileAtomic(path, `${JSON.stringify(value, null, 2)}\n`)
}

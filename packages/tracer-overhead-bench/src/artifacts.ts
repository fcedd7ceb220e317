import { createReadStream } from 'fs'
import { readdir, rm, stat } from 'fs/promises'
import { join } from 'path'

const BYTES_PER_MB = 1024 * 1024
const NEWLINE = 0x0a

export function bytesToMb(bytes: number): number {
  return bytes / BYTES_PER_MB
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

/** Total size in bytes of every regular file below `dir`, or undefined if it does not exist. */
export async function directorySize(dir: string): Promise<number | undefined> {
  if (!(await exists(dir))) {
    return undefined
  }

  let total = 0
  const entries = await readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      total += (await directorySize(path)) ?? 0
    } else if (entry.isFile()) {
      total += (await stat(path)).size
    }
  }
  return total
}

export async function fileSize(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size
  } catch {
    return undefined
  }
}

/**
 * Counts lines without loading the file; a trailing line with no newline
 * still counts. Trace files can run to millions of lines.
 */
export function countLines(path: string): Promise<number> {
  return new Promise((resolve, reject) => {
    let lines = 0
    let lastByte: number | undefined

    createReadStream(path)
      .on('data', (chunk) => {
        if (typeof chunk === 'string') {
          return
        }
        for (const byte of chunk) {
          if (byte === NEWLINE) {
            lines++
          }
        }
        lastByte = chunk[chunk.length - 1]
      })
      .on('error', reject)
      .on('end', () => {
        resolve(lastByte !== undefined && lastByte !== NEWLINE ? lines + 1 : lines)
      })
  })
}

export async function removeArtifact(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true })
}

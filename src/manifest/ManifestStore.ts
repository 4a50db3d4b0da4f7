import fs from 'fs'
import type { FileHandle } from 'fs/promises'
import readline from 'readline'
import { ManifestReadError } from '../errors'
import { Manifest, ManifestEntry, ManifestSink } from './types'
import { parseLine } from './format'

/**
 * Append every entry to the sink, in iteration order.
 */
export async function writeManifest(
  sink: ManifestSink,
  entries: Iterable<ManifestEntry> | AsyncIterable<ManifestEntry>
): Promise<number> {
  let count = 0
  for await (const entry of entries) {
    await sink.write(entry)
    count++
  }
  return count
}

/**
 * Build a manifest from record lines. The last record for a path wins.
 */
export function parseManifest(content: string, source: string = '<memory>'): Manifest {
  const manifest = new Map<string, string | undefined>()
  const lines = content.split('\n')
  // A trailing newline leaves one empty fragment that is not a record
  if (lines[lines.length - 1] === '') lines.pop()

  lines.forEach((line, i) => {
    const entry = parseLine(line, i + 1, source)
    manifest.set(entry.relativePath, entry.digest)
  })

  return manifest
}

/**
 * Stream a manifest file line by line.
 *
 * Rejects with ManifestReadError if the file cannot be read and with
 * ManifestParseError on the first malformed line.
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  let handle: FileHandle | undefined
  try {
    handle = await fs.promises.open(manifestPath, 'r')
    const stats = await handle.stat()
    if (!stats.isFile()) {
      throw new Error('not a regular file')
    }
  } catch (error) {
    await handle?.close()
    throw new ManifestReadError(manifestPath, error)
  }

  const manifest = new Map<string, string | undefined>()
  const input = handle.createReadStream({ encoding: 'utf8' })
  const lines = readline.createInterface({ input, crlfDelay: Infinity })

  let lineNumber = 0
  try {
    for await (const line of lines) {
      lineNumber++
      const entry = parseLine(line, lineNumber, manifestPath)
      manifest.set(entry.relativePath, entry.digest)
    }
  } catch (error) {
    if (isFsError(error)) {
      throw new ManifestReadError(manifestPath, error)
    }
    throw error
  } finally {
    lines.close()
    input.destroy()
  }

  return manifest
}

function isFsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
}

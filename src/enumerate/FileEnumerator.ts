import { promises as fs } from 'fs'
import path from 'path'
import { DirectoryError } from '../errors'

/**
 * Lazily yield the absolute path of every regular file below rootDir,
 * hidden files included. Order follows the directory listing and is not
 * meaningful.
 *
 * A symlink to a file is yielded and a symlink to a directory is skipped.
 * A dangling symlink is yielded too and fails at checksum time.
 *
 * Throws DirectoryError when rootDir, or any directory below it, cannot be
 * listed.
 */
export async function* enumerateFiles(rootDir: string): AsyncGenerator<string> {
  const root = path.resolve(rootDir)

  let stats
  try {
    stats = await fs.stat(root)
  } catch (error) {
    throw new DirectoryError(root, error)
  }
  if (!stats.isDirectory()) {
    throw new DirectoryError(root, new Error('not a directory'))
  }

  yield* walk(root)
}

async function* walk(dir: string): AsyncGenerator<string> {
  let entries
  try {
    entries = await fs.readdir(dir, { withFileTypes: true })
  } catch (error) {
    throw new DirectoryError(dir, error)
  }

  for (const entry of entries) {
    const abs = path.join(dir, entry.name)

    if (entry.isDirectory()) {
      yield* walk(abs)
    } else if (entry.isFile()) {
      yield abs
    } else if (entry.isSymbolicLink() && (await isFileLink(abs))) {
      yield abs
    }
    // sockets, FIFOs and devices are not content
  }
}

async function isFileLink(linkPath: string): Promise<boolean> {
  try {
    const target = await fs.stat(linkPath)
    return target.isFile()
  } catch {
    // dangling
    return true
  }
}

/**
 * Collect the whole listing up front.
 */
export async function collectFiles(rootDir: string): Promise<string[]> {
  const files: string[] = []
  for await (const file of enumerateFiles(rootDir)) {
    files.push(file)
  }
  return files
}

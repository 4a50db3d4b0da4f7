import { ManifestFormatError, ManifestParseError } from '../errors'
import { ManifestEntry } from './types'

/**
 * Digest field written for a file that could not be checksummed. Digests are
 * lowercase hex, so an uppercase token can never collide with one.
 */
export const FAILURE_SENTINEL = 'FAILED'

const FIELD_SEPARATOR = ' '

/**
 * Why a relative path cannot be written as a manifest record, or null if it can.
 */
export function unrepresentableReason(relativePath: string): string | null {
  if (relativePath.length === 0) return 'path is empty'
  if (/[\r\n]/.test(relativePath)) return 'path contains a line break'
  return null
}

/**
 * Render one manifest record, including its trailing newline.
 */
export function formatEntry(entry: ManifestEntry): string {
  const reason = unrepresentableReason(entry.relativePath)
  if (reason) {
    throw new ManifestFormatError(entry.relativePath, reason)
  }

  return `${entry.relativePath}${FIELD_SEPARATOR}${entry.digest ?? FAILURE_SENTINEL}\n`
}

/**
 * Parse one record (without its newline). The digest field never contains a
 * space, so the record splits at its last space; paths may contain spaces.
 */
export function parseLine(line: string, lineNumber: number, source: string): ManifestEntry {
  const record = line.endsWith('\r') ? line.slice(0, -1) : line

  const separator = record.lastIndexOf(FIELD_SEPARATOR)
  if (separator === -1) {
    throw new ManifestParseError(source, lineNumber, 'expected "<path> <digest>"')
  }

  const relativePath = record.slice(0, separator)
  const digest = record.slice(separator + 1)

  if (relativePath.length === 0) {
    throw new ManifestParseError(source, lineNumber, 'empty path')
  }
  if (digest.length === 0) {
    throw new ManifestParseError(source, lineNumber, 'empty digest')
  }

  return digest === FAILURE_SENTINEL ? { relativePath } : { relativePath, digest }
}

import { promises as fs } from 'fs'
import { ComparisonResult, hasDifferences, sortedPaths } from './ManifestComparator'

export const CSV_COLUMNS = ['missing', 'extra', 'hash_mismatch'] as const

/**
 * Human-readable comparison, the output of `treesum compare`.
 */
export function formatComparisonReport(result: ComparisonResult): string {
  const sections: Array<[string, ReadonlySet<string>]> = [
    ['Files only in source', result.missing],
    ['Files only in destination', result.extra],
    ['Files with different checksums', result.mismatched],
  ]
  if (result.unverified.size > 0) {
    sections.push(['Files without a checksum', result.unverified])
  }

  const lines: string[] = []
  for (const [title, paths] of sections) {
    lines.push(`${title}: ${paths.size}`)
    lines.push(...sortedPaths(paths))
  }

  if (!hasDifferences(result)) {
    lines.push('No differences found.')
  }

  return lines.join('\n')
}

const escapeCsvField = (field: string): string =>
  /[",\r\n]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field

/**
 * Three columns, one path per cell; shorter columns are padded with empty
 * cells down to the longest one.
 */
export function toCsv(result: ComparisonResult): string {
  const columns = [result.missing, result.extra, result.mismatched].map(sortedPaths)
  const height = Math.max(...columns.map((column) => column.length))

  const rows: string[] = [CSV_COLUMNS.join(',')]
  for (let i = 0; i < height; i++) {
    rows.push(columns.map((column) => escapeCsvField(column[i] ?? '')).join(','))
  }

  return rows.join('\n') + '\n'
}

export async function writeComparisonCsv(outputPath: string, result: ComparisonResult): Promise<void> {
  await fs.writeFile(outputPath, toCsv(result), 'utf8')
}

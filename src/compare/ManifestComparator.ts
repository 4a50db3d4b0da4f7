import { Manifest } from '../manifest'

export interface ComparisonResult {
  /** In source, not in destination */
  missing: ReadonlySet<string>
  /** In destination, not in source */
  extra: ReadonlySet<string>
  /** In both, digests differ */
  mismatched: ReadonlySet<string>
  /** In both, no digest on at least one side; overlaps mismatched */
  unverified: ReadonlySet<string>
}

/**
 * Set difference of two manifests. A failed checksum compares as the failure
 * itself, so comparing a manifest with itself is always empty.
 */
export function compareManifests(source: Manifest, destination: Manifest): ComparisonResult {
  const missing = new Set<string>()
  const extra = new Set<string>()
  const mismatched = new Set<string>()
  const unverified = new Set<string>()

  for (const [relativePath, digest] of source) {
    if (!destination.has(relativePath)) {
      missing.add(relativePath)
      continue
    }

    const other = destination.get(relativePath)
    if (digest !== other) mismatched.add(relativePath)
    if (digest === undefined || other === undefined) unverified.add(relativePath)
  }

  for (const relativePath of destination.keys()) {
    if (!source.has(relativePath)) extra.add(relativePath)
  }

  return { missing, extra, mismatched, unverified }
}

export const hasDifferences = (result: ComparisonResult): boolean =>
  result.missing.size > 0 || result.extra.size > 0 || result.mismatched.size > 0

export const sortedPaths = (paths: ReadonlySet<string>): string[] =>
  Array.from(paths).sort()

export type { ComparisonResult } from './ManifestComparator'
export { compareManifests, hasDifferences, sortedPaths } from './ManifestComparator'
export { CSV_COLUMNS, formatComparisonReport, toCsv, writeComparisonCsv } from './report'

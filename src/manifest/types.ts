export interface ManifestEntry {
  /** Path relative to the scanned root, `/`-separated */
  relativePath: string
  /** Lowercase hex digest, absent when the file could not be checksummed */
  digest?: string
}

/**
 * Loaded manifest: relative path to digest, `undefined` for a failed checksum.
 */
export type Manifest = ReadonlyMap<string, string | undefined>

export interface ManifestSink {
  write(entry: ManifestEntry): Promise<void>
  close(): Promise<void>
}

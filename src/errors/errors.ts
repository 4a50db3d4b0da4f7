export class TreesumError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'TreesumError'
  }
}

/**
 * A single file could not be opened or read while computing its checksum.
 * The generator recovers from this one per file.
 */
export class ChecksumError extends TreesumError {
  constructor(public readonly filePath: string, cause?: unknown) {
    super(`Cannot checksum ${filePath}: ${describeError(cause)}`, cause)
    this.name = 'ChecksumError'
  }
}

/**
 * The root directory, or a directory below it, could not be listed.
 * Fatal to a generation run.
 */
export class DirectoryError extends TreesumError {
  constructor(public readonly directory: string, cause?: unknown) {
    super(`Cannot read directory ${directory}: ${describeError(cause)}`, cause)
    this.name = 'DirectoryError'
  }
}

export class ManifestParseError extends TreesumError {
  constructor(
    public readonly source: string,
    public readonly lineNumber: number,
    reason: string
  ) {
    super(`Malformed manifest line ${lineNumber} in ${source}: ${reason}`)
    this.name = 'ManifestParseError'
  }
}

export class ManifestFormatError extends TreesumError {
  constructor(public readonly relativePath: string, reason: string) {
    super(`Cannot write manifest entry ${JSON.stringify(relativePath)}: ${reason}`)
    this.name = 'ManifestFormatError'
  }
}

export class ManifestReadError extends TreesumError {
  constructor(public readonly manifestPath: string, cause?: unknown) {
    super(`Cannot read manifest ${manifestPath}: ${describeError(cause)}`, cause)
    this.name = 'ManifestReadError'
  }
}

export class UsageError extends TreesumError {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

export function describeError(error: unknown): string {
  if (error === undefined) return 'unknown error'
  return error instanceof Error ? error.message : String(error)
}

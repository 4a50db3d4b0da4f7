import crypto from 'crypto'
import fs from 'fs'
import { ChecksumError } from '../errors'

/** Bytes read per chunk */
export const CHUNK_SIZE = 4096

export const DEFAULT_ALGORITHM = 'md5'

export const isSupportedAlgorithm = (algorithm: string): boolean =>
  crypto.getHashes().includes(algorithm.toLowerCase())

/**
 * Streams a file through a hash. Stateless apart from the algorithm name,
 * so one engine can serve any number of concurrent digests.
 */
export class ChecksumEngine {
  readonly algorithm: string

  constructor(algorithm: string = DEFAULT_ALGORITHM) {
    if (!isSupportedAlgorithm(algorithm)) {
      throw new RangeError(`Unsupported checksum algorithm: ${algorithm}`)
    }
    this.algorithm = algorithm.toLowerCase()
  }

  /**
   * Compute the lowercase hex digest of a file's content.
   * Rejects with ChecksumError if the file cannot be opened or read.
   */
  async digest(filePath: string): Promise<string> {
    const hash = crypto.createHash(this.algorithm)

    return new Promise<string>((resolve, reject) => {
      const stream = fs.createReadStream(filePath, { highWaterMark: CHUNK_SIZE })

      stream.on('data', (chunk) => hash.update(chunk))
      stream.on('error', (error) => reject(new ChecksumError(filePath, error)))
      stream.on('end', () => resolve(hash.digest('hex')))
    })
  }
}

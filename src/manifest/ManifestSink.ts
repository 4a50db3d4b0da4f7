import fs from 'fs'
import { ManifestEntry, ManifestSink } from './types'
import { formatEntry } from './format'

/**
 * Runs write operations one at a time, in call order. Concurrent callers
 * never interleave their lines.
 */
abstract class SerializedSink implements ManifestSink {
  private tail: Promise<void> = Promise.resolve()
  private closed = false

  async write(entry: ManifestEntry): Promise<void> {
    if (this.closed) {
      throw new Error('Manifest sink is closed')
    }
    // Format eagerly so a bad path fails this call without poisoning the queue
    const line = formatEntry(entry)
    return this.enqueue(() => this.writeLine(line))
  }

  close(): Promise<void> {
    if (this.closed) return this.tail
    this.closed = true
    return this.enqueue(() => this.end())
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const run = this.tail.then(operation)
    // Later writes wait for this one whether or not it failed
    this.tail = run.catch(() => undefined)
    return run
  }

  protected abstract writeLine(line: string): Promise<void>
  protected abstract end(): Promise<void>
}

export class FileManifestSink extends SerializedSink {
  private readonly stream: fs.WriteStream
  private streamError: Error | null = null

  constructor(readonly filePath: string) {
    super()
    this.stream = fs.createWriteStream(filePath, { encoding: 'utf8' })
    this.stream.on('error', (error) => {
      this.streamError = error
    })
  }

  protected async writeLine(line: string): Promise<void> {
    if (this.streamError) throw this.streamError

    // Resolves once the line is handed to the file, so the queue never outruns it
    await new Promise<void>((resolve, reject) => {
      this.stream.write(line, (error) => (error ? reject(error) : resolve()))
    })
  }

  protected async end(): Promise<void> {
    if (this.streamError) throw this.streamError

    await new Promise<void>((resolve, reject) => {
      this.stream.end((error?: Error | null) => (error ? reject(error) : resolve()))
    })
  }
}

export class MemoryManifestSink extends SerializedSink {
  readonly lines: string[] = []

  /** Manifest text as it would appear on disk */
  toString(): string {
    return this.lines.join('')
  }

  protected async writeLine(line: string): Promise<void> {
    this.lines.push(line)
  }

  protected async end(): Promise<void> {}
}

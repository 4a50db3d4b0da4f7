import { ManifestEntry } from '../manifest/types'

export interface ProgressReporter {
  start(total: number): void
  advance(entry: ManifestEntry): void
  finish(): void
}

export const silentProgress: ProgressReporter = {
  start: () => {},
  advance: () => {},
  finish: () => {},
}

interface ProgressStream {
  isTTY?: boolean
  write(chunk: string): boolean
}

/**
 * Redraws a single `Computing checksums: n/total` line. Writes nothing when
 * the stream is not a terminal, so piped stderr stays clean.
 */
export class TerminalProgressReporter implements ProgressReporter {
  private total = 0
  private done = 0
  private failed = 0

  constructor(
    private readonly stream: ProgressStream = process.stderr,
    private readonly label: string = 'Computing checksums'
  ) {}

  start(total: number): void {
    this.total = total
    this.done = 0
    this.failed = 0
    this.render()
  }

  advance(entry: ManifestEntry): void {
    this.done++
    if (entry.digest === undefined) this.failed++
    this.render()
  }

  finish(): void {
    if (this.stream.isTTY) {
      this.stream.write('\n')
    }
  }

  private render(): void {
    if (!this.stream.isTTY) return

    const failed = this.failed > 0 ? ` (${this.failed} failed)` : ''
    this.stream.write(`\r${this.label}: ${this.done}/${this.total} files${failed}`)
  }
}

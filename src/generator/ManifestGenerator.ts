import { promises as fs } from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { ChecksumEngine } from '../checksum'
import { collectFiles } from '../enumerate/FileEnumerator'
import { ChecksumError, describeError, toError } from '../errors'
import { Logger, silentLogger } from '../logging/Logger'
import { ProgressReporter, silentProgress } from '../logging/ProgressReporter'
import { FileManifestSink, ManifestEntry, ManifestSink, unrepresentableReason } from '../manifest'
import { DEFAULT_CONCURRENCY, mapCompleted } from './WorkerPool'

export interface Digester {
  digest(filePath: string): Promise<string>
}

export interface ManifestGeneratorOptions {
  engine?: Digester
  logger?: Logger
  progress?: ProgressReporter
  /** Files checksummed at the same time */
  concurrency?: number
  /** Stops admitting new files; files already started are still written */
  signal?: AbortSignal
}

export interface GenerateResult {
  /** Lines written, failed checksums included */
  fileCount: number
  /** Failed checksums plus paths that could not be written */
  errorCount: number
  /** True when the signal stopped the run before every file was processed */
  aborted: boolean
}

interface ChecksumOutcome extends ManifestEntry {
  error?: Error
}

interface ListedRun {
  root: string
  runId: string
  files: string[]
}

export const toManifestPath = (relativePath: string): string =>
  relativePath.split(path.sep).join('/')

export class ManifestGenerator {
  private readonly engine: Digester
  private readonly logger: Logger
  private readonly progress: ProgressReporter
  private readonly concurrency: number
  private readonly signal?: AbortSignal

  constructor(options: ManifestGeneratorOptions = {}) {
    this.engine = options.engine ?? new ChecksumEngine()
    this.logger = options.logger ?? silentLogger
    this.progress = options.progress ?? silentProgress
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.signal = options.signal
  }

  /**
   * Checksum every file under rootDir and write one line per file to the
   * sink, in completion order.
   *
   * The whole tree is listed before any checksum starts; a DirectoryError
   * from the listing rejects the run with nothing written. A file that
   * cannot be read is written with the failure sentinel and counted.
   * The sink is left open. Absolute paths in `exclude` are left out of the
   * manifest.
   */
  async generate(
    rootDir: string,
    sink: ManifestSink,
    exclude: ReadonlySet<string> = new Set()
  ): Promise<GenerateResult> {
    const run = await this.list(rootDir, exclude)
    return this.write(run, sink)
  }

  /**
   * generate() into a manifest file, which is never listed in itself.
   * The file is opened only once the tree has been listed, so a listing
   * failure leaves an existing file untouched. A run that fails after that
   * removes the file; an aborted run keeps the complete lines written so far.
   */
  async generateToFile(rootDir: string, outputFile: string): Promise<GenerateResult> {
    const run = await this.list(rootDir, new Set([path.resolve(outputFile)]))
    const sink = new FileManifestSink(outputFile)

    let result: GenerateResult
    try {
      result = await this.write(run, sink)
    } catch (error) {
      await sink.close().catch((closeError: unknown) => {
        this.logger.debug('sink_close_failed', { outputFile, error: describeError(closeError) })
      })
      await fs.rm(outputFile, { force: true })
      throw error
    }

    await sink.close()
    return result
  }

  private async list(rootDir: string, exclude: ReadonlySet<string>): Promise<ListedRun> {
    const root = path.resolve(rootDir)
    const runId = uuidv4()

    this.logger.debug('generate_start', { runId, rootDir: root, concurrency: this.concurrency })

    const files = (await collectFiles(root)).filter((file) => !exclude.has(file))

    this.logger.debug('files_enumerated', { runId, fileCount: files.length })
    return { root, runId, files }
  }

  private async write({ root, runId, files }: ListedRun, sink: ManifestSink): Promise<GenerateResult> {
    let processed = 0
    let fileCount = 0
    let errorCount = 0

    this.progress.start(files.length)
    try {
      const outcomes = mapCompleted(
        files,
        (file) => this.checksumFile(root, file, runId),
        { concurrency: this.concurrency, signal: this.signal }
      )

      for await (const outcome of outcomes) {
        processed++

        const reason = unrepresentableReason(outcome.relativePath)
        if (reason) {
          errorCount++
          this.logger.error(`Skipping ${JSON.stringify(outcome.relativePath)}: ${reason}`, {
            runId,
            path: outcome.relativePath,
          })
          continue
        }

        const entry: ManifestEntry = { relativePath: outcome.relativePath, digest: outcome.digest }
        await sink.write(entry)
        fileCount++
        if (outcome.error) errorCount++
        this.progress.advance(entry)
      }
    } finally {
      this.progress.finish()
    }

    const aborted = processed < files.length
    this.logger.debug('generate_complete', { runId, fileCount, errorCount, aborted })

    return { fileCount, errorCount, aborted }
  }

  private async checksumFile(
    root: string,
    absolutePath: string,
    runId: string
  ): Promise<ChecksumOutcome> {
    const relativePath = toManifestPath(path.relative(root, absolutePath))

    try {
      const digest = await this.engine.digest(absolutePath)
      this.logger.debug('file_checksummed', { runId, path: relativePath, digest })
      return { relativePath, digest }
    } catch (error) {
      const cause = error instanceof ChecksumError ? error.cause : error
      this.logger.error(`Failed to checksum ${relativePath}: ${describeError(cause)}`, {
        runId,
        path: relativePath,
      })
      return { relativePath, error: toError(error) }
    }
  }
}

import { Command } from './types'
import { CommandResult } from '../contracts'
import { ChecksumEngine, isSupportedAlgorithm } from '../checksum'
import { UsageError } from '../errors'
import { ManifestGenerator } from '../generator/ManifestGenerator'
import { silentProgress } from '../logging/ProgressReporter'
import { getValue, parseArgs, parsePositiveInt } from './args'

/** Exit status of a run stopped by SIGINT */
export const EXIT_INTERRUPTED = 130

export const GenerateCommand: Command = {
  name: 'generate',
  aliases: ['gen'],
  description: 'Checksum every file under a directory and write a manifest',
  usage: 'generate <directory> <outputFile> [--concurrency <n>] [--algorithm <name>] [--quiet]',
  execute: async (context, args): Promise<CommandResult> => {
    const parsed = parseArgs(args, {
      values: ['--concurrency', '--algorithm'],
      flags: ['--quiet', '-q'],
    })

    if (parsed.positionals.length !== 2) {
      throw new UsageError('generate takes a directory and an output file')
    }
    const [directory, outputFile] = parsed.positionals

    const concurrencyArg = getValue(parsed, '--concurrency')
    const algorithm = getValue(parsed, '--algorithm')
    if (algorithm !== undefined && !isSupportedAlgorithm(algorithm)) {
      throw new UsageError(`Unsupported checksum algorithm: ${algorithm}`)
    }
    const quiet = parsed.flags.has('--quiet') || parsed.flags.has('-q')

    const config = context.configLoader.withOverrides({
      algorithm,
      concurrency: concurrencyArg === undefined
        ? undefined
        : parsePositiveInt('--concurrency', concurrencyArg),
      progress: quiet ? false : undefined,
    })

    const generator = new ManifestGenerator({
      engine: new ChecksumEngine(config.checksum.algorithm),
      logger: context.logger,
      progress: config.generate.progress ? context.progress : silentProgress,
      concurrency: config.generate.concurrency,
      signal: context.signal,
    })

    context.logger.debug('generate_command', { directory, outputFile, ...config.generate })
    const result = await generator.generateToFile(directory, outputFile)

    const failed = result.errorCount > 0 ? ` (${result.errorCount} failed)` : ''
    if (result.aborted) {
      return {
        exitCode: EXIT_INTERRUPTED,
        output: `Interrupted: wrote ${result.fileCount} entries to ${outputFile}${failed} before stopping`,
      }
    }

    return {
      exitCode: 0,
      output: `Wrote ${result.fileCount} entries to ${outputFile}${failed}`,
    }
  },
}

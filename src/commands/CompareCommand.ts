import { Command } from './types'
import { CommandResult } from '../contracts'
import { compareManifests, formatComparisonReport, writeComparisonCsv } from '../compare'
import { UsageError } from '../errors'
import { loadManifest } from '../manifest'
import { getValue, parseArgs } from './args'

export const CompareCommand: Command = {
  name: 'compare',
  aliases: ['diff'],
  description: 'Compare a source manifest with a destination manifest',
  usage: 'compare <sourceManifest> <destinationManifest> [--output_csv <file>]',
  execute: async (context, args): Promise<CommandResult> => {
    const parsed = parseArgs(args, { values: ['--output_csv', '--output-csv'] })

    if (parsed.positionals.length !== 2) {
      throw new UsageError('compare takes a source and a destination manifest')
    }
    const [sourcePath, destinationPath] = parsed.positionals
    const outputCsv = getValue(parsed, '--output_csv', '--output-csv')

    // Both loads fail fast on the first malformed line
    const [source, destination] = await Promise.all([
      loadManifest(sourcePath),
      loadManifest(destinationPath),
    ])

    const result = compareManifests(source, destination)
    context.logger.debug('compare_complete', {
      sourcePath,
      destinationPath,
      missing: result.missing.size,
      extra: result.extra.size,
      mismatched: result.mismatched.size,
    })

    let output = formatComparisonReport(result)
    if (outputCsv) {
      await writeComparisonCsv(outputCsv, result)
      output += `\nResults written to ${outputCsv}`
    }

    return { exitCode: 0, output }
  },
}

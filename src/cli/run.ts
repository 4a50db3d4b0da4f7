import { CommandRegistry, defaultCommands } from '../commands'
import { ConfigLoader } from '../config/ConfigLoader'
import { UsageError, describeError } from '../errors'
import { ConsoleLogger, Logger } from '../logging/Logger'
import { ProgressReporter, TerminalProgressReporter } from '../logging/ProgressReporter'

export interface RunOptions {
  logger?: Logger
  configLoader?: ConfigLoader
  progress?: ProgressReporter
  signal?: AbortSignal
  stdout?: (text: string) => void
  stderr?: (text: string) => void
}

/**
 * Dispatch argv (without node and script) to a command. Resolves with the
 * process exit code and never rejects.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? ((text: string) => console.log(text))
  const stderr = options.stderr ?? ((text: string) => console.error(text))
  const logger = options.logger ?? new ConsoleLogger({ write: stderr })
  const registry = CommandRegistry.createWithDefaults(defaultCommands)

  const [name = 'help', ...args] = argv
  const command = registry.get(name)
  if (!command) {
    stderr(`Unknown command: ${name}\n\n${registry.formatHelp()}`)
    return 2
  }

  try {
    const result = await command.execute(
      {
        configLoader: options.configLoader ?? new ConfigLoader(undefined, logger),
        logger,
        progress: options.progress ?? new TerminalProgressReporter(),
        registry,
        signal: options.signal,
      },
      args
    )

    if (result.exitCode === 0) {
      stdout(result.output)
    } else {
      stderr(result.output)
    }
    return result.exitCode
  } catch (error) {
    if (error instanceof UsageError) {
      stderr(`${error.message}\n\nUsage: treesum ${command.usage}`)
      return 2
    }

    logger.debug('command_failed', { command: command.name, error: describeError(error) })
    stderr(`Error: ${describeError(error)}`)
    return 1
  }
}

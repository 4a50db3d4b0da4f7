import { CommandResult } from '../contracts'
import { ConfigLoader } from '../config/ConfigLoader'
import { Logger } from '../logging/Logger'
import { ProgressReporter } from '../logging/ProgressReporter'

export interface CommandContext {
  configLoader: ConfigLoader
  logger: Logger
  /** Used by commands that show progress, unless disabled by config or flag */
  progress: ProgressReporter
  registry: CommandRegistry
  signal?: AbortSignal
}

export interface Command {
  name: string
  aliases?: string[]
  description: string
  usage: string
  execute: (context: CommandContext, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
  formatHelp(programName?: string): string
}

export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { GenerateCommand, EXIT_INTERRUPTED } from './GenerateCommand'
export { CompareCommand } from './CompareCommand'
export { VersionCommand } from './VersionCommand'
export { HelpCommand } from './HelpCommand'

import { GenerateCommand } from './GenerateCommand'
import { CompareCommand } from './CompareCommand'
import { VersionCommand } from './VersionCommand'
import { HelpCommand } from './HelpCommand'

export const defaultCommands = [
  GenerateCommand,
  CompareCommand,
  VersionCommand,
  HelpCommand,
]

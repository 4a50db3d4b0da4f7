import { Command } from './types'
import { CommandResult } from '../contracts'

export const HelpCommand: Command = {
  name: 'help',
  aliases: ['--help', '-h'],
  description: 'Show this help',
  usage: 'help [command]',
  execute: async (context, args): Promise<CommandResult> => {
    if (args.length === 0) {
      return { exitCode: 0, output: context.registry.formatHelp() }
    }

    const command = context.registry.get(args[0])
    if (!command) {
      return { exitCode: 2, output: `Unknown command: ${args[0]}\n\n${context.registry.formatHelp()}` }
    }
    return { exitCode: 0, output: `treesum ${command.usage}\n\n${command.description}` }
  },
}

import { Command } from './types'
import { CommandResult } from '../contracts'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['v', '--version', '-v'],
  description: 'Show the treesum version',
  usage: 'version',
  execute: async (): Promise<CommandResult> => ({
    exitCode: 0,
    output: `treesum v${packageJson.version}`,
  }),
}

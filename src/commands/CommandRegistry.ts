import { Command, CommandRegistry as ICommandRegistry } from './types'

export class CommandRegistry implements ICommandRegistry {
  // name or alias -> command
  private lookup: Map<string, Command> = new Map()
  private ordered: Command[] = []

  register(command: Command): void {
    const keys = [command.name, ...(command.aliases ?? [])].map((key) => key.toLowerCase())

    for (const key of keys) {
      const existing = this.lookup.get(key)
      if (existing && existing !== command) {
        throw new Error(`"${key}" is already registered by the ${existing.name} command`)
      }
    }

    for (const key of keys) {
      this.lookup.set(key, command)
    }
    if (!this.ordered.includes(command)) {
      this.ordered.push(command)
    }
  }

  get(name: string): Command | undefined {
    return this.lookup.get(name.toLowerCase())
  }

  /** Registered commands in registration order, aliases not repeated */
  getAll(): Command[] {
    return [...this.ordered]
  }

  formatHelp(programName: string = 'treesum'): string {
    const commands = this.getAll()
    const width = Math.max(...commands.map((command) => command.name.length))

    const lines = [`Usage: ${programName} <command> [options]`, '', 'Commands:']
    for (const command of commands) {
      lines.push(`  ${command.name.padEnd(width)}  ${command.description}`)
    }
    lines.push('', 'Usage per command:')
    for (const command of commands) {
      lines.push(`  ${programName} ${command.usage}`)
    }

    return lines.join('\n')
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}

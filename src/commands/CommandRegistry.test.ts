import { CommandRegistry } from './CommandRegistry'
import { Command } from './types'

const createCommand = (name: string, aliases?: string[]): Command => ({
  name,
  aliases,
  description: `The ${name} command`,
  usage: `${name} <arg>`,
  execute: async () => ({ exitCode: 0, output: name }),
})

describe('CommandRegistry', () => {
  it('should find commands by name and alias, ignoring case', () => {
    const generate = createCommand('generate', ['gen'])
    const registry = CommandRegistry.createWithDefaults([generate])

    expect(registry.get('generate')).toBe(generate)
    expect(registry.get('GEN')).toBe(generate)
    expect(registry.get('compare')).toBeUndefined()
  })

  it('should list each command once in registration order', () => {
    const registry = CommandRegistry.createWithDefaults([
      createCommand('b', ['bee']),
      createCommand('a'),
    ])

    expect(registry.getAll().map((command) => command.name)).toEqual(['b', 'a'])
  })

  it('should refuse a name already taken by another command', () => {
    const registry = CommandRegistry.createWithDefaults([createCommand('generate', ['gen'])])

    expect(() => registry.register(createCommand('gen'))).toThrow(
      '"gen" is already registered by the generate command'
    )
  })

  it('should format help with aligned descriptions', () => {
    const registry = CommandRegistry.createWithDefaults([createCommand('go'), createCommand('stop')])

    expect(registry.formatHelp('tool').split('\n')).toEqual([
      'Usage: tool <command> [options]',
      '',
      'Commands:',
      '  go    The go command',
      '  stop  The stop command',
      '',
      'Usage per command:',
      '  tool go <arg>',
      '  tool stop <arg>',
    ])
  })
})

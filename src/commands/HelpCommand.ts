import { Command, CommandResult } from './types'

export function formatHelp(commands: Command[]): string {
  const width = Math.max(...commands.map(command => command.name.length))
  const lines = ['Usage: drop-digest <command> [options]', '', 'Commands:']
  for (const command of commands) {
    lines.push(`   ${command.name.padEnd(width)}  ${command.description}`)
    if (command.usage) {
      lines.push(`   ${' '.repeat(width)}  ${command.usage}`)
    }
  }
  return lines.join('\n')
}

export function createHelpCommand(listCommands: () => Command[]): Command {
  return {
    name: 'help',
    aliases: ['-h', '--help'],
    description: 'Show available commands',
    execute: async (): Promise<CommandResult> => ({
      exitCode: 0,
      output: formatHelp(listCommands()),
    }),
  }
}

import { Command, CommandContext, CommandResult } from './types'

export class CommandRegistry {
  private commands: Map<string, Command> = new Map()

  register(command: Command): void {
    this.commands.set(command.name.toLowerCase(), command)
    for (const alias of command.aliases ?? []) {
      this.commands.set(alias.toLowerCase(), command)
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name.toLowerCase())
  }

  // Registration order, one entry per command regardless of aliases
  getAll(): Command[] {
    return Array.from(new Set(this.commands.values()))
  }

  async dispatch(name: string, context: CommandContext, args: string[]): Promise<CommandResult> {
    const command = this.get(name)
    if (!command) {
      const available = this.getAll().map(c => c.name).join(', ')
      return { exitCode: 1, output: `Unknown command: ${name}\nAvailable commands: ${available}` }
    }
    return command.execute(context, args)
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}

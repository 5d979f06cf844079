import { Command, CommandRegistry as ICommandRegistry } from './types'

export class CommandRegistry implements ICommandRegistry {
  private commands: Map<string, Command> = new Map()

  register(command: Command): void {
    for (const name of [command.name, ...(command.aliases ?? [])]) {
      const key = name.toLowerCase()
      const existing = this.commands.get(key)
      if (existing && existing !== command) {
        throw new Error(`Command name "${name}" is already taken by "${existing.name}"`)
      }
      this.commands.set(key, command)
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name.toLowerCase())
  }

  getAll(): Command[] {
    // Aliases map to the same command object
    return Array.from(new Set(this.commands.values()))
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}

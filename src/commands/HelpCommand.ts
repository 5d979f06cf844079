import { Command, CommandContext, CommandResult } from './types'

export const HelpCommand: Command = {
  name: 'help',
  aliases: ['-h', '--help'],
  usage: 'help',
  description: 'List the available commands',
  execute: async ({ registry }: CommandContext): Promise<CommandResult> => {
    const commands = registry.getAll()
    const width = Math.max(...commands.map(command => command.usage.length))

    let message = 'Usage: spacediff <command> [options]\n\nCommands:\n'
    for (const command of commands) {
      message += `   ${command.usage.padEnd(width)}  ${command.description}\n`
    }
    message += '\nOptions:\n'
    message += '   --config <path>       Config file to use instead of searching for one\n'
    message += '   --format <text|json>  Output format\n'
    message += '   --limit <n>           Show at most n directories\n'
    message += '   --partitions <n>      Slices the comparison is computed in\n'
    message += '   --encoding <name>     Report encoding (utf-8, utf8, utf16le, latin1)'

    return { exitCode: 0, output: message }
  }
}

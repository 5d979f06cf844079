import { Command, CommandContext, CommandResult } from './types'
import { toJson } from '../formatting/json'

export const SummaryCommand: Command = {
  name: 'summary',
  aliases: ['load'],
  usage: 'summary <report>',
  description: 'Load one report and show how many directories it lists',
  execute: async ({ comparer, config }: CommandContext, args: string[]): Promise<CommandResult> => {
    if (args.length !== 1) {
      return {
        exitCode: 1,
        output: 'Usage: spacediff summary <report>',
      }
    }

    const snapshot = await comparer.loadSnapshot(args[0])
    const summary = snapshot.summary()

    if (config.output.format === 'json') {
      return { exitCode: 0, output: toJson(summary) }
    }

    return {
      exitCode: 0,
      output: `Report loaded (${summary.directoryCount} directories, ${summary.totalBytes} bytes listed)`,
    }
  }
}

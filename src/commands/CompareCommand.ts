import { Command, CommandContext, CommandResult } from './types'
import { FormatterFactory } from '../formatting'

export const CompareCommand: Command = {
  name: 'compare',
  aliases: ['diff'],
  usage: 'compare <older-report> <newer-report>',
  description: 'List the directories that grew between two reports',
  execute: async ({ comparer, config }: CommandContext, args: string[]): Promise<CommandResult> => {
    if (args.length !== 2) {
      return {
        exitCode: 1,
        output: 'Usage: spacediff compare <older-report> <newer-report>',
      }
    }

    const [olderPath, newerPath] = args
    const result = await comparer.compareReports(olderPath, newerPath)
    const formatter = FormatterFactory.createFormatter(config.output.format)

    return {
      exitCode: 0,
      output: formatter.render(result, { limit: config.output.limit }),
    }
  }
}

import { Command, CommandResult } from './types'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  aliases: ['v', '--version', '-v'],
  usage: 'version',
  description: 'Show the spacediff version',
  execute: async (): Promise<CommandResult> => {
    return {
      exitCode: 0,
      output: `spacediff v${packageJson.version}`,
    }
  }
}

import { SpaceDiffConfig } from '../contracts'
import { ReportComparer } from '../spacediff/ReportComparer'

export interface CommandResult {
  exitCode: number
  output: string
}

export interface CommandContext {
  comparer: ReportComparer
  config: SpaceDiffConfig
  registry: CommandRegistry
}

export interface Command {
  name: string
  aliases?: string[]
  usage: string
  description: string
  execute: (context: CommandContext, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  get(name: string): Command | undefined
  getAll(): Command[]
}

#!/usr/bin/env node

import { z } from 'zod'
import { CommandRegistry, CommandResult, defaultCommands } from '../commands'
import { ConfigLoader, ConfigOverrides } from '../config/ConfigLoader'
import { isReportError, OutputFormatSchema, ReportEncodingSchema } from '../contracts'
import { debugLog } from '../logging/debugLog'
import { ReportComparer } from '../spacediff/ReportComparer'

export interface CliArgs {
  command: string
  args: string[]
  configPath?: string
  overrides: ConfigOverrides
}

export class UsageError extends Error {}

const readPositiveInteger = (flag: string, value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} must be a positive integer, got "${value}"`)
  }
  return parsed
}

export function parseCliArgs(argv: string[]): CliArgs {
  const positional: string[] = []
  const overrides: ConfigOverrides = {}
  let configPath: string | undefined

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i]
    const takesValue = ['--config', '--format', '--limit', '--partitions', '--encoding'].includes(flag)
    if (!takesValue) {
      positional.push(flag)
      continue
    }

    const value = argv[i + 1]
    if (value === undefined) {
      throw new UsageError(`${flag} needs a value`)
    }
    i++

    switch (flag) {
      case '--config':
        configPath = value
        break
      case '--format': {
        const format = OutputFormatSchema.safeParse(value)
        if (!format.success) {
          throw new UsageError(`--format must be one of ${OutputFormatSchema.options.join(', ')}`)
        }
        overrides.format = format.data
        break
      }
      case '--encoding': {
        const encoding = ReportEncodingSchema.safeParse(value)
        if (!encoding.success) {
          throw new UsageError(`--encoding must be one of ${ReportEncodingSchema.options.join(', ')}`)
        }
        overrides.encoding = encoding.data
        break
      }
      case '--limit':
        overrides.limit = readPositiveInteger(flag, value)
        break
      case '--partitions':
        overrides.partitions = readPositiveInteger(flag, value)
        break
    }
  }

  const [command = 'help', ...args] = positional
  return { command, args, configPath, overrides }
}

export async function run(
  argv: string[],
  options: { cwd?: string } = {}
): Promise<CommandResult> {
  try {
    const cliArgs = parseCliArgs(argv)
    debugLog({ event: 'cli_start', command: cliArgs.command, args: cliArgs.args })

    const registry = CommandRegistry.createWithDefaults(defaultCommands)
    const command = registry.get(cliArgs.command)
    if (!command) {
      return {
        exitCode: 1,
        output: `Unknown command: ${cliArgs.command}\nRun "spacediff help" for a list of commands.`,
      }
    }

    const configLoader = new ConfigLoader(cliArgs.configPath, options.cwd)
    const config = configLoader.applyOverrides(cliArgs.overrides)
    const comparer = new ReportComparer(config)

    return await command.execute({ comparer, config, registry }, cliArgs.args)
  } catch (error) {
    if (isReportError(error)) {
      debugLog({ event: 'cli_report_error', kind: error.kind, message: error.message })
      return { exitCode: 1, output: `spacediff: ${error.message}` }
    }
    if (error instanceof UsageError) {
      return { exitCode: 1, output: `spacediff: ${error.message}` }
    }
    if (error instanceof z.ZodError) {
      const issues = error.errors.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      return { exitCode: 1, output: `spacediff: invalid options\n${issues.join('\n')}` }
    }
    throw error
  }
}

// Only run if this is the main module
if (require.main === module) {
  run(process.argv.slice(2))
    .then((result) => {
      if (result.exitCode === 0) {
        console.log(result.output)
      } else {
        console.error(result.output)
      }
      process.exitCode = result.exitCode
    })
    .catch((error: unknown) => {
      console.error('spacediff: unexpected failure:', error)
      process.exitCode = 1
    })
}

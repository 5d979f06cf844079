import fs from 'fs'
import path from 'path'
import { SpaceDiffConfig } from '../contracts/types'
import { SpaceDiffConfigSchema } from '../contracts/schemas'
import { z } from 'zod'

export interface ConfigOverrides {
  encoding?: SpaceDiffConfig['report']['encoding']
  partitions?: number
  format?: SpaceDiffConfig['output']['format']
  limit?: number
}

export class ConfigLoader {
  private static DEFAULT_CONFIG: SpaceDiffConfig = {
    report: {
      encoding: 'utf-8',
    },
    diff: {
      partitions: 1,
    },
    output: {
      format: 'text',
    },
  }

  static readonly CONFIG_NAMES = ['.spacediff.config.json', 'spacediff.config.json']

  private config: SpaceDiffConfig

  constructor(
    private configPath?: string,
    private startDir: string = process.cwd()
  ) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the working directory and walk up
    let currentDir = path.resolve(this.startDir)

    while (true) {
      for (const configName of ConfigLoader.CONFIG_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }

      const parentDir = path.dirname(currentDir)
      if (parentDir === currentDir) {
        return null
      }
      currentDir = parentDir
    }
  }

  private loadConfig(): SpaceDiffConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      return SpaceDiffConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): SpaceDiffConfig {
    return this.config
  }

  /**
   * Apply command line overrides on top of the file config. Overrides are
   * validated against the same schema, so a bad value throws a ZodError.
   */
  applyOverrides(overrides: ConfigOverrides): SpaceDiffConfig {
    this.config = SpaceDiffConfigSchema.parse({
      report: {
        ...this.config.report,
        ...(overrides.encoding !== undefined ? { encoding: overrides.encoding } : {}),
      },
      diff: {
        ...this.config.diff,
        ...(overrides.partitions !== undefined ? { partitions: overrides.partitions } : {}),
      },
      output: {
        ...this.config.output,
        ...(overrides.format !== undefined ? { format: overrides.format } : {}),
        ...(overrides.limit !== undefined ? { limit: overrides.limit } : {}),
      },
    })
    return this.config
  }
}

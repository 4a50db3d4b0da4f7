import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { TreesumConfig, TreesumConfigSchema } from '../contracts'
import { ConsoleLogger, Logger } from '../logging/Logger'
import { DEFAULT_ALGORITHM } from '../checksum'
import { describeError } from '../errors'

export interface ConfigOverrides {
  algorithm?: string
  concurrency?: number
  progress?: boolean
}

export class ConfigLoader {
  private static DEFAULT_CONFIG: TreesumConfig = {
    checksum: {
      algorithm: DEFAULT_ALGORITHM,
    },
    generate: {
      progress: true,
    },
  }

  static readonly CONFIG_NAMES = ['.treesum.config.json', 'treesum.config.json']

  private config: TreesumConfig

  constructor(
    private configPath?: string,
    private logger: Logger = new ConsoleLogger(),
    private cwd: string = process.cwd()
  ) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the working directory and walk up
    let currentDir = path.resolve(this.cwd)

    while (currentDir !== path.parse(currentDir).root) {
      for (const configName of ConfigLoader.CONFIG_NAMES) {
        const configPath = path.join(currentDir, configName)
        if (fs.existsSync(configPath)) {
          return configPath
        }
      }
      currentDir = path.dirname(currentDir)
    }

    return null
  }

  private loadConfig(): TreesumConfig {
    const configPath = this.configPath ?? this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.DEFAULT_CONFIG
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const parsedConfig: unknown = JSON.parse(rawConfig)

      // Validate and apply defaults
      return TreesumConfigSchema.parse(parsedConfig)
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        this.logger.warn(`Invalid config at ${configPath}: ${issues.join('; ')}`, { configPath })
      } else if (error instanceof SyntaxError) {
        this.logger.warn(`Invalid JSON in config file ${configPath}`, { configPath })
      } else {
        this.logger.warn(`Error loading config from ${configPath}: ${describeError(error)}`, { configPath })
      }

      return ConfigLoader.DEFAULT_CONFIG
    }
  }

  getConfig(): TreesumConfig {
    return this.config
  }

  /**
   * Config with command-line flags applied on top.
   */
  withOverrides(overrides: ConfigOverrides): TreesumConfig {
    return {
      checksum: {
        algorithm: overrides.algorithm ?? this.config.checksum.algorithm,
      },
      generate: {
        concurrency: overrides.concurrency ?? this.config.generate.concurrency,
        progress: overrides.progress ?? this.config.generate.progress,
      },
    }
  }
}

import { Command, Flags } from '@oclif/core'
import { ConfigError, getGlobalConfigPath, loadConfigWithSources, PROJECT_CONFIG_FILE } from '../../config/loader.js'
import type { ConfigWithSource } from '../../config/schema.js'
import { CONFIG_SECTIONS, ConfigSource } from '../../config/schema.js'
import { baseArg, jsonFlag, resolveBaseDir } from '../../utils/common-flags.js'
import { ErrorHelper, toError } from '../../utils/errors.js'

const PRIORITY_ORDER: readonly ConfigSource[] = [
  ConfigSource.ENV_VARS,
  ConfigSource.PBXFORGE_TOML,
  ConfigSource.PACKAGE_JSON,
  ConfigSource.GLOBAL_CONFIG,
]

/**
 * Show merged configuration
 *
 * Displays the final configuration after merging all sources.
 */
export default class ConfigShow extends Command {
  static description = 'Display merged configuration from all sources'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --sources',
    '<%= config.bin %> <%= command.id %> ./MyApp --json',
  ]

  static args = {
    base: baseArg,
  }

  static flags = {
    sources: Flags.boolean({
      char: 's',
      description: 'Show where each setting comes from',
      default: false,
    }),

    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ConfigShow)
    const baseDir = resolveBaseDir(args.base)

    let configWithSources: ConfigWithSource
    try {
      configWithSources = await loadConfigWithSources({ baseDir })
    } catch (error) {
      if (error instanceof ConfigError) {
        ErrorHelper.validation(this, error.message, flags.json)
      }
      ErrorHelper.operation(this, toError(error), 'Failed to load configuration', flags.json)
    }

    if (flags.json) {
      this.log(JSON.stringify(flags.sources ? configWithSources : configWithSources.config, null, 2))
    } else {
      await this.displayHumanReadable(configWithSources, flags.sources)
    }
  }

  /**
   * Display configuration in human-readable format
   */
  private async displayHumanReadable(
    configWithSources: ConfigWithSource,
    showSources: boolean
  ): Promise<void> {
    const chalk = (await import('chalk')).default
    const { config, sources } = configWithSources

    const uniqueSources = new Set<ConfigSource>(
      Object.values(sources).filter((source) => source !== ConfigSource.DEFAULT)
    )
    const sourceCount = uniqueSources.size + 1 // +1 for defaults

    this.log(
      chalk.bold(`\nConfiguration (merged from ${sourceCount} source${sourceCount === 1 ? '' : 's'}):\n`)
    )

    for (const section of CONFIG_SECTIONS) {
      this.log(chalk.cyan.bold(`[${section}]`))
      for (const [key, value] of Object.entries(config[section])) {
        if (value === undefined) {
          continue
        }
        const source = sources[`${section}.${key}`] ?? ConfigSource.DEFAULT
        const origin = showSources ? chalk.gray(` (${this.formatSource(source)})`) : ''
        this.log(`  ${key} = ${chalk.yellow(JSON.stringify(value))}${origin}`)
      }
      this.log('')
    }

    if (showSources) {
      this.log(chalk.bold('Configuration sources (priority order):'))
      const sourcesList = PRIORITY_ORDER.filter((source) => uniqueSources.has(source))
      sourcesList.forEach((source, index) => {
        this.log(chalk.gray(`  ${index + 1}. ${this.formatSource(source)}`))
      })
      this.log(chalk.gray(`  ${sourcesList.length + 1}. defaults`))
      this.log('')
    }
  }

  /**
   * Format source name for display
   */
  private formatSource(source: ConfigSource): string {
    const sourceMap: Record<ConfigSource, string> = {
      [ConfigSource.ENV_VARS]: 'environment variable',
      [ConfigSource.PBXFORGE_TOML]: PROJECT_CONFIG_FILE,
      [ConfigSource.PACKAGE_JSON]: 'package.json',
      [ConfigSource.GLOBAL_CONFIG]: getGlobalConfigPath(),
      [ConfigSource.DEFAULT]: 'default',
    }
    return sourceMap[source]
  }
}

import { Command, Flags } from '@oclif/core'
import type { AnyJson, JsonMap } from '@iarna/toml'
import { stringify as stringifyToml } from '@iarna/toml'
import fs from 'fs-extra'
import * as path from 'path'
import { ConfigError, parseConfigFile, PROJECT_CONFIG_FILE } from '../../config/loader.js'
import type { PartialProjectConfig } from '../../config/schema.js'
import { CONFIG_SECTIONS, ConfigSource, DEFAULT_CONFIG } from '../../config/schema.js'
import { baseArg, jsonFlag, resolveBaseDir } from '../../utils/common-flags.js'
import { ErrorHelper, toError } from '../../utils/errors.js'

/**
 * Represents a setting that was added during merge
 */
interface AddedSetting {
  path: string
  value: unknown
}

/**
 * Result of merging configurations
 */
interface MergeResult {
  merged: Record<string, Record<string, unknown>>
  added: AddedSetting[]
}

const SECTION_COMMENTS: Record<string, string[]> = {
  project: [
    '# Target settings',
    '# name - target, product and group name',
    '# usageDescriptions - Info.plist usage strings, e.g. NSCameraUsageDescription = "..."',
  ],
  sources: [
    '# Source discovery',
    '# Files under `directory` ending in `extension` are compiled; anything inside',
    '# a directory named `previewDirectory` (at any depth) is skipped.',
  ],
  localization: ['# Localization', '# One Localizable.strings variant per region'],
  output: ['# Output', '# path - manifest location relative to this file (default <name>.xcodeproj/project.pbxproj)'],
}

/**
 * Convert a plain value to a TOML-encodable one, dropping undefined
 */
function toToml(value: unknown): AnyJson | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string')
  }
  if (value !== null && typeof value === 'object') {
    return toTomlTable(value)
  }
  return undefined
}

function toTomlTable(value: object): JsonMap {
  const table: JsonMap = {}
  for (const [key, item] of Object.entries(value)) {
    const converted = toToml(item)
    if (converted !== undefined) {
      table[key] = converted
    }
  }
  return table
}

/**
 * Initialize pbxforge configuration
 *
 * Creates a .pbxforge.toml file with default configuration.
 * If the file exists, missing defaults are merged in.
 */
export default class ConfigInit extends Command {
  static description = 'Generate a .pbxforge.toml configuration file with defaults'

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> ./MyApp',
    '<%= config.bin %> <%= command.id %> --force',
    '<%= config.bin %> <%= command.id %> --no-merge',
  ]

  static args = {
    base: baseArg,
  }

  static flags = {
    force: Flags.boolean({
      char: 'f',
      description: 'Overwrite existing .pbxforge.toml (ignores --merge)',
      default: false,
    }),
    merge: Flags.boolean({
      char: 'm',
      description: 'Merge missing defaults into existing config (default when file exists)',
      default: true,
      allowNo: true,
    }),
    json: jsonFlag,
  }

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ConfigInit)
    const baseDir = resolveBaseDir(args.base)
    const configPath = path.join(baseDir, PROJECT_CONFIG_FILE)

    if (!(await fs.pathExists(baseDir))) {
      ErrorHelper.validation(this, `Base directory does not exist: ${baseDir}`, flags.json)
    }

    if (!(await fs.pathExists(configPath))) {
      await this.writeNewConfig(configPath, 'created', flags.json)
    } else if (flags.force) {
      await this.writeNewConfig(configPath, 'overwritten', flags.json)
    } else if (flags.merge) {
      await this.mergeExistingConfig(configPath, flags.json)
    } else {
      ErrorHelper.validation(
        this,
        `Configuration file already exists: ${configPath}\nUse --force to overwrite or --merge to add missing defaults`,
        flags.json
      )
    }
  }

  /**
   * Write a new config file with all defaults
   */
  private async writeNewConfig(
    configPath: string,
    action: 'created' | 'overwritten',
    json: boolean
  ): Promise<void> {
    try {
      await fs.writeFile(configPath, this.generateTomlContent(toTomlTable(DEFAULT_CONFIG)), { mode: 0o644 })
    } catch (error) {
      ErrorHelper.operation(this, toError(error), 'Failed to create configuration file', json)
    }

    if (json) {
      this.log(JSON.stringify({ status: 'success', action, path: configPath }, null, 2))
    } else {
      this.log(`✓ Configuration file ${action}: ${configPath}`)
      this.log('')
      this.log('Next steps:')
      this.log('  1. Edit the file to customize your settings')
      this.log(`  2. Run \`${this.config.bin} config show\` to verify configuration`)
      this.log(`  3. Run \`${this.config.bin} generate\` to write the project`)
    }
  }

  /**
   * Merge missing defaults into an existing config file
   */
  private async mergeExistingConfig(configPath: string, json: boolean): Promise<void> {
    let existing: PartialProjectConfig
    try {
      existing = await parseConfigFile({
        path: configPath,
        source: ConfigSource.PBXFORGE_TOML,
        priority: 0,
        exists: true,
      })
    } catch (error) {
      if (error instanceof ConfigError) {
        ErrorHelper.validation(this, error.message, json)
      }
      ErrorHelper.operation(this, toError(error), 'Failed to read configuration file', json)
    }

    const { merged, added } = this.mergeWithDefaults(existing)

    if (added.length === 0) {
      if (json) {
        this.log(
          JSON.stringify(
            {
              status: 'success',
              action: 'unchanged',
              path: configPath,
              message: 'Configuration is already up to date',
              added: [],
            },
            null,
            2
          )
        )
      } else {
        this.log(`✓ Configuration is already up to date: ${configPath}`)
        this.log('  No missing settings to add.')
      }
      return
    }

    try {
      await fs.writeFile(configPath, this.generateTomlContent(toTomlTable(merged)), { mode: 0o644 })
    } catch (error) {
      ErrorHelper.operation(this, toError(error), 'Failed to merge configuration file', json)
    }

    if (json) {
      this.log(
        JSON.stringify(
          { status: 'success', action: 'merged', path: configPath, added, addedCount: added.length },
          null,
          2
        )
      )
    } else {
      this.log(`✓ Configuration updated: ${configPath}`)
      this.log('')
      this.log(`Added ${added.length} missing setting(s):`)
      for (const setting of added) {
        const valueStr =
          typeof setting.value === 'object' ? JSON.stringify(setting.value) : String(setting.value)
        this.log(`  • ${setting.path} = ${valueStr}`)
      }
    }
  }

  /**
   * Merge existing partial config with defaults, tracking what was added
   */
  private mergeWithDefaults(existing: PartialProjectConfig): MergeResult {
    const added: AddedSetting[] = []
    const merged: Record<string, Record<string, unknown>> = {}

    for (const section of CONFIG_SECTIONS) {
      const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG[section] }
      const current: Record<string, unknown> = { ...existing[section] }

      if (existing[section] === undefined) {
        if (Object.keys(defaults).length > 0) {
          added.push({ path: section, value: defaults })
        }
      } else {
        for (const [key, value] of Object.entries(defaults)) {
          if (current[key] === undefined) {
            added.push({ path: `${section}.${key}`, value })
          }
        }
      }

      merged[section] = { ...defaults, ...current }
    }

    return { merged, added }
  }

  /**
   * Generate TOML content with comments
   */
  private generateTomlContent(config: JsonMap): string {
    const header = [
      '# pbxforge configuration',
      '#',
      '# Settings for generating <name>.xcodeproj/project.pbxproj.',
      '# Environment variables (PBXFORGE_*) override values in this file.',
      '',
      '',
    ].join('\n')

    let result = stringifyToml(config)
    for (const section of CONFIG_SECTIONS) {
      const comment = SECTION_COMMENTS[section]
      if (comment) {
        result = result.replace(`[${section}]`, `${comment.join('\n')}\n[${section}]`)
      }
    }
    return header + result
  }
}

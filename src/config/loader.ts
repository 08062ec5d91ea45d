import { parse as parseToml } from '@iarna/toml'
import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'
import { z, ZodError } from 'zod'
import type { ConfigFile, ConfigWithSource, PartialProjectConfig, ProjectConfig } from './schema.js'
import {
  CONFIG_SECTIONS,
  ConfigSource,
  DEFAULT_CONFIG,
  validateConfig,
  validatePartialConfig,
} from './schema.js'
import { hasEnvConfig, parseEnvVars } from './env.js'

/**
 * Configuration Loader
 *
 * Loads pbxforge configuration for one base directory from:
 * 1. .pbxforge.toml (base directory)
 * 2. package.json "pbxforge" key (base directory)
 * 3. Global config (~/.config/pbxforge/config.toml)
 * 4. PBXFORGE_* environment variables
 *
 * Merges configurations with proper priority handling. Unlike a
 * long-running tool, a broken config file is an error here: skipping it
 * would silently change the generated project.
 */

export const PROJECT_CONFIG_FILE = '.pbxforge.toml'

/**
 * Error thrown when a configuration source cannot be read or is invalid
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Priority order for configuration sources (higher = more priority)
 */
const SOURCE_PRIORITY: Record<ConfigSource, number> = {
  [ConfigSource.ENV_VARS]: 90,
  [ConfigSource.PBXFORGE_TOML]: 80,
  [ConfigSource.PACKAGE_JSON]: 70,
  [ConfigSource.GLOBAL_CONFIG]: 50,
  [ConfigSource.DEFAULT]: 0,
}

// ============================================================================
// Configuration Discovery
// ============================================================================

/**
 * Get global configuration file path
 *
 * @returns Path to global config file (~/.config/pbxforge/config.toml)
 */
export function getGlobalConfigPath(): string {
  return path.join(os.homedir(), '.config', 'pbxforge', 'config.toml')
}

/**
 * Check if a configuration file exists and is readable
 */
export async function configFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fs.constants.R_OK)
    return true
  } catch {
    return false
  }
}

/**
 * List the configuration files that apply to a base directory
 *
 * @param baseDir - Project base directory
 * @param globalConfigPath - Override for the global config location
 */
export async function discoverConfigFiles(
  baseDir: string,
  globalConfigPath: string = getGlobalConfigPath()
): Promise<ConfigFile[]> {
  const candidates: Array<{ path: string; source: ConfigSource }> = [
    { path: path.join(baseDir, PROJECT_CONFIG_FILE), source: ConfigSource.PBXFORGE_TOML },
    { path: path.join(baseDir, 'package.json'), source: ConfigSource.PACKAGE_JSON },
    { path: globalConfigPath, source: ConfigSource.GLOBAL_CONFIG },
  ]

  const configFiles: ConfigFile[] = []
  for (const candidate of candidates) {
    configFiles.push({
      ...candidate,
      priority: SOURCE_PRIORITY[candidate.source],
      exists: await configFileExists(candidate.path),
    })
  }
  return configFiles
}

// ============================================================================
// Configuration Parsers
// ============================================================================

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
  }
  return error instanceof Error ? error.message : String(error)
}

const PackageJsonSchema = z.object({ pbxforge: z.unknown().optional() }).passthrough()

/**
 * Parse a TOML config file (.pbxforge.toml or the global config)
 */
export async function parseConfigToml(filePath: string): Promise<PartialProjectConfig> {
  const contents = await fs.readFile(filePath, 'utf-8')
  return validatePartialConfig(parseToml(contents))
}

/**
 * Parse package.json file
 *
 * Extracts the "pbxforge" key; a package.json without it contributes nothing
 */
export async function parsePackageJson(filePath: string): Promise<PartialProjectConfig> {
  const parsed = PackageJsonSchema.parse(await fs.readJson(filePath))
  return validatePartialConfig(parsed.pbxforge ?? {})
}

/**
 * Parse configuration file based on its type
 *
 * @throws {ConfigError} If the file cannot be read, parsed or validated
 */
export async function parseConfigFile(configFile: ConfigFile): Promise<PartialProjectConfig> {
  try {
    switch (configFile.source) {
      case ConfigSource.PBXFORGE_TOML:
      case ConfigSource.GLOBAL_CONFIG:
        return await parseConfigToml(configFile.path)
      case ConfigSource.PACKAGE_JSON:
        return await parsePackageJson(configFile.path)
      default:
        return {}
    }
  } catch (error) {
    throw new ConfigError(
      `Invalid configuration in ${configFile.path}: ${describeError(error)}`,
      configFile.path,
      error instanceof Error ? error : undefined
    )
  }
}

// ============================================================================
// Configuration Merging
// ============================================================================

/**
 * Merge two configuration objects section by section
 *
 * Higher priority values override lower priority values. Arrays and
 * maps inside a section are replaced, not merged.
 */
export function mergeConfigs(
  base: PartialProjectConfig,
  override: PartialProjectConfig
): PartialProjectConfig {
  return {
    project: { ...base.project, ...override.project },
    sources: { ...base.sources, ...override.sources },
    localization: { ...base.localization, ...override.localization },
    output: { ...base.output, ...override.output },
  }
}

/**
 * Merge multiple configuration sources
 *
 * Configs are merged in priority order (lower priority first), on top
 * of DEFAULT_CONFIG.
 *
 * @returns Validated configuration with source tracking per dotted key
 */
export function mergeMultipleConfigs(
  configs: Array<{ config: PartialProjectConfig; source: ConfigSource }>
): ConfigWithSource {
  const sortedConfigs = [...configs].sort(
    (a, b) => SOURCE_PRIORITY[a.source] - SOURCE_PRIORITY[b.source]
  )

  let mergedConfig: PartialProjectConfig = DEFAULT_CONFIG
  const sources: Record<string, ConfigSource> = {}

  for (const section of CONFIG_SECTIONS) {
    for (const key of Object.keys(DEFAULT_CONFIG[section])) {
      sources[`${section}.${key}`] = ConfigSource.DEFAULT
    }
  }

  for (const { config, source } of sortedConfigs) {
    mergedConfig = mergeConfigs(mergedConfig, config)

    for (const section of CONFIG_SECTIONS) {
      for (const [key, value] of Object.entries(config[section] ?? {})) {
        if (value !== undefined) {
          sources[`${section}.${key}`] = source
        }
      }
    }
  }

  try {
    return { config: validateConfig(mergedConfig), sources }
  } catch (error) {
    throw new ConfigError(`Invalid configuration: ${describeError(error)}`)
  }
}

// ============================================================================
// Configuration Loading (Main API)
// ============================================================================

export interface LoadConfigOptions {
  /** Project base directory */
  baseDir: string
  env?: NodeJS.ProcessEnv
  globalConfigPath?: string
}

/**
 * Load configuration with source tracking
 *
 * @throws {ConfigError} If any source is invalid
 */
export async function loadConfigWithSources(options: LoadConfigOptions): Promise<ConfigWithSource> {
  const env = options.env ?? process.env
  const configFiles = await discoverConfigFiles(options.baseDir, options.globalConfigPath)

  const parsedConfigs: Array<{ config: PartialProjectConfig; source: ConfigSource }> = []
  for (const configFile of configFiles) {
    if (!configFile.exists) {
      continue
    }
    parsedConfigs.push({
      config: await parseConfigFile(configFile),
      source: configFile.source,
    })
  }

  if (hasEnvConfig(env)) {
    try {
      parsedConfigs.push({ config: parseEnvVars(env), source: ConfigSource.ENV_VARS })
    } catch (error) {
      throw new ConfigError(`Invalid PBXFORGE_* environment variable: ${describeError(error)}`)
    }
  }

  return mergeMultipleConfigs(parsedConfigs)
}

/**
 * Load configuration (convenience function)
 *
 * @returns Complete merged configuration
 */
export async function loadConfig(options: LoadConfigOptions): Promise<ProjectConfig> {
  const { config } = await loadConfigWithSources(options)
  return config
}

import type { PartialProjectConfig } from './schema.js'
import { validatePartialConfig } from './schema.js'

/**
 * Environment Variable Parser
 *
 * Parses PBXFORGE_* environment variables and converts them to configuration.
 *
 * Mapping rules:
 * - PBXFORGE_PROJECT_NAME=Notes → project.name = 'Notes'
 * - PBXFORGE_LOCALIZATION_REGIONS=en,de → localization.regions = ['en', 'de']
 *
 * PBXFORGE_BASE_DIR is not configuration: it only selects the base directory
 * when no argument is given (see {@link getBaseDirFromEnv}).
 */

const ENV_PREFIX = 'PBXFORGE_'

export const BASE_DIR_ENV_VAR = 'PBXFORGE_BASE_DIR'

type EnvValueType = 'string' | 'array'

interface EnvVarSpec {
  path: string
  type: EnvValueType
}

/**
 * Supported environment variables and their config paths
 */
const ENV_VAR_MAP: Record<string, EnvVarSpec> = {
  PBXFORGE_PROJECT_NAME: { path: 'project.name', type: 'string' },
  PBXFORGE_PROJECT_BUNDLE_IDENTIFIER: { path: 'project.bundleIdentifier', type: 'string' },
  PBXFORGE_PROJECT_DEPLOYMENT_TARGET: { path: 'project.deploymentTarget', type: 'string' },

  PBXFORGE_SOURCES_DIRECTORY: { path: 'sources.directory', type: 'string' },
  PBXFORGE_SOURCES_EXTENSION: { path: 'sources.extension', type: 'string' },
  PBXFORGE_SOURCES_PREVIEW_DIRECTORY: { path: 'sources.previewDirectory', type: 'string' },

  PBXFORGE_LOCALIZATION_REGIONS: { path: 'localization.regions', type: 'array' },

  PBXFORGE_OUTPUT_PATH: { path: 'output.path', type: 'string' },
}

/**
 * Parse an array value from comma-separated string
 *
 * @returns Array of trimmed, non-empty strings
 */
export function parseArray(value: string): string[] {
  return value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Set a nested property on an object using dot notation
 *
 * @example
 * setNestedProperty({}, 'sources.directory', 'App') // → { sources: { directory: 'App' } }
 */
export function setNestedProperty(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): void {
  const keys = path.split('.')
  const lastKey = keys.pop()
  if (lastKey === undefined) {
    return
  }

  let current = obj
  for (const key of keys) {
    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  current[lastKey] = value
}

/**
 * Parse a single environment variable value according to its declared type
 */
export function parseEnvValue(key: string, value: string): unknown {
  const spec = ENV_VAR_MAP[key]
  if (spec?.type === 'array') {
    return parseArray(value)
  }
  return value.trim()
}

/**
 * Parse all PBXFORGE_* environment variables
 *
 * Unknown PBXFORGE_* names are ignored.
 *
 * @param env - Environment variables object (defaults to process.env)
 * @returns Partial configuration from environment variables
 * @throws {z.ZodError} If a value fails validation
 */
export function parseEnvVars(env: NodeJS.ProcessEnv = process.env): PartialProjectConfig {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || !value) {
      continue
    }

    const spec = ENV_VAR_MAP[key]
    if (spec) {
      setNestedProperty(config, spec.path, parseEnvValue(key, value))
    }
  }

  return validatePartialConfig(config)
}

/**
 * Check if any mapped PBXFORGE_* configuration variables are set
 */
export function hasEnvConfig(env: NodeJS.ProcessEnv = process.env): boolean {
  return Object.keys(env).some((key) => key in ENV_VAR_MAP && Boolean(env[key]))
}

/**
 * Base directory from PBXFORGE_BASE_DIR, if set and non-blank
 */
export function getBaseDirFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[BASE_DIR_ENV_VAR]?.trim()
  return value ? value : undefined
}

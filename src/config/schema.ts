import { z } from 'zod'

/**
 * Configuration Schema for pbxforge
 *
 * Defines TypeScript interfaces and Zod schemas for validating
 * configuration from multiple sources (.pbxforge.toml, package.json,
 * the global config file and environment variables).
 */

// ============================================================================
// Zod Schemas (for validation)
// ============================================================================

const versionString = z.string().regex(/^\d+(\.\d+)*$/, 'Expected a dotted version number')

/**
 * Project (target) configuration schema
 */
export const ProjectSectionSchema = z.object({
  name: z.string().min(1).regex(/^[^/\\"]+$/, 'Project name cannot contain slashes or quotes').default('App'),
  bundleIdentifier: z.string().min(1).default('com.example.app'),
  displayName: z.string().min(1).optional(),
  marketingVersion: versionString.default('1.0'),
  currentProjectVersion: versionString.default('1'),
  deploymentTarget: versionString.default('17.0'),
  swiftVersion: versionString.default('5.0'),
  category: z.string().min(1).default('public.app-category.productivity'),
  usageDescriptions: z.record(z.string().regex(/^NS\w+UsageDescription$/), z.string()).default({}),
})

/**
 * Project configuration schema without defaults (for partial config validation)
 */
export const ProjectSectionSchemaPartial = z.object({
  name: z.string().min(1).regex(/^[^/\\"]+$/).optional(),
  bundleIdentifier: z.string().min(1).optional(),
  displayName: z.string().min(1).optional(),
  marketingVersion: versionString.optional(),
  currentProjectVersion: versionString.optional(),
  deploymentTarget: versionString.optional(),
  swiftVersion: versionString.optional(),
  category: z.string().min(1).optional(),
  usageDescriptions: z.record(z.string().regex(/^NS\w+UsageDescription$/), z.string()).optional(),
})

const relativeSegment = z
  .string()
  .min(1)
  .refine((value) => !value.split(/[\\/]/).includes('..'), 'Must not leave the base directory')

/**
 * Source discovery configuration schema
 */
export const SourcesSectionSchema = z.object({
  directory: relativeSegment.default('App'),
  extension: z.string().regex(/^\.[\w.+-]+$/, 'Extension must start with a dot').default('.swift'),
  previewDirectory: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'Preview directory is a single path segment')
    .default('Preview Content'),
})

/**
 * Source discovery configuration schema without defaults
 */
export const SourcesSectionSchemaPartial = z.object({
  directory: relativeSegment.optional(),
  extension: z.string().regex(/^\.[\w.+-]+$/).optional(),
  previewDirectory: z.string().min(1).regex(/^[^/\\]+$/).optional(),
})

const regionCode = z.string().regex(/^[A-Za-z]{2,3}([-_][A-Za-z0-9]+)*$/, 'Invalid region code')

/**
 * Localization configuration schema
 */
export const LocalizationSectionSchema = z.object({
  developmentRegion: regionCode.default('en'),
  regions: z.array(regionCode).min(1).default(['en']),
})

/**
 * Localization configuration schema without defaults
 */
export const LocalizationSectionSchemaPartial = z.object({
  developmentRegion: regionCode.optional(),
  regions: z.array(regionCode).min(1).optional(),
})

/**
 * Output configuration schema
 */
export const OutputSectionSchema = z.object({
  path: relativeSegment.optional(),
})

/**
 * Complete pbxforge configuration schema
 */
export const ProjectConfigSchema = z.object({
  project: ProjectSectionSchema,
  sources: SourcesSectionSchema,
  localization: LocalizationSectionSchema,
  output: OutputSectionSchema,
})

/**
 * Partial pbxforge configuration schema without defaults
 */
export const PartialProjectConfigSchema = z.object({
  project: ProjectSectionSchemaPartial.optional(),
  sources: SourcesSectionSchemaPartial.optional(),
  localization: LocalizationSectionSchemaPartial.optional(),
  output: OutputSectionSchema.optional(),
})

// ============================================================================
// TypeScript Types (inferred from Zod schemas)
// ============================================================================

/**
 * Target and Info.plist settings
 */
export type ProjectSection = z.infer<typeof ProjectSectionSchema>

/**
 * Where source files are discovered
 *
 * `previewDirectory` holds development-only assets: it is never compiled,
 * and becomes the preview group of the generated project.
 */
export type SourcesSection = z.infer<typeof SourcesSectionSchema>

export type LocalizationSection = z.infer<typeof LocalizationSectionSchema>

/**
 * Manifest location, relative to the base directory
 * @default '<project.name>.xcodeproj/project.pbxproj'
 */
export type OutputSection = z.infer<typeof OutputSectionSchema>

/**
 * Complete pbxforge configuration
 */
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>

/**
 * Partial configuration (used for merging)
 */
export type PartialProjectConfig = z.infer<typeof PartialProjectConfigSchema>

export type ConfigSectionName = keyof ProjectConfig

export const CONFIG_SECTIONS: readonly ConfigSectionName[] = [
  'project',
  'sources',
  'localization',
  'output',
]

// ============================================================================
// Configuration Source Types
// ============================================================================

/**
 * Where a configuration value came from
 */
export enum ConfigSource {
  ENV_VARS = 'env_vars',
  PBXFORGE_TOML = 'pbxforge_toml',
  PACKAGE_JSON = 'package_json',
  GLOBAL_CONFIG = 'global_config',
  DEFAULT = 'default',
}

/**
 * Configuration with source tracking
 * Used by `config show --sources`
 */
export interface ConfigWithSource {
  config: ProjectConfig
  sources: Record<string, ConfigSource>
}

/**
 * A discovered configuration file
 */
export interface ConfigFile {
  path: string
  source: ConfigSource
  priority: number
  exists: boolean
}

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 *
 * Used when no configuration files are found
 */
export const DEFAULT_CONFIG: ProjectConfig = ProjectConfigSchema.parse({
  project: {},
  sources: {},
  localization: {},
  output: {},
})

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration against schema
 *
 * Also checks cross-field rules the section schemas cannot express.
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): ProjectConfig {
  return ProjectConfigSchema.superRefine((value, ctx) => {
    if (value.sources.directory.split(/[\\/]/).includes(value.sources.previewDirectory)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sources', 'previewDirectory'],
        message: 'The preview directory cannot be part of the source directory path',
      })
    }
  }).parse(config)
}

/**
 * Validate partial configuration (for merging)
 */
export function validatePartialConfig(config: unknown): PartialProjectConfig {
  return PartialProjectConfigSchema.parse(config)
}

/**
 * Manifest path relative to the base directory
 */
export function resolveOutputPath(config: ProjectConfig): string {
  return config.output.path ?? `${config.project.name}.xcodeproj/project.pbxproj`
}

/**
 * Check if value is a valid ProjectConfig
 */
export function isProjectConfig(value: unknown): value is ProjectConfig {
  return ProjectConfigSchema.safeParse(value).success
}

import fs from 'fs-extra'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type { ProjectConfig } from '../config/schema.js'
import { compareCodePoints } from './pbx.js'

/**
 * Build settings
 *
 * Static settings ship in data/build-settings.json; values that depend on
 * the project configuration are overlaid here.
 */

export type BuildSettingValue = string | string[]

export type BuildSettings = Record<string, BuildSettingValue>

export type ConfigurationVariant = 'Debug' | 'Release'

const BuildSettingsSchema = z.record(z.string().regex(/^\w+$/), z.union([z.string(), z.array(z.string())]))

const VariantSettingsSchema = z.object({
  shared: BuildSettingsSchema,
  debug: BuildSettingsSchema,
  release: BuildSettingsSchema,
})

export const BuildSettingsTemplateSchema = z.object({
  project: VariantSettingsSchema,
  target: VariantSettingsSchema,
})

export type BuildSettingsTemplate = z.infer<typeof BuildSettingsTemplateSchema>

export const DEFAULT_BUILD_SETTINGS_PATH = fileURLToPath(
  new URL('../../data/build-settings.json', import.meta.url)
)

/**
 * Read and validate a build settings template
 */
export async function loadBuildSettingsTemplate(
  filePath: string = DEFAULT_BUILD_SETTINGS_PATH
): Promise<BuildSettingsTemplate> {
  return BuildSettingsTemplateSchema.parse(await fs.readJson(filePath))
}

/**
 * Copy of the settings with keys in code-point order, as Xcode writes them
 */
export function sortSettings(settings: BuildSettings): BuildSettings {
  return Object.fromEntries(
    Object.entries(settings).sort(([a], [b]) => compareCodePoints(a, b))
  )
}

function pick(variants: z.infer<typeof VariantSettingsSchema>, variant: ConfigurationVariant): BuildSettings {
  return { ...variants.shared, ...(variant === 'Debug' ? variants.debug : variants.release) }
}

export function projectBuildSettings(
  template: BuildSettingsTemplate,
  config: ProjectConfig,
  variant: ConfigurationVariant
): BuildSettings {
  return sortSettings({
    ...pick(template.project, variant),
    IPHONEOS_DEPLOYMENT_TARGET: config.project.deploymentTarget,
  })
}

export function targetBuildSettings(
  template: BuildSettingsTemplate,
  config: ProjectConfig,
  variant: ConfigurationVariant
): BuildSettings {
  const { project, sources } = config
  const usageKeys = Object.fromEntries(
    Object.entries(project.usageDescriptions).map(([key, text]) => [`INFOPLIST_KEY_${key}`, text])
  )

  return sortSettings({
    ...pick(template.target, variant),
    ...usageKeys,
    CURRENT_PROJECT_VERSION: project.currentProjectVersion,
    DEVELOPMENT_ASSET_PATHS: `"${sources.directory}/${sources.previewDirectory}"`,
    INFOPLIST_FILE: `${sources.directory}/Info.plist`,
    INFOPLIST_KEY_CFBundleDisplayName: project.displayName ?? project.name,
    INFOPLIST_KEY_LSApplicationCategoryType: project.category,
    MARKETING_VERSION: project.marketingVersion,
    PRODUCT_BUNDLE_IDENTIFIER: project.bundleIdentifier,
    SWIFT_VERSION: project.swiftVersion,
  })
}

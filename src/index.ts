/**
 * pbxforge - deterministic Xcode project manifest generator
 *
 * Main entry point and exports for programmatic usage.
 */

export { run } from '@oclif/core'

export { ConfigError, loadConfig, loadConfigWithSources } from './config/loader.js'
export type { LoadConfigOptions } from './config/loader.js'
export { DEFAULT_CONFIG, ProjectConfigSchema, resolveOutputPath } from './config/schema.js'
export type { PartialProjectConfig, ProjectConfig } from './config/schema.js'
export { DiscoveryError, discoverSourceFiles } from './manifest/discovery.js'
export type { SourceFile } from './manifest/discovery.js'
export { generateProject, isProjectUpToDate, writeProject } from './manifest/generator.js'
export type { GeneratedProject, GenerateOptions } from './manifest/generator.js'
export { IdentifierCollisionError, STRUCTURAL_IDS, deriveIdentifier } from './manifest/identifiers.js'
export { ManifestWriteError, writeFileAtomic } from './utils/fileOps.js'

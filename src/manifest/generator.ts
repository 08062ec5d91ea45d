import * as path from 'path'
import type { ProjectConfig } from '../config/schema.js'
import { resolveOutputPath } from '../config/schema.js'
import { readFileIfExists, writeFileAtomic } from '../utils/fileOps.js'
import { buildManifest, createSourceEntries } from './builder.js'
import type { SourceFile } from './discovery.js'
import { discoverSourceFiles } from './discovery.js'
import type { StructuralIds } from './identifiers.js'
import { STRUCTURAL_IDS } from './identifiers.js'
import { renderManifest } from './render.js'
import type { BuildSettingsTemplate } from './settings.js'
import { loadBuildSettingsTemplate } from './settings.js'

/**
 * Project generation pipeline
 *
 * discover -> build records -> render -> write. Nothing is written until the
 * whole manifest has been rendered.
 */

export interface GenerateOptions {
  baseDir: string
  config: ProjectConfig
  /** Defaults to data/build-settings.json */
  buildSettings?: BuildSettingsTemplate
  ids?: StructuralIds
}

export interface GeneratedProject {
  files: SourceFile[]
  contents: string
  /** Absolute path of the manifest */
  outputPath: string
}

/**
 * Discover sources and render the manifest without touching the output
 *
 * @throws {DiscoveryError} If the base or source directory cannot be read
 * @throws {IdentifierCollisionError} If two objects derive the same identifier
 */
export async function generateProject(options: GenerateOptions): Promise<GeneratedProject> {
  const { baseDir, config } = options
  const files = await discoverSourceFiles(baseDir, config.sources)
  const buildSettings = options.buildSettings ?? (await loadBuildSettingsTemplate())

  const manifest = buildManifest({
    entries: createSourceEntries(files),
    ids: options.ids ?? STRUCTURAL_IDS,
    config,
    buildSettings,
  })

  return {
    files,
    contents: renderManifest(manifest),
    outputPath: path.resolve(baseDir, resolveOutputPath(config)),
  }
}

/**
 * Replace the manifest on disk
 *
 * @throws {ManifestWriteError} If the manifest cannot be written
 */
export async function writeProject(
  project: GeneratedProject,
  onWarning?: (message: string) => void
): Promise<void> {
  await writeFileAtomic(project.outputPath, project.contents, { onWarning })
}

/**
 * Whether the manifest on disk matches the generated contents
 */
export async function isProjectUpToDate(project: GeneratedProject): Promise<boolean> {
  return (await readFileIfExists(project.outputPath)) === project.contents
}

import type { Identifier } from './identifiers.js'
import type { BuildSettings, ConfigurationVariant } from './settings.js'
import type { SourceFile } from './discovery.js'

/**
 * Manifest records
 *
 * One record type per project.pbxproj section. The builder produces them
 * in output order; the renderer has one formatter per section.
 */

export type SourceTree = '<group>' | 'SOURCE_ROOT' | 'BUILT_PRODUCTS_DIR'

/** An identifier as it appears in a list or value: with its label comment */
export interface ObjectRef {
  id: Identifier
  label?: string
}

/**
 * A discovered file with both of its identifiers
 *
 * The only input for the four per-file lists (build files, file
 * references, source group children, sources phase files).
 */
export interface SourceEntry {
  file: SourceFile
  fileReferenceId: Identifier
  buildFileId: Identifier
}

export interface BuildFileRecord {
  id: Identifier
  fileRef: ObjectRef
  /** Name of the phase that consumes it, part of the label */
  phase: 'Sources' | 'Resources'
}

export interface FileReferenceRecord {
  id: Identifier
  label: string
  explicitFileType?: string
  includeInIndex?: number
  lastKnownFileType?: string
  name?: string
  path: string
  sourceTree: SourceTree
}

export interface GroupRecord {
  id: Identifier
  /** The main group has no label */
  label?: string
  children: ObjectRef[]
  name?: string
  path?: string
  sourceTree: SourceTree
}

export interface VariantGroupRecord {
  id: Identifier
  name: string
  children: ObjectRef[]
  sourceTree: SourceTree
}

export type BuildPhaseIsa = 'PBXFrameworksBuildPhase' | 'PBXResourcesBuildPhase' | 'PBXSourcesBuildPhase'

export interface BuildPhaseRecord {
  isa: BuildPhaseIsa
  id: Identifier
  label: string
  files: ObjectRef[]
}

export interface NativeTargetRecord {
  id: Identifier
  name: string
  buildConfigurationList: ObjectRef
  buildPhases: ObjectRef[]
  productName: string
  productReference: ObjectRef
  productType: string
}

export interface ProjectRecord {
  id: Identifier
  buildConfigurationList: ObjectRef
  compatibilityVersion: string
  developmentRegion: string
  knownRegions: string[]
  mainGroup: ObjectRef
  productRefGroup: ObjectRef
  targets: ObjectRef[]
  /** Xcode version stamps, e.g. 1500 */
  lastUpgradeCheck: number
  createdOnToolsVersion: string
}

export interface BuildConfigurationRecord {
  id: Identifier
  name: ConfigurationVariant
  buildSettings: BuildSettings
}

export interface ConfigurationListRecord {
  id: Identifier
  label: string
  buildConfigurations: ObjectRef[]
  defaultConfigurationName: ConfigurationVariant
}

/**
 * A complete project, section by section in output order
 */
export interface Manifest {
  archiveVersion: number
  objectVersion: number
  buildFiles: BuildFileRecord[]
  fileReferences: FileReferenceRecord[]
  frameworksPhases: BuildPhaseRecord[]
  groups: GroupRecord[]
  variantGroups: VariantGroupRecord[]
  nativeTargets: NativeTargetRecord[]
  projects: ProjectRecord[]
  resourcesPhases: BuildPhaseRecord[]
  sourcesPhases: BuildPhaseRecord[]
  buildConfigurations: BuildConfigurationRecord[]
  configurationLists: ConfigurationListRecord[]
  rootObject: ObjectRef
}

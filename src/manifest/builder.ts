import type { ProjectConfig } from '../config/schema.js'
import type { SourceFile } from './discovery.js'
import type { Identifier, StructuralIds } from './identifiers.js'
import { assertUniqueIdentifiers, buildFileId, fileReferenceId, regionReferenceId } from './identifiers.js'
import type { BuildSettingsTemplate } from './settings.js'
import { projectBuildSettings, targetBuildSettings } from './settings.js'
import type {
  BuildFileRecord,
  BuildPhaseRecord,
  FileReferenceRecord,
  Manifest,
  ObjectRef,
  SourceEntry,
} from './types.js'

/**
 * Manifest builder
 *
 * Turns discovered files and the project configuration into typed
 * records. Every per-file list is mapped from the same `SourceEntry[]`,
 * so the build files, file references, source group children and
 * sources phase always describe the same files in the same order.
 */

const ASSET_CATALOG = 'Assets.xcassets'
const PREVIEW_ASSET_CATALOG = 'Preview Assets.xcassets'
const LOCALIZABLE_STRINGS = 'Localizable.strings'
const INFO_PLIST = 'Info.plist'

const PROJECT_FORMAT = {
  archiveVersion: 1,
  objectVersion: 56,
  compatibilityVersion: 'Xcode 14.0',
  lastUpgradeCheck: 1500,
  createdOnToolsVersion: '15.0',
} as const

/**
 * File types Xcode assigns by extension; anything else is plain text
 */
const FILE_TYPES: Record<string, string> = {
  '.swift': 'sourcecode.swift',
  '.m': 'sourcecode.c.objc',
  '.mm': 'sourcecode.cpp.objcpp',
  '.c': 'sourcecode.c.c',
  '.cpp': 'sourcecode.cpp.cpp',
  '.h': 'sourcecode.c.h',
  '.metal': 'sourcecode.metal',
}

export function fileTypeForExtension(extension: string): string {
  return FILE_TYPES[extension.toLowerCase()] ?? 'text'
}

export interface BuildManifestInput {
  entries: SourceEntry[]
  ids: StructuralIds
  config: ProjectConfig
  buildSettings: BuildSettingsTemplate
}

/**
 * Attach both derived identifiers to each file, keeping the order
 */
export function createSourceEntries(files: readonly SourceFile[]): SourceEntry[] {
  return files.map((file) => ({
    file,
    fileReferenceId: fileReferenceId(file.relativePath),
    buildFileId: buildFileId(file.relativePath),
  }))
}

/**
 * Regions in configured order, development region included, no duplicates
 */
export function localizationRegions(config: ProjectConfig): string[] {
  const { developmentRegion, regions } = config.localization
  return [...new Set(regions.includes(developmentRegion) ? regions : [developmentRegion, ...regions])]
}

/**
 * Regions Xcode knows about: development region, Base, then the rest
 */
export function knownRegions(config: ProjectConfig): string[] {
  const { developmentRegion } = config.localization
  return [...new Set([developmentRegion, 'Base', ...localizationRegions(config)])]
}

function ref(id: Identifier, label?: string): ObjectRef {
  return label === undefined ? { id } : { id, label }
}

/**
 * Build the manifest records
 *
 * @throws {IdentifierCollisionError} If two objects derive the same identifier
 */
export function buildManifest({ entries, ids, config, buildSettings }: BuildManifestInput): Manifest {
  const { project, sources } = config
  const productName = `${project.name}.app`
  const fileType = fileTypeForExtension(sources.extension)
  const regions = localizationRegions(config)

  const sourceBuildFiles: BuildFileRecord[] = entries.map((entry) => ({
    id: entry.buildFileId,
    fileRef: ref(entry.fileReferenceId, entry.file.name),
    phase: 'Sources',
  }))
  const sourceFileReferences: FileReferenceRecord[] = entries.map((entry) => ({
    id: entry.fileReferenceId,
    label: entry.file.name,
    lastKnownFileType: fileType,
    path: entry.file.relativePath,
    sourceTree: '<group>',
  }))
  const sourceChildren = entries.map((entry) => ref(entry.fileReferenceId, entry.file.name))
  const sourcePhaseFiles = entries.map((entry) => ref(entry.buildFileId, `${entry.file.name} in Sources`))

  const resourceBuildFiles: BuildFileRecord[] = [
    { id: ids.assetsBuildFile, fileRef: ref(ids.assetsReference, ASSET_CATALOG), phase: 'Resources' },
    {
      id: ids.previewAssetsBuildFile,
      fileRef: ref(ids.previewAssetsReference, PREVIEW_ASSET_CATALOG),
      phase: 'Resources',
    },
    {
      id: ids.localizableBuildFile,
      fileRef: ref(ids.localizableVariantGroup, LOCALIZABLE_STRINGS),
      phase: 'Resources',
    },
  ]

  const fileReferences: FileReferenceRecord[] = [
    ...sourceFileReferences,
    {
      id: ids.productReference,
      label: productName,
      explicitFileType: 'wrapper.application',
      includeInIndex: 0,
      path: productName,
      sourceTree: 'BUILT_PRODUCTS_DIR',
    },
    {
      id: ids.assetsReference,
      label: ASSET_CATALOG,
      lastKnownFileType: 'folder.assetcatalog',
      path: ASSET_CATALOG,
      sourceTree: '<group>',
    },
    {
      id: ids.previewAssetsReference,
      label: PREVIEW_ASSET_CATALOG,
      lastKnownFileType: 'folder.assetcatalog',
      path: PREVIEW_ASSET_CATALOG,
      sourceTree: '<group>',
    },
    {
      id: ids.infoPlistReference,
      label: INFO_PLIST,
      lastKnownFileType: 'text.plist.xml',
      path: INFO_PLIST,
      sourceTree: '<group>',
    },
    ...regions.map(
      (region): FileReferenceRecord => ({
        id: regionReferenceId(region),
        label: region,
        lastKnownFileType: 'text.plist.strings',
        name: region,
        path: `${region}.lproj/${LOCALIZABLE_STRINGS}`,
        sourceTree: '<group>',
      })
    ),
  ]

  const phase = (isa: BuildPhaseRecord['isa'], id: Identifier, label: string, files: ObjectRef[]): BuildPhaseRecord => ({
    isa,
    id,
    label,
    files,
  })

  const projectListLabel = `Build configuration list for PBXProject "${project.name}"`
  const targetListLabel = `Build configuration list for PBXNativeTarget "${project.name}"`

  const manifest: Manifest = {
    archiveVersion: PROJECT_FORMAT.archiveVersion,
    objectVersion: PROJECT_FORMAT.objectVersion,
    buildFiles: [...sourceBuildFiles, ...resourceBuildFiles],
    fileReferences,
    frameworksPhases: [phase('PBXFrameworksBuildPhase', ids.frameworksPhase, 'Frameworks', [])],
    groups: [
      {
        id: ids.mainGroup,
        children: [ref(ids.sourceGroup, project.name), ref(ids.productsGroup, 'Products')],
        sourceTree: '<group>',
      },
      {
        id: ids.productsGroup,
        label: 'Products',
        children: [ref(ids.productReference, productName)],
        name: 'Products',
        sourceTree: '<group>',
      },
      {
        id: ids.sourceGroup,
        label: project.name,
        children: [
          ...sourceChildren,
          ref(ids.infoPlistReference, INFO_PLIST),
          ref(ids.assetsReference, ASSET_CATALOG),
          ref(ids.resourcesGroup, 'Resources'),
          ref(ids.previewGroup, sources.previewDirectory),
        ],
        path: sources.directory,
        sourceTree: '<group>',
      },
      {
        id: ids.resourcesGroup,
        label: 'Resources',
        children: [ref(ids.localizableVariantGroup, LOCALIZABLE_STRINGS)],
        path: 'Resources',
        sourceTree: '<group>',
      },
      {
        id: ids.previewGroup,
        label: sources.previewDirectory,
        children: [ref(ids.previewAssetsReference, PREVIEW_ASSET_CATALOG)],
        path: sources.previewDirectory,
        sourceTree: '<group>',
      },
    ],
    variantGroups: [
      {
        id: ids.localizableVariantGroup,
        name: LOCALIZABLE_STRINGS,
        children: regions.map((region) => ref(regionReferenceId(region), region)),
        sourceTree: '<group>',
      },
    ],
    nativeTargets: [
      {
        id: ids.target,
        name: project.name,
        buildConfigurationList: ref(ids.targetConfigurationList, targetListLabel),
        buildPhases: [
          ref(ids.sourcesPhase, 'Sources'),
          ref(ids.frameworksPhase, 'Frameworks'),
          ref(ids.resourcesPhase, 'Resources'),
        ],
        productName: project.name,
        productReference: ref(ids.productReference, productName),
        productType: 'com.apple.product-type.application',
      },
    ],
    projects: [
      {
        id: ids.project,
        buildConfigurationList: ref(ids.projectConfigurationList, projectListLabel),
        compatibilityVersion: PROJECT_FORMAT.compatibilityVersion,
        developmentRegion: config.localization.developmentRegion,
        knownRegions: knownRegions(config),
        mainGroup: ref(ids.mainGroup),
        productRefGroup: ref(ids.productsGroup, 'Products'),
        targets: [ref(ids.target, project.name)],
        lastUpgradeCheck: PROJECT_FORMAT.lastUpgradeCheck,
        createdOnToolsVersion: PROJECT_FORMAT.createdOnToolsVersion,
      },
    ],
    resourcesPhases: [
      phase('PBXResourcesBuildPhase', ids.resourcesPhase, 'Resources', [
        ref(ids.previewAssetsBuildFile, `${PREVIEW_ASSET_CATALOG} in Resources`),
        ref(ids.assetsBuildFile, `${ASSET_CATALOG} in Resources`),
        ref(ids.localizableBuildFile, `${LOCALIZABLE_STRINGS} in Resources`),
      ]),
    ],
    sourcesPhases: [phase('PBXSourcesBuildPhase', ids.sourcesPhase, 'Sources', sourcePhaseFiles)],
    buildConfigurations: [
      {
        id: ids.projectDebugConfiguration,
        name: 'Debug',
        buildSettings: projectBuildSettings(buildSettings, config, 'Debug'),
      },
      {
        id: ids.projectReleaseConfiguration,
        name: 'Release',
        buildSettings: projectBuildSettings(buildSettings, config, 'Release'),
      },
      {
        id: ids.targetDebugConfiguration,
        name: 'Debug',
        buildSettings: targetBuildSettings(buildSettings, config, 'Debug'),
      },
      {
        id: ids.targetReleaseConfiguration,
        name: 'Release',
        buildSettings: targetBuildSettings(buildSettings, config, 'Release'),
      },
    ],
    configurationLists: [
      {
        id: ids.projectConfigurationList,
        label: projectListLabel,
        buildConfigurations: [
          ref(ids.projectDebugConfiguration, 'Debug'),
          ref(ids.projectReleaseConfiguration, 'Release'),
        ],
        defaultConfigurationName: 'Release',
      },
      {
        id: ids.targetConfigurationList,
        label: targetListLabel,
        buildConfigurations: [
          ref(ids.targetDebugConfiguration, 'Debug'),
          ref(ids.targetReleaseConfiguration, 'Release'),
        ],
        defaultConfigurationName: 'Release',
      },
    ],
    rootObject: ref(ids.project, 'Project object'),
  }

  assertUniqueIdentifiers(collectOwners(manifest))
  return manifest
}

/**
 * Every defined object with a description of what defines it
 */
function* collectOwners(manifest: Manifest): Generator<[Identifier, string]> {
  for (const record of manifest.buildFiles) yield [record.id, `build file for ${record.fileRef.id}`]
  for (const record of manifest.fileReferences) yield [record.id, `file reference ${record.path}`]
  for (const record of manifest.groups) yield [record.id, `group ${record.label ?? '(main)'}`]
  for (const record of manifest.variantGroups) yield [record.id, `variant group ${record.name}`]
  for (const record of manifest.nativeTargets) yield [record.id, `target ${record.name}`]
  for (const record of manifest.projects) yield [record.id, 'project']
  for (const record of [...manifest.frameworksPhases, ...manifest.resourcesPhases, ...manifest.sourcesPhases]) {
    yield [record.id, `${record.label} phase`]
  }
  for (const record of manifest.buildConfigurations) yield [record.id, `configuration ${record.id}`]
  for (const record of manifest.configurationLists) yield [record.id, record.label]
}

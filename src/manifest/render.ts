import type { PbxField } from './pbx.js'
import { atom, dict, list, quote, reference, renderField, renderInlineObject, renderObject, str } from './pbx.js'
import type { BuildSettings } from './settings.js'
import type {
  BuildConfigurationRecord,
  BuildFileRecord,
  BuildPhaseRecord,
  ConfigurationListRecord,
  FileReferenceRecord,
  GroupRecord,
  Manifest,
  NativeTargetRecord,
  ObjectRef,
  ProjectRecord,
  VariantGroupRecord,
} from './types.js'

/**
 * project.pbxproj renderer
 *
 * One formatter per section; each turns a record into its lines.
 */

const HEADER = '// !$*UTF8*$!'

/** Xcode's mask for "all build actions" */
const BUILD_ACTION_MASK = '2147483647'

function refText(value: ObjectRef): string {
  return reference(value.id, value.label)
}

function refs(values: ObjectRef[]): string[] {
  return values.map(refText)
}

function settingsDict(settings: BuildSettings): PbxField[] {
  return Object.entries(settings).map(([key, value]): PbxField => [
    key,
    Array.isArray(value) ? list(value.map(quote)) : str(value),
  ])
}

export function formatBuildFile(record: BuildFileRecord): string[] {
  const name = record.fileRef.label ?? record.fileRef.id
  return [
    renderInlineObject(reference(record.id, `${name} in ${record.phase}`), [
      ['isa', 'PBXBuildFile'],
      ['fileRef', refText(record.fileRef)],
    ]),
  ]
}

export function formatFileReference(record: FileReferenceRecord): string[] {
  const fields: Array<[string, string]> = [['isa', 'PBXFileReference']]
  if (record.explicitFileType !== undefined) fields.push(['explicitFileType', quote(record.explicitFileType)])
  if (record.includeInIndex !== undefined) fields.push(['includeInIndex', String(record.includeInIndex)])
  if (record.lastKnownFileType !== undefined) fields.push(['lastKnownFileType', quote(record.lastKnownFileType)])
  if (record.name !== undefined) fields.push(['name', quote(record.name)])
  fields.push(['path', quote(record.path)], ['sourceTree', quote(record.sourceTree)])

  return [renderInlineObject(reference(record.id, record.label), fields)]
}

export function formatBuildPhase(record: BuildPhaseRecord): string[] {
  return renderObject(reference(record.id, record.label), [
    ['isa', atom(record.isa)],
    ['buildActionMask', atom(BUILD_ACTION_MASK)],
    ['files', list(refs(record.files))],
    ['runOnlyForDeploymentPostprocessing', atom('0')],
  ])
}

export function formatGroup(record: GroupRecord): string[] {
  const fields: PbxField[] = [
    ['isa', atom('PBXGroup')],
    ['children', list(refs(record.children))],
  ]
  if (record.name !== undefined) fields.push(['name', str(record.name)])
  if (record.path !== undefined) fields.push(['path', str(record.path)])
  fields.push(['sourceTree', str(record.sourceTree)])

  return renderObject(reference(record.id, record.label), fields)
}

export function formatVariantGroup(record: VariantGroupRecord): string[] {
  return renderObject(reference(record.id, record.name), [
    ['isa', atom('PBXVariantGroup')],
    ['children', list(refs(record.children))],
    ['name', str(record.name)],
    ['sourceTree', str(record.sourceTree)],
  ])
}

export function formatNativeTarget(record: NativeTargetRecord): string[] {
  return renderObject(reference(record.id, record.name), [
    ['isa', atom('PBXNativeTarget')],
    ['buildConfigurationList', atom(refText(record.buildConfigurationList))],
    ['buildPhases', list(refs(record.buildPhases))],
    ['buildRules', list([])],
    ['dependencies', list([])],
    ['name', str(record.name)],
    ['productName', str(record.productName)],
    ['productReference', atom(refText(record.productReference))],
    ['productType', str(record.productType)],
  ])
}

export function formatProject(record: ProjectRecord): string[] {
  const targetAttributes = record.targets.map(
    (target): PbxField => [target.id, dict([['CreatedOnToolsVersion', str(record.createdOnToolsVersion)]])]
  )

  return renderObject(reference(record.id, 'Project object'), [
    ['isa', atom('PBXProject')],
    [
      'attributes',
      dict([
        ['BuildIndependentTargetsInParallel', atom('1')],
        ['LastSwiftUpdateCheck', atom(String(record.lastUpgradeCheck))],
        ['LastUpgradeCheck', atom(String(record.lastUpgradeCheck))],
        ['TargetAttributes', dict(targetAttributes)],
      ]),
    ],
    ['buildConfigurationList', atom(refText(record.buildConfigurationList))],
    ['compatibilityVersion', str(record.compatibilityVersion)],
    ['developmentRegion', str(record.developmentRegion)],
    ['hasScannedForEncodings', atom('0')],
    ['knownRegions', list(record.knownRegions.map(quote))],
    ['mainGroup', atom(refText(record.mainGroup))],
    ['productRefGroup', atom(refText(record.productRefGroup))],
    ['projectDirPath', str('')],
    ['projectRoot', str('')],
    ['targets', list(refs(record.targets))],
  ])
}

export function formatBuildConfiguration(record: BuildConfigurationRecord): string[] {
  return renderObject(reference(record.id, record.name), [
    ['isa', atom('XCBuildConfiguration')],
    ['buildSettings', dict(settingsDict(record.buildSettings))],
    ['name', str(record.name)],
  ])
}

export function formatConfigurationList(record: ConfigurationListRecord): string[] {
  return renderObject(reference(record.id, record.label), [
    ['isa', atom('XCConfigurationList')],
    ['buildConfigurations', list(refs(record.buildConfigurations))],
    ['defaultConfigurationIsVisible', atom('0')],
    ['defaultConfigurationName', str(record.defaultConfigurationName)],
  ])
}

function section<T>(name: string, records: T[], format: (record: T) => string[]): string[] {
  return [
    '',
    `/* Begin ${name} section */`,
    ...records.flatMap(format),
    `/* End ${name} section */`,
  ]
}

/**
 * Render the whole manifest
 *
 * @returns File contents, ending with a newline
 */
export function renderManifest(manifest: Manifest): string {
  const objects = [
    ...section('PBXBuildFile', manifest.buildFiles, formatBuildFile),
    ...section('PBXFileReference', manifest.fileReferences, formatFileReference),
    ...section('PBXFrameworksBuildPhase', manifest.frameworksPhases, formatBuildPhase),
    ...section('PBXGroup', manifest.groups, formatGroup),
    ...section('PBXVariantGroup', manifest.variantGroups, formatVariantGroup),
    ...section('PBXNativeTarget', manifest.nativeTargets, formatNativeTarget),
    ...section('PBXProject', manifest.projects, formatProject),
    ...section('PBXResourcesBuildPhase', manifest.resourcesPhases, formatBuildPhase),
    ...section('PBXSourcesBuildPhase', manifest.sourcesPhases, formatBuildPhase),
    ...section('XCBuildConfiguration', manifest.buildConfigurations, formatBuildConfiguration),
    ...section('XCConfigurationList', manifest.configurationLists, formatConfigurationList),
  ]

  const lines = [
    HEADER,
    '{',
    ...renderField(['archiveVersion', atom(String(manifest.archiveVersion))], 1),
    ...renderField(['classes', dict([])], 1),
    ...renderField(['objectVersion', atom(String(manifest.objectVersion))], 1),
    '\tobjects = {',
    ...objects,
    '\t};',
    ...renderField(['rootObject', atom(refText(manifest.rootObject))], 1),
    '}',
  ]
  return `${lines.join('\n')}\n`
}

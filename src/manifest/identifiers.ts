import { createHash } from 'crypto'

/**
 * Object identifiers
 *
 * Every object in a project.pbxproj is keyed by a 24-character uppercase
 * hex identifier. Identifiers for discovered files are derived from their
 * relative path so that regenerating an unchanged tree gives a
 * byte-identical manifest.
 *
 * Derived identifiers are the first 96 bits of an MD5 digest. A collision
 * is possible in principle; {@link assertUniqueIdentifiers} turns one into
 * an error instead of a corrupt project.
 */

/** 24 uppercase hex characters */
export type Identifier = string

export const IDENTIFIER_LENGTH = 24

const IDENTIFIER_PATTERN = /^[0-9A-F]{24}$/

/**
 * Error thrown when two distinct objects derive the same identifier
 */
export class IdentifierCollisionError extends Error {
  constructor(
    public readonly identifier: Identifier,
    public readonly owners: [string, string]
  ) {
    super(`Identifier ${identifier} is shared by "${owners[0]}" and "${owners[1]}"`)
    this.name = 'IdentifierCollisionError'
  }
}

/**
 * Derive an identifier from a namespaced key
 *
 * @example
 * deriveIdentifier('fileref_App/Main.swift')
 */
export function deriveIdentifier(key: string): Identifier {
  return createHash('md5')
    .update(key, 'utf8')
    .digest('hex')
    .slice(0, IDENTIFIER_LENGTH)
    .toUpperCase()
}

export function fileReferenceId(relativePath: string): Identifier {
  return deriveIdentifier(`fileref_${relativePath}`)
}

export function buildFileId(relativePath: string): Identifier {
  return deriveIdentifier(`buildfile_${relativePath}`)
}

/**
 * Identifier of a region's file inside the localization variant group
 */
export function regionReferenceId(region: string): Identifier {
  return deriveIdentifier(`region_${region}`)
}

export function isIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value)
}

/**
 * Structural objects that do not depend on discovered files
 */
export interface StructuralIds {
  project: Identifier
  mainGroup: Identifier
  productsGroup: Identifier
  sourceGroup: Identifier
  productReference: Identifier
  target: Identifier
  assetsReference: Identifier
  assetsBuildFile: Identifier
  previewAssetsReference: Identifier
  previewAssetsBuildFile: Identifier
  infoPlistReference: Identifier
  previewGroup: Identifier
  resourcesGroup: Identifier
  localizableVariantGroup: Identifier
  localizableBuildFile: Identifier
  projectDebugConfiguration: Identifier
  projectReleaseConfiguration: Identifier
  targetDebugConfiguration: Identifier
  targetReleaseConfiguration: Identifier
  projectConfigurationList: Identifier
  targetConfigurationList: Identifier
  sourcesPhase: Identifier
  frameworksPhase: Identifier
  resourcesPhase: Identifier
}

/**
 * Hand-picked identifiers for the fixed project skeleton
 *
 * The E1 prefix keeps them visually apart from derived identifiers.
 */
export const STRUCTURAL_IDS: Readonly<StructuralIds> = Object.freeze({
  assetsBuildFile: 'E1000003282F000300000000',
  assetsReference: 'E1000004282F000400000000',
  previewAssetsBuildFile: 'E1000005282F000500000000',
  previewAssetsReference: 'E1000006282F000600000000',
  productReference: 'E1000007282F000700000000',
  infoPlistReference: 'E1000008282F000800000000',
  frameworksPhase: 'E1000009282F000900000000',
  mainGroup: 'E100000A282F000A00000000',
  sourceGroup: 'E100000B282F000B00000000',
  productsGroup: 'E100000C282F000C00000000',
  previewGroup: 'E100000D282F000D00000000',
  target: 'E100000E282F000E00000000',
  targetConfigurationList: 'E100000F282F000F00000000',
  sourcesPhase: 'E1000010282F001000000000',
  resourcesPhase: 'E1000011282F001100000000',
  project: 'E1000012282F001200000000',
  projectConfigurationList: 'E1000013282F001300000000',
  projectDebugConfiguration: 'E1000014282F001400000000',
  projectReleaseConfiguration: 'E1000015282F001500000000',
  targetDebugConfiguration: 'E1000016282F001600000000',
  targetReleaseConfiguration: 'E1000017282F001700000000',
  resourcesGroup: 'E100001A282F001A00000000',
  localizableVariantGroup: 'E100001B282F001B00000000',
  localizableBuildFile: 'E100001E282F001E00000000',
})

/**
 * Check that no identifier is used by two different owners
 *
 * @param entries - (identifier, owner description) pairs
 * @throws {IdentifierCollisionError} On the first shared identifier
 */
export function assertUniqueIdentifiers(entries: Iterable<[Identifier, string]>): void {
  const owners = new Map<Identifier, string>()
  for (const [identifier, owner] of entries) {
    const existing = owners.get(identifier)
    if (existing !== undefined && existing !== owner) {
      throw new IdentifierCollisionError(identifier, [existing, owner])
    }
    owners.set(identifier, owner)
  }
}

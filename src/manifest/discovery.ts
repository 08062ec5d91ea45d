import type { Stats } from 'fs'
import fs from 'fs-extra'
import { globby } from 'globby'
import type { GlobEntry } from 'globby'
import * as path from 'path'
import type { SourcesSection } from '../config/schema.js'
import { compareCodePoints } from './pbx.js'

/**
 * Source file discovery
 *
 * Walks `<baseDir>/<sources.directory>` for files with the configured
 * extension. The preview directory is pruned at every depth. Hidden entries
 * are included; symbolic links to directories are not followed.
 */

export interface SourceFile {
  /** File name, used as the label in the manifest */
  readonly name: string
  /** Path relative to the source directory, always `/`-separated */
  readonly relativePath: string
}

export type DiscoveryErrorKind = 'base-missing' | 'source-missing' | 'not-a-directory' | 'unreadable'

/**
 * Error thrown when the base or source directory cannot be scanned
 */
export class DiscoveryError extends Error {
  constructor(
    message: string,
    public readonly kind: DiscoveryErrorKind,
    public readonly directory: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'DiscoveryError'
  }
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error ? String(error.code) : undefined
}

async function assertDirectory(directory: string, missingKind: DiscoveryErrorKind, label: string): Promise<void> {
  let stats: Stats
  try {
    stats = await fs.stat(directory)
  } catch (error) {
    const code = errorCode(error)
    const cause = error instanceof Error ? error : undefined
    if (code === 'ENOENT') {
      throw new DiscoveryError(`${label} does not exist: ${directory}`, missingKind, directory, cause)
    }
    if (code === 'ENOTDIR') {
      throw new DiscoveryError(`${label} is not a directory: ${directory}`, 'not-a-directory', directory, cause)
    }
    throw new DiscoveryError(
      `${label} cannot be read: ${directory} (${code ?? 'unknown error'})`,
      'unreadable',
      directory,
      cause
    )
  }

  if (!stats.isDirectory()) {
    throw new DiscoveryError(`${label} is not a directory: ${directory}`, 'not-a-directory', directory)
  }
}

/**
 * Whether a symbolic link resolves to a directory; a dangling link does not
 */
async function isLinkedDirectory(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isDirectory()
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false
    }
    throw new DiscoveryError(
      `Source entry cannot be read: ${linkPath} (${errorCode(error) ?? 'unknown error'})`,
      'unreadable',
      linkPath,
      error instanceof Error ? error : undefined
    )
  }
}

/**
 * Escape glob metacharacters so a literal directory name can be used in a pattern
 */
export function escapeGlobSegment(segment: string): string {
  return segment.replace(/[\\*?[\]{}()!@+]/g, '\\$&')
}

/**
 * Discover source files
 *
 * @param baseDir - Project base directory
 * @param sources - Source directory, extension and preview directory
 * @returns Files sorted by relative path; empty when nothing matches
 * @throws {DiscoveryError} If the base or source directory is missing or unreadable
 */
export async function discoverSourceFiles(
  baseDir: string,
  sources: SourcesSection
): Promise<SourceFile[]> {
  const resolvedBase = path.resolve(baseDir)
  await assertDirectory(resolvedBase, 'base-missing', 'Base directory')

  const sourceRoot = path.resolve(resolvedBase, sources.directory)
  await assertDirectory(sourceRoot, 'source-missing', 'Source directory')

  let entries: GlobEntry[]
  try {
    entries = await globby('**/*', {
      cwd: sourceRoot,
      onlyFiles: false,
      dot: true,
      followSymbolicLinks: false,
      objectMode: true,
      ignore: [`**/${escapeGlobSegment(sources.previewDirectory)}/**`],
    })
  } catch (error) {
    throw new DiscoveryError(
      `Source directory cannot be read: ${sourceRoot}`,
      'unreadable',
      sourceRoot,
      error instanceof Error ? error : undefined
    )
  }

  const files: SourceFile[] = []
  for (const entry of entries) {
    const relativePath = entry.path
    if (!relativePath.endsWith(sources.extension) || relativePath.split('/').includes(sources.previewDirectory)) {
      continue
    }
    const isFile =
      entry.dirent.isFile() ||
      (entry.dirent.isSymbolicLink() && !(await isLinkedDirectory(path.join(sourceRoot, relativePath))))
    if (isFile) {
      files.push({ name: path.posix.basename(relativePath), relativePath })
    }
  }

  return files.sort((a, b) => compareCodePoints(a.relativePath, b.relativePath))
}

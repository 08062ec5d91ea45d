import fs from 'fs-extra'
import * as os from 'os'
import * as path from 'path'

/**
 * Temporary project trees for tests
 */

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'pbxforge-test-'))
}

/**
 * Write a tree of files under root
 *
 * Keys are `/`-separated relative paths; a key ending in `/` creates an
 * empty directory.
 */
export async function writeTree(root: string, entries: Record<string, string>): Promise<void> {
  for (const [relativePath, contents] of Object.entries(entries)) {
    const target = path.join(root, ...relativePath.split('/'))
    if (relativePath.endsWith('/')) {
      await fs.ensureDir(target)
    } else {
      await fs.outputFile(target, contents)
    }
  }
}

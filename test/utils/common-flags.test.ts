import { describe, it, expect } from 'vitest'
import * as path from 'path'
import { resolveBaseDir } from '../../src/utils/common-flags.js'

describe('resolveBaseDir', () => {
  const cwd = path.resolve('/work')

  it('prefers the argument', () => {
    expect(resolveBaseDir('app', { PBXFORGE_BASE_DIR: '/elsewhere' }, cwd)).toBe(path.join(cwd, 'app'))
  })

  it('falls back to PBXFORGE_BASE_DIR', () => {
    expect(resolveBaseDir(undefined, { PBXFORGE_BASE_DIR: 'env-app' }, cwd)).toBe(path.join(cwd, 'env-app'))
  })

  it('falls back to the current directory', () => {
    expect(resolveBaseDir(undefined, {}, cwd)).toBe(cwd)
  })
})

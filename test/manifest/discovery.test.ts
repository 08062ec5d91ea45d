import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import * as path from 'path'
import { DiscoveryError, discoverSourceFiles, escapeGlobSegment } from '../../src/manifest/discovery.js'
import type { SourcesSection } from '../../src/config/schema.js'
import { createTempDir, writeTree } from '../helpers/source-tree.js'

const SOURCES: SourcesSection = {
  directory: 'App',
  extension: '.swift',
  previewDirectory: 'Preview Content',
}

describe('discoverSourceFiles', () => {
  let baseDir: string

  beforeEach(async () => {
    baseDir = await createTempDir()
  })

  afterEach(async () => {
    await fs.remove(baseDir)
  })

  it('returns files relative to the source directory in code-point order', async () => {
    await writeTree(baseDir, {
      'App/b.swift': '',
      'App/a.swift': '',
      'App/a/c.swift': '',
    })

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files).toEqual([
      { name: 'a.swift', relativePath: 'a.swift' },
      { name: 'c.swift', relativePath: 'a/c.swift' },
      { name: 'b.swift', relativePath: 'b.swift' },
    ])
  })

  it('keeps only files with the configured extension', async () => {
    await writeTree(baseDir, {
      'App/Main.swift': '',
      'App/Info.plist': '',
      'App/Notes.swift.txt': '',
      'App/Assets.xcassets/Contents.json': '{}',
    })

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['Main.swift'])
  })

  it('excludes the preview directory at any depth', async () => {
    await writeTree(baseDir, {
      'App/Main.swift': '',
      'App/Preview Content/Sample.swift': '',
      'App/Feature/Preview Content/Deep.swift': '',
      'App/Feature/Screen.swift': '',
    })

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['Feature/Screen.swift', 'Main.swift'])
  })

  it('does not exclude files that merely share the preview directory name', async () => {
    await writeTree(baseDir, {
      'App/Preview Content.swift': '',
    })

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['Preview Content.swift'])
  })

  it('includes hidden files and directories', async () => {
    await writeTree(baseDir, {
      'App/Main.swift': '',
      'App/.Gen.swift': '',
      'App/.gen/Out.swift': '',
    })

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['.Gen.swift', '.gen/Out.swift', 'Main.swift'])
  })

  it('does not enter symlinked directories', async () => {
    await writeTree(baseDir, {
      'App/Main.swift': '',
      'Shared/Util.swift': '',
    })
    await fs.symlink('../Shared', path.join(baseDir, 'App', 'Linked'))

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['Main.swift'])
  })

  it('lists each file once when a link points back into the tree', async () => {
    await writeTree(baseDir, { 'App/Main.swift': '' })
    await fs.symlink('.', path.join(baseDir, 'App', 'loop'))

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['Main.swift'])
  })

  it('lists a symlinked file like a regular file', async () => {
    await writeTree(baseDir, {
      'App/Main.swift': '',
      'Shared/Util.swift': '',
    })
    await fs.symlink('../Shared/Util.swift', path.join(baseDir, 'App', 'Util.swift'))

    const files = await discoverSourceFiles(baseDir, SOURCES)

    expect(files.map((file) => file.relativePath)).toEqual(['Main.swift', 'Util.swift'])
  })

  it('returns an empty list when nothing matches', async () => {
    await writeTree(baseDir, { 'App/': '' })

    await expect(discoverSourceFiles(baseDir, SOURCES)).resolves.toEqual([])
  })

  it('supports nested source directories', async () => {
    await writeTree(baseDir, { 'ios/App/Main.swift': '' })

    const files = await discoverSourceFiles(baseDir, { ...SOURCES, directory: 'ios/App' })

    expect(files).toEqual([{ name: 'Main.swift', relativePath: 'Main.swift' }])
  })

  it('fails when the base directory is missing', async () => {
    const missing = path.join(baseDir, 'missing')

    await expect(discoverSourceFiles(missing, SOURCES)).rejects.toMatchObject({
      name: 'DiscoveryError',
      kind: 'base-missing',
      message: `Base directory does not exist: ${missing}`,
    })
  })

  it('fails when the source directory is missing', async () => {
    const error = await discoverSourceFiles(baseDir, SOURCES).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(DiscoveryError)
    expect(error).toMatchObject({
      kind: 'source-missing',
      directory: path.join(baseDir, 'App'),
      message: `Source directory does not exist: ${path.join(baseDir, 'App')}`,
    })
  })

  it('fails when the source directory is a file', async () => {
    await writeTree(baseDir, { App: 'not a directory' })

    await expect(discoverSourceFiles(baseDir, SOURCES)).rejects.toMatchObject({
      kind: 'not-a-directory',
    })
  })
})

describe('escapeGlobSegment', () => {
  it('escapes glob metacharacters', () => {
    expect(escapeGlobSegment('Preview (Old)')).toBe('Preview \\(Old\\)')
    expect(escapeGlobSegment('a*b')).toBe('a\\*b')
  })

  it('leaves plain names alone', () => {
    expect(escapeGlobSegment('Preview Content')).toBe('Preview Content')
  })
})

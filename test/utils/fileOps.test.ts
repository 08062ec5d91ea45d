import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs-extra'
import * as path from 'path'
import {
  FileOperationTransaction,
  ManifestWriteError,
  OperationType,
  readFileIfExists,
  temporaryPathFor,
  writeFileAtomic,
} from '../../src/utils/fileOps.js'
import { createTempDir } from '../helpers/source-tree.js'

describe('FileOperationTransaction', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await createTempDir()
  })

  afterEach(async () => {
    await fs.remove(testDir)
  })

  it('records operations', () => {
    const transaction = new FileOperationTransaction()
    const filePath = path.join(testDir, 'a.tmp')

    transaction.record(OperationType.CREATE_FILE, filePath)

    expect(transaction.getOperations()).toEqual([{ type: OperationType.CREATE_FILE, path: filePath }])
  })

  it('forgets released operations', () => {
    const transaction = new FileOperationTransaction()
    transaction.record(OperationType.CREATE_FILE, path.join(testDir, 'a.tmp'))

    transaction.release(path.join(testDir, 'a.tmp'))

    expect(transaction.getOperations()).toEqual([])
  })

  it('removes created files on rollback', async () => {
    const transaction = new FileOperationTransaction()
    const first = path.join(testDir, 'first.tmp')
    const second = path.join(testDir, 'second.tmp')
    await fs.writeFile(first, 'x')
    await fs.writeFile(second, 'y')
    transaction.record(OperationType.CREATE_FILE, first)
    transaction.record(OperationType.CREATE_FILE, second)

    const result = await transaction.rollback()

    expect(result.rolledBackOperations.map((op) => op.path)).toEqual([second, first])
    expect(result.failedRollbacks).toEqual([])
    expect(await fs.pathExists(first)).toBe(false)
    expect(await fs.pathExists(second)).toBe(false)
    expect(transaction.getOperations()).toEqual([])
  })

  it('skips files that were never created', async () => {
    const transaction = new FileOperationTransaction()
    transaction.record(OperationType.CREATE_FILE, path.join(testDir, 'never.tmp'))

    const result = await transaction.rollback()

    expect(result.rolledBackOperations).toEqual([])
    expect(result.failedRollbacks).toEqual([])
  })

  it('reports failed rollbacks through the warning callback', async () => {
    const warnings: string[] = []
    const transaction = new FileOperationTransaction((message) => warnings.push(message))
    const filePath = path.join(testDir, 'stuck.tmp')
    await fs.writeFile(filePath, 'x')
    transaction.record(OperationType.CREATE_FILE, filePath)
    vi.spyOn(fs, 'remove').mockRejectedValueOnce(new Error('busy'))

    const result = await transaction.rollback()

    expect(result.failedRollbacks).toEqual([{ operation: expect.objectContaining({ path: filePath }), error: 'busy' }])
    expect(warnings).toEqual([`Failed to rollback operation create_file at ${filePath}: busy`])
    vi.restoreAllMocks()
  })
})

describe('writeFileAtomic', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await createTempDir()
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await fs.remove(testDir)
  })

  it('creates a new file', async () => {
    const target = path.join(testDir, 'project.pbxproj')

    await writeFileAtomic(target, 'contents\n')

    expect(await fs.readFile(target, 'utf8')).toBe('contents\n')
    expect(await fs.readdir(testDir)).toEqual(['project.pbxproj'])
  })

  it('replaces an existing file', async () => {
    const target = path.join(testDir, 'project.pbxproj')
    await fs.writeFile(target, 'old\n')

    await writeFileAtomic(target, 'new\n')

    expect(await fs.readFile(target, 'utf8')).toBe('new\n')
  })

  it('keeps the permissions of the file it replaces', async () => {
    const target = path.join(testDir, 'project.pbxproj')
    await fs.writeFile(target, 'old\n')
    await fs.chmod(target, 0o600)

    await writeFileAtomic(target, 'new\n')

    expect((await fs.stat(target)).mode & 0o777).toBe(0o600)
  })

  it('fails when the parent directory is missing', async () => {
    const target = path.join(testDir, 'App.xcodeproj', 'project.pbxproj')

    await expect(writeFileAtomic(target, 'x')).rejects.toMatchObject({
      name: 'ManifestWriteError',
      targetPath: target,
      message: `Output directory does not exist: ${path.join(testDir, 'App.xcodeproj')}`,
    })
  })

  it('leaves the previous file untouched and removes the temp file when the rename fails', async () => {
    const target = path.join(testDir, 'project.pbxproj')
    await fs.writeFile(target, 'old\n')
    vi.spyOn(fs, 'rename').mockRejectedValueOnce(Object.assign(new Error('denied'), { code: 'EACCES' }))

    const error = await writeFileAtomic(target, 'new\n').catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(ManifestWriteError)
    expect(error).toMatchObject({ message: `Cannot write ${target} (EACCES): denied` })
    expect(await fs.readFile(target, 'utf8')).toBe('old\n')
    expect(await fs.readdir(testDir)).toEqual(['project.pbxproj'])
  })
})

describe('temporaryPathFor', () => {
  it('places the temp file beside the target as a hidden file', () => {
    const tempPath = temporaryPathFor(path.join('/work', 'App.xcodeproj', 'project.pbxproj'))

    expect(path.dirname(tempPath)).toBe(path.join('/work', 'App.xcodeproj'))
    expect(path.basename(tempPath)).toMatch(new RegExp(`^\\.project\\.pbxproj\\.${process.pid}\\.\\d+\\.tmp$`))
  })
})

describe('readFileIfExists', () => {
  let testDir: string

  beforeEach(async () => {
    testDir = await createTempDir()
  })

  afterEach(async () => {
    await fs.remove(testDir)
  })

  it('returns undefined for a missing file', async () => {
    expect(await readFileIfExists(path.join(testDir, 'missing'))).toBeUndefined()
  })

  it('returns the contents of an existing file', async () => {
    await fs.writeFile(path.join(testDir, 'present'), 'hello')

    expect(await readFileIfExists(path.join(testDir, 'present'))).toBe('hello')
  })

  it('rethrows other errors', async () => {
    await expect(readFileIfExists(testDir)).rejects.toMatchObject({ code: 'EISDIR' })
  })
})

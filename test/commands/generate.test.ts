import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest'
import { Config } from '@oclif/core'
import fs from 'fs-extra'
import * as path from 'path'
import Generate from '../../src/commands/generate.js'
import { createTempDir, writeTree } from '../helpers/source-tree.js'

describe('generate', () => {
  let config: Config
  let baseDir: string
  let manifestPath: string

  beforeAll(async () => {
    config = await Config.load({ root: process.cwd() })
  })

  beforeEach(async () => {
    baseDir = await createTempDir()
    manifestPath = path.join(baseDir, 'App.xcodeproj', 'project.pbxproj')
    await writeTree(baseDir, {
      'App/Main.swift': '',
      'App/Views/Home.swift': '',
      'App/Preview Content/Preview.swift': '',
      'App.xcodeproj/': '',
    })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    vi.unstubAllEnvs()
    await fs.remove(baseDir)
  })

  function createCommand(argv: string[]) {
    const command = new Generate(argv, config)
    const logSpy = vi.spyOn(command, 'log').mockImplementation(() => {})
    const errorSpy = vi.spyOn(command, 'error').mockImplementation(() => {
      throw new Error('error called')
    })
    const messages = (): string[] => logSpy.mock.calls.map(([message]) => String(message))
    return { command, logSpy, errorSpy, messages }
  }

  function lastJson(messages: string[]): unknown {
    return JSON.parse(messages[messages.length - 1] ?? 'null')
  }

  it('writes the manifest and prints a summary', async () => {
    const { command, logSpy } = createCommand([baseDir])

    await command.run()

    expect(await fs.pathExists(manifestPath)).toBe(true)
    expect(logSpy).toHaveBeenCalledWith(
      expect.stringContaining('Generated App.xcodeproj/project.pbxproj with 2 source file(s)')
    )
  })

  it('prints a JSON result', async () => {
    const { command, messages } = createCommand([baseDir, '--json'])

    await command.run()

    expect(lastJson(messages())).toEqual({
      status: 'success',
      output: 'App.xcodeproj/project.pbxproj',
      files: ['Main.swift', 'Views/Home.swift'],
      written: true,
    })
  })

  it('writes identical bytes on every run', async () => {
    await createCommand([baseDir, '--json']).command.run()
    const first = await fs.readFile(manifestPath, 'utf8')

    await createCommand([baseDir, '--json']).command.run()

    expect(await fs.readFile(manifestPath, 'utf8')).toBe(first)
  })

  it('reads the base directory from PBXFORGE_BASE_DIR', async () => {
    vi.stubEnv('PBXFORGE_BASE_DIR', baseDir)
    const { command } = createCommand(['--json'])

    await command.run()

    expect(await fs.pathExists(manifestPath)).toBe(true)
  })

  describe('--dry-run', () => {
    it('prints the manifest without writing it', async () => {
      const { command, messages } = createCommand([baseDir, '--dry-run'])

      await command.run()

      const [printed] = messages()
      expect(printed?.startsWith('// !$*UTF8*$!\n{\n')).toBe(true)
      expect(printed?.endsWith('/* Project object */;\n}')).toBe(true)
      expect(await fs.pathExists(manifestPath)).toBe(false)
    })
  })

  describe('--check', () => {
    it('fails when the manifest is missing', async () => {
      const { command, messages } = createCommand([baseDir, '--check', '--json'])

      await expect(command.run()).rejects.toThrow('EEXIT: 1')

      expect(lastJson(messages())).toEqual({
        status: 'error',
        error: 'App.xcodeproj/project.pbxproj is out of date; run `pbxforge generate` to update it',
      })
      expect(await fs.pathExists(manifestPath)).toBe(false)
    })

    it('passes after generating', async () => {
      await createCommand([baseDir, '--json']).command.run()
      const { command, messages } = createCommand([baseDir, '--check', '--json'])

      await command.run()

      expect(lastJson(messages())).toEqual({
        status: 'success',
        output: 'App.xcodeproj/project.pbxproj',
        files: ['Main.swift', 'Views/Home.swift'],
        upToDate: true,
      })
    })

    it('fails after a source file is added', async () => {
      await createCommand([baseDir, '--json']).command.run()
      await writeTree(baseDir, { 'App/Settings.swift': '' })
      const { command } = createCommand([baseDir, '--check', '--json'])

      await expect(command.run()).rejects.toThrow('EEXIT: 1')
    })
  })

  describe('errors', () => {
    it('reports a missing source directory', async () => {
      await fs.remove(path.join(baseDir, 'App'))
      const { command, messages } = createCommand([baseDir, '--json'])

      await expect(command.run()).rejects.toThrow('EEXIT: 1')

      const detail = `Source directory does not exist: ${path.join(baseDir, 'App')}`
      expect(lastJson(messages())).toEqual({
        status: 'error',
        error: `Failed to discover source files: ${detail}`,
        context: 'Failed to discover source files',
        details: detail,
      })
    })

    it('reports a missing output directory', async () => {
      await fs.remove(path.join(baseDir, 'App.xcodeproj'))
      const { command, messages } = createCommand([baseDir, '--json'])

      await expect(command.run()).rejects.toThrow('EEXIT: 1')

      expect(lastJson(messages())).toMatchObject({
        status: 'error',
        error: `Failed to write manifest: Output directory does not exist: ${path.join(baseDir, 'App.xcodeproj')}`,
      })
    })

    it('reports an invalid configuration file as a validation error', async () => {
      await fs.writeFile(path.join(baseDir, '.pbxforge.toml'), '[sources]\nextension = "swift"\n')
      const { command, messages } = createCommand([baseDir, '--json'])

      await expect(command.run()).rejects.toThrow('EEXIT: 1')

      expect(lastJson(messages())).toEqual({
        status: 'error',
        error: `Invalid configuration in ${path.join(baseDir, '.pbxforge.toml')}: sources.extension: Invalid`,
      })
    })

    it('reports errors through command.error in human mode', async () => {
      await fs.remove(path.join(baseDir, 'App'))
      const { command, errorSpy } = createCommand([baseDir])

      await expect(command.run()).rejects.toThrow('error called')

      expect(errorSpy).toHaveBeenCalledWith(
        `Failed to discover source files: Source directory does not exist: ${path.join(baseDir, 'App')}`,
        { exit: false }
      )
    })
  })
})

import { describe, it, expect } from 'vitest'
import {
  DEFAULT_CONFIG,
  isProjectConfig,
  resolveOutputPath,
  validateConfig,
  validatePartialConfig,
} from '../../src/config/schema.js'

describe('Configuration Schema', () => {
  describe('DEFAULT_CONFIG', () => {
    it('fills every section with defaults', () => {
      expect(DEFAULT_CONFIG).toEqual({
        project: {
          name: 'App',
          bundleIdentifier: 'com.example.app',
          marketingVersion: '1.0',
          currentProjectVersion: '1',
          deploymentTarget: '17.0',
          swiftVersion: '5.0',
          category: 'public.app-category.productivity',
          usageDescriptions: {},
        },
        sources: { directory: 'App', extension: '.swift', previewDirectory: 'Preview Content' },
        localization: { developmentRegion: 'en', regions: ['en'] },
        output: {},
      })
    })

    it('is a valid configuration', () => {
      expect(isProjectConfig(DEFAULT_CONFIG)).toBe(true)
    })
  })

  describe('validateConfig', () => {
    it('rejects a source directory that leaves the base directory', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, sources: { ...DEFAULT_CONFIG.sources, directory: '../App' } })).toThrow()
    })

    it('rejects an extension without a leading dot', () => {
      expect(() => validateConfig({ ...DEFAULT_CONFIG, sources: { ...DEFAULT_CONFIG.sources, extension: 'swift' } })).toThrow()
    })

    it('rejects a preview directory inside the source directory path', () => {
      expect(() =>
        validateConfig({
          ...DEFAULT_CONFIG,
          sources: { ...DEFAULT_CONFIG.sources, directory: 'App/Preview Content' },
        })
      ).toThrow('The preview directory cannot be part of the source directory path')
    })

    it('rejects malformed usage description keys', () => {
      expect(() =>
        validateConfig({
          ...DEFAULT_CONFIG,
          project: { ...DEFAULT_CONFIG.project, usageDescriptions: { Camera: 'x' } },
        })
      ).toThrow()
    })
  })

  describe('validatePartialConfig', () => {
    it('accepts an empty object without adding defaults', () => {
      expect(validatePartialConfig({})).toEqual({})
    })

    it('keeps only the given keys', () => {
      expect(validatePartialConfig({ project: { name: 'Notes' } })).toEqual({ project: { name: 'Notes' } })
    })

    it('rejects wrong types', () => {
      expect(() => validatePartialConfig({ localization: { regions: 'en' } })).toThrow()
    })
  })

  describe('resolveOutputPath', () => {
    it('defaults to the project bundle', () => {
      expect(resolveOutputPath(DEFAULT_CONFIG)).toBe('App.xcodeproj/project.pbxproj')
    })

    it('uses the configured path', () => {
      expect(resolveOutputPath({ ...DEFAULT_CONFIG, output: { path: 'Out/project.pbxproj' } })).toBe(
        'Out/project.pbxproj'
      )
    })
  })
})

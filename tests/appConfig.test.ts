import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'
import { loadAppConfig, loadHeaderText, normalizeExtension } from '../src/config/appConfig.js'
import { DEFAULT_LICENSE_HEADER } from '../src/core/licenseHeader.js'

describe('loadAppConfig', () => {
  it('falls back to built-in defaults', () => {
    const config = loadAppConfig({})
    expect(config).toEqual({
      baseDir: undefined,
      project: undefined,
      extension: '.rs',
      headerFile: undefined,
      marker: '/* Copyright',
      ignore: [],
      dryRun: false
    })
  })

  it('reads LICENSE_STAMP_* variables', () => {
    const config = loadAppConfig({
      LICENSE_STAMP_BASE_DIR: 'crates/core',
      LICENSE_STAMP_PROJECT: 'engine',
      LICENSE_STAMP_EXTENSION: 'ts',
      LICENSE_STAMP_HEADER_FILE: 'HEADER.txt',
      LICENSE_STAMP_MARKER: '// SPDX',
      LICENSE_STAMP_IGNORE: 'generated/**, vendor/** ,',
      LICENSE_STAMP_DRY_RUN: 'true',
      UNRELATED: 'ignored'
    })
    expect(config).toEqual({
      baseDir: 'crates/core',
      project: 'engine',
      extension: '.ts',
      headerFile: 'HEADER.txt',
      marker: '// SPDX',
      ignore: ['generated/**', 'vendor/**'],
      dryRun: true
    })
  })

  it('treats empty variables as unset', () => {
    const config = loadAppConfig({ LICENSE_STAMP_EXTENSION: '', LICENSE_STAMP_DRY_RUN: ' ' })
    expect(config.extension).toBe('.rs')
    expect(config.dryRun).toBe(false)
  })

  it('lets overrides win over the environment', () => {
    const config = loadAppConfig(
      { LICENSE_STAMP_EXTENSION: '.ts', LICENSE_STAMP_DRY_RUN: '1', LICENSE_STAMP_IGNORE: 'a/**' },
      { extension: '.go', dryRun: false, ignore: ['b/**'] }
    )
    expect(config.extension).toBe('.go')
    expect(config.dryRun).toBe(false)
    expect(config.ignore).toEqual(['b/**'])
  })

  it('names the variable holding an invalid value', () => {
    expect(() => loadAppConfig({ LICENSE_STAMP_DRY_RUN: 'yes' })).toThrow(/LICENSE_STAMP_DRY_RUN/)
  })

  it('rejects an empty marker override', () => {
    expect(() => loadAppConfig({}, { marker: '' })).toThrow('license marker must not be empty')
  })
})

describe('normalizeExtension', () => {
  it('adds the leading dot when missing', () => {
    expect(normalizeExtension('rs')).toBe('.rs')
    expect(normalizeExtension(' .tsx ')).toBe('.tsx')
    expect(normalizeExtension('d.ts')).toBe('.d.ts')
  })

  it('rejects bare dots and path separators', () => {
    expect(() => normalizeExtension('.')).toThrow('file extension is invalid: "."')
    expect(() => normalizeExtension('src/rs')).toThrow('file extension is invalid')
  })
})

describe('loadHeaderText', () => {
  const tempDirs: string[] = []

  afterEach(() => {
    while (tempDirs.length > 0) {
      const dir = tempDirs.pop()
      if (dir) rmSync(dir, { recursive: true, force: true })
    }
  })

  function createDir(): string {
    const dir = mkdtempSync(join(tmpdir(), 'license-stamp-config-'))
    tempDirs.push(dir)
    return dir
  }

  it('returns the built-in header when no file is configured', () => {
    expect(loadHeaderText({}, '/anywhere')).toBe(DEFAULT_LICENSE_HEADER)
  })

  it('reads the header file relative to the working directory', () => {
    const dir = createDir()
    writeFileSync(join(dir, 'HEADER.txt'), '/* Copyright Test */\n', 'utf8')
    expect(loadHeaderText({ headerFile: 'HEADER.txt' }, dir)).toBe('/* Copyright Test */\n')
  })

  it('reports a missing header file with its path', () => {
    const dir = createDir()
    expect(() => loadHeaderText({ headerFile: 'missing.txt' }, dir)).toThrow(
      `header file path is unreadable: ${join(dir, 'missing.txt')}`
    )
  })

  it('rejects a blank header file', () => {
    const dir = createDir()
    writeFileSync(join(dir, 'HEADER.txt'), '\n  \n', 'utf8')
    expect(() => loadHeaderText({ headerFile: 'HEADER.txt' }, dir)).toThrow(
      `header file is empty: ${join(dir, 'HEADER.txt')}`
    )
  })
})

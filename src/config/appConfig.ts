import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { z } from 'zod'
import { DEFAULT_LICENSE_HEADER, LICENSE_MARKER } from '../core/licenseHeader.js'

export const DEFAULT_EXTENSION = '.rs'

export type AppConfig = {
  baseDir?: string
  project?: string
  /** Always normalised to start with a dot */
  extension: string
  headerFile?: string
  marker: string
  ignore: string[]
  dryRun: boolean
}

/** Values given on the command line; each one wins over its environment variable. */
export type AppConfigOverrides = Partial<AppConfig>

type Env = Record<string, string | undefined>

const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
)

const EnvSchema = z.object({
  LICENSE_STAMP_BASE_DIR: optionalText,
  LICENSE_STAMP_PROJECT: optionalText,
  LICENSE_STAMP_EXTENSION: optionalText,
  LICENSE_STAMP_HEADER_FILE: optionalText,
  LICENSE_STAMP_MARKER: optionalText,
  LICENSE_STAMP_IGNORE: optionalText,
  LICENSE_STAMP_DRY_RUN: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.enum(['1', '0', 'true', 'false']).optional()
  )
})

export function normalizeExtension(raw: string): string {
  const trimmed = raw.trim()
  const extension = trimmed.startsWith('.') ? trimmed : `.${trimmed}`
  if (extension === '.' || /[\\/]/u.test(extension)) {
    throw new Error(`file extension is invalid: "${raw}"`)
  }
  return extension
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return []
  return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0)
}

export function loadAppConfig(env: Env, overrides: AppConfigOverrides = {}): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue ? issue.path.join('.') : 'environment'
    throw new Error(`invalid configuration in ${variable}: ${issue?.message ?? 'unknown error'}`)
  }
  const vars = parsed.data

  const marker = overrides.marker ?? vars.LICENSE_STAMP_MARKER ?? LICENSE_MARKER
  if (marker.length === 0) {
    throw new Error('license marker must not be empty')
  }

  return {
    baseDir: overrides.baseDir ?? vars.LICENSE_STAMP_BASE_DIR,
    project: overrides.project ?? vars.LICENSE_STAMP_PROJECT,
    extension: normalizeExtension(overrides.extension ?? vars.LICENSE_STAMP_EXTENSION ?? DEFAULT_EXTENSION),
    headerFile: overrides.headerFile ?? vars.LICENSE_STAMP_HEADER_FILE,
    marker,
    ignore: overrides.ignore ?? parseList(vars.LICENSE_STAMP_IGNORE),
    dryRun:
      overrides.dryRun ??
      (vars.LICENSE_STAMP_DRY_RUN === '1' || vars.LICENSE_STAMP_DRY_RUN === 'true')
  }
}

/** Header text from the configured file, or the built-in Apache-2.0 header. */
export function loadHeaderText(config: Pick<AppConfig, 'headerFile'>, cwd: string): string {
  if (!config.headerFile) {
    return DEFAULT_LICENSE_HEADER
  }

  const headerPath = resolve(cwd, config.headerFile)
  let raw = ''
  try {
    raw = readFileSync(headerPath, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`header file path is unreadable: ${headerPath} (${reason})`)
  }

  if (raw.trim().length === 0) {
    throw new Error(`header file is empty: ${headerPath}`)
  }
  return raw
}

import { isAbsolute, relative } from 'node:path'
import yargs from 'yargs'
import { createApp, type App } from '../../app/createApp.js'
import {
  BaseDirectoryNotFoundError,
  resolveBaseDirectory,
  type BaseDirectoryCandidate
} from '../../application/baseDirectory.js'
import type { FileOutcome, HeaderRunSummary } from '../../application/headerApplicator.js'
import { loadAppConfig, type AppConfigOverrides } from '../../config/appConfig.js'
import type { SourceTree } from '../../core/ports/sourceTree.js'
import type { IO } from './io.js'

type GlobalArgs = {
  'base-dir'?: string
  project?: string
  ext?: string
  'header-file'?: string
  marker?: string
  ignore?: string[]
}

/**
 * CLI adapter: parse flags → build config → run the header pass
 *
 * Commands:
 * - apply [--dry-run]   (default) add the header to files that lack it
 * - check               list files that lack the header, exit 1 if any
 */
export async function runCli(opts: {
  argv: string[]
  /** Directory of the entry script; anchors the default candidate paths */
  anchorDir: string
  cwd: string
  env: Record<string, string | undefined>
  io: IO
  tree?: SourceTree
}): Promise<number> {
  const { argv, anchorDir, cwd, env, io } = opts
  let exitCode = 0

  const prepare = (args: GlobalArgs, extra: AppConfigOverrides): App => {
    const config = loadAppConfig(env, {
      baseDir: args['base-dir'],
      project: args.project,
      extension: args.ext,
      headerFile: args['header-file'],
      marker: args.marker,
      ignore: args.ignore,
      ...extra
    })
    return createApp({ config, anchorDir, cwd, tree: opts.tree })
  }

  const parser = yargs(argv)
    .scriptName('license-stamp')
    .option('base-dir', { type: 'string', describe: 'Directory to process; disables candidate probing' })
    .option('project', { type: 'string', describe: 'Nested project directory probed first as <project>/src' })
    .option('ext', { type: 'string', describe: 'File extension to match (default .rs)' })
    .option('header-file', { type: 'string', describe: 'Read the header text from this file' })
    .option('marker', { type: 'string', describe: 'Prefix that marks a file as already licensed' })
    .option('ignore', { type: 'string', array: true, describe: 'Glob patterns to skip, relative to the base directory' })
    .command(
      ['apply', '$0'],
      'Add the license header to every matching file that lacks it',
      (y) => y.option('dry-run', { type: 'boolean', describe: 'Report what would change without writing' }),
      async (args) => {
        exitCode = await reportFailure(io, () => applyCommand(prepare(args, { dryRun: args['dry-run'] }), cwd, io))
      }
    )
    .command(
      'check',
      'List matching files that lack the license header',
      (y) => y,
      async (args) => {
        exitCode = await reportFailure(io, () => checkCommand(prepare(args, { dryRun: true }), cwd, io))
      }
    )
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(message)
    })
    .help()

  try {
    // With a parse callback yargs hands its own output (help, version) back instead of printing it.
    await parser.parseAsync(argv, {}, (_err, _argv, output) => {
      if (output) io.stdout(`${output}\n`)
    })
    return exitCode
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

/** Configuration and unexpected errors end the command with exit code 1. */
async function reportFailure(io: IO, command: () => Promise<number>): Promise<number> {
  try {
    return await command()
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

async function resolveOrReport(app: App, io: IO): Promise<BaseDirectoryCandidate | null> {
  try {
    return await resolveBaseDirectory(app.candidates, app.tree)
  } catch (error) {
    if (error instanceof BaseDirectoryNotFoundError) {
      io.stderr(`Error: ${error.message}\n`)
      return null
    }
    throw error
  }
}

async function applyCommand(app: App, cwd: string, io: IO): Promise<number> {
  const base = await resolveOrReport(app, io)
  if (!base) return 1

  const summary = await app.applicator.run(
    base.path,
    { extension: app.config.extension, ignore: app.config.ignore },
    (outcome) => reportOutcome(outcome, cwd, io)
  )

  const verb = app.applicator.dryRun ? 'Would add' : 'Added'
  io.stdout(`${verb} license headers to ${summary.modified} files out of ${summary.total} total files${failedSuffix(summary)}.\n`)
  return 0
}

async function checkCommand(app: App, cwd: string, io: IO): Promise<number> {
  const base = await resolveOrReport(app, io)
  if (!base) return 1

  const summary = await app.applicator.run(
    base.path,
    { extension: app.config.extension, ignore: app.config.ignore },
    (outcome) => {
      if (outcome.status === 'would_add') {
        io.stdout(`Missing license header: ${toDisplayPath(cwd, outcome.path)}\n`)
      } else if (outcome.status === 'failed') {
        reportOutcome(outcome, cwd, io)
      }
    }
  )

  if (summary.modified === 0 && summary.failed === 0) {
    io.stdout(`All ${summary.total} files have the license header.\n`)
    return 0
  }
  io.stdout(`${summary.modified} of ${summary.total} files are missing the license header${failedSuffix(summary)}.\n`)
  return 1
}

function reportOutcome(outcome: FileOutcome, cwd: string, io: IO): void {
  const displayPath = toDisplayPath(cwd, outcome.path)
  switch (outcome.status) {
    case 'present':
      io.stdout(`License header already exists in ${displayPath}\n`)
      return
    case 'added':
      io.stdout(`Added license header to ${displayPath}\n`)
      return
    case 'would_add':
      io.stdout(`Would add license header to ${displayPath}\n`)
      return
    case 'failed':
      io.stderr(`Failed to process ${displayPath}: ${outcome.message}\n`)
      return
  }
}

function failedSuffix(summary: HeaderRunSummary): string {
  return summary.failed > 0 ? ` (${summary.failed} failed)` : ''
}

/** Paths under the working directory are shown relative to it. */
function toDisplayPath(cwd: string, filePath: string): string {
  const relativePath = relative(cwd, filePath)
  if (relativePath === '' || relativePath.startsWith('..') || isAbsolute(relativePath)) {
    return filePath
  }
  return relativePath.replace(/\\/gu, '/')
}

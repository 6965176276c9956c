/**
 * Application Layer - Header Applicator
 *
 * Ensures every matched file starts with the license header block.
 * Files are handled one at a time; a failure on one file is recorded as a
 * `failed` outcome and the pass moves on to the next.
 */

import { hasLicenseMarker, prependHeader, toHeaderBlock } from '../core/licenseHeader.js'
import { UndecodableFileError, type ListFilesOptions, type SourceTree } from '../core/ports/sourceTree.js'

export type FileFailureReason = 'read' | 'decode' | 'write'

export type FileOutcome =
  | { path: string; status: 'added' | 'would_add' | 'present' }
  | { path: string; status: 'failed'; reason: FileFailureReason; message: string }

export type HeaderRunSummary = {
  total: number
  /** Files written, or that would be written in dry-run mode */
  modified: number
  present: number
  failed: number
  outcomes: FileOutcome[]
}

export type HeaderApplicatorOptions = {
  tree: SourceTree
  headerText: string
  marker: string
  dryRun?: boolean
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class HeaderApplicator {
  readonly #tree: SourceTree
  readonly #headerBlock: string
  readonly #marker: string
  readonly #dryRun: boolean

  constructor(opts: HeaderApplicatorOptions) {
    if (!opts.marker) {
      throw new Error('License marker must not be empty')
    }
    const headerBlock = toHeaderBlock(opts.headerText)
    // A header the guard cannot recognise would be stacked again on every run.
    if (!hasLicenseMarker(headerBlock, opts.marker)) {
      throw new Error(`License header must start with the marker "${opts.marker}"`)
    }
    this.#tree = opts.tree
    this.#headerBlock = headerBlock
    this.#marker = opts.marker
    this.#dryRun = opts.dryRun ?? false
  }

  get dryRun(): boolean {
    return this.#dryRun
  }

  async applyToFile(path: string): Promise<FileOutcome> {
    let content: string
    try {
      content = await this.#tree.readText(path)
    } catch (error) {
      const reason: FileFailureReason = error instanceof UndecodableFileError ? 'decode' : 'read'
      return { path, status: 'failed', reason, message: errorMessage(error) }
    }

    if (hasLicenseMarker(content, this.#marker)) {
      return { path, status: 'present' }
    }

    if (this.#dryRun) {
      return { path, status: 'would_add' }
    }

    try {
      await this.#tree.writeText(path, prependHeader(content, this.#headerBlock))
    } catch (error) {
      return { path, status: 'failed', reason: 'write', message: errorMessage(error) }
    }
    return { path, status: 'added' }
  }

  /**
   * Apply the header to every matching file under `baseDir`.
   *
   * @param onOutcome - Called after each file, in processing order
   */
  async run(
    baseDir: string,
    options: ListFilesOptions,
    onOutcome?: (outcome: FileOutcome) => void
  ): Promise<HeaderRunSummary> {
    const files = await this.#tree.listFiles(baseDir, options)
    const summary: HeaderRunSummary = { total: files.length, modified: 0, present: 0, failed: 0, outcomes: [] }

    for (const file of files) {
      const outcome = await this.applyToFile(file)
      summary.outcomes.push(outcome)
      if (outcome.status === 'added' || outcome.status === 'would_add') summary.modified += 1
      else if (outcome.status === 'present') summary.present += 1
      else summary.failed += 1
      onOutcome?.(outcome)
    }

    return summary
  }
}

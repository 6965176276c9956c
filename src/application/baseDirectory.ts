import { join, resolve } from 'node:path'
import type { SourceTree } from '../core/ports/sourceTree.js'

export type BaseDirectoryCandidate = {
  /** Where the candidate came from, used in diagnostics */
  source: 'override' | 'nested' | 'anchor' | 'cwd'
  path: string
}

export class BaseDirectoryNotFoundError extends Error {
  readonly tried: readonly string[]

  constructor(tried: readonly string[]) {
    super(`Could not find the target directory (tried: ${tried.join(', ')})`)
    this.name = 'BaseDirectoryNotFoundError'
    this.tried = tried
  }
}

/**
 * Build the ordered probe list.
 *
 * An explicit override is the only candidate: falling back past a directory
 * the operator named would stamp a tree they did not ask for.
 */
export function buildBaseDirectoryCandidates(opts: {
  anchorDir: string
  cwd: string
  baseDir?: string
  project?: string
}): BaseDirectoryCandidate[] {
  if (opts.baseDir) {
    return [{ source: 'override', path: resolve(opts.cwd, opts.baseDir) }]
  }

  const candidates: BaseDirectoryCandidate[] = []
  if (opts.project) {
    candidates.push({ source: 'nested', path: join(opts.anchorDir, opts.project, 'src') })
  }
  candidates.push({ source: 'anchor', path: join(opts.anchorDir, 'src') })
  candidates.push({ source: 'cwd', path: resolve(opts.cwd, 'src') })

  const seen = new Set<string>()
  return candidates.filter((candidate) => {
    if (seen.has(candidate.path)) return false
    seen.add(candidate.path)
    return true
  })
}

/** First candidate that exists as a directory. */
export async function resolveBaseDirectory(
  candidates: readonly BaseDirectoryCandidate[],
  tree: Pick<SourceTree, 'isDirectory'>
): Promise<BaseDirectoryCandidate> {
  for (const candidate of candidates) {
    if (await tree.isDirectory(candidate.path)) {
      return candidate
    }
  }
  throw new BaseDirectoryNotFoundError(candidates.map((c) => c.path))
}

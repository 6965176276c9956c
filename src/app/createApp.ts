import { HeaderApplicator } from '../application/headerApplicator.js'
import { buildBaseDirectoryCandidates, type BaseDirectoryCandidate } from '../application/baseDirectory.js'
import { loadHeaderText, type AppConfig } from '../config/appConfig.js'
import type { SourceTree } from '../core/ports/sourceTree.js'
import { FsSourceTree } from '../infrastructure/filesystem/fsSourceTree.js'

export type App = {
  config: AppConfig
  tree: SourceTree
  candidates: BaseDirectoryCandidate[]
  applicator: HeaderApplicator
}

export function createApp(opts: {
  config: AppConfig
  anchorDir: string
  cwd: string
  tree?: SourceTree
}): App {
  const { config, anchorDir, cwd } = opts
  const tree = opts.tree ?? new FsSourceTree()
  const applicator = new HeaderApplicator({
    tree,
    headerText: loadHeaderText(config, cwd),
    marker: config.marker,
    dryRun: config.dryRun
  })
  const candidates = buildBaseDirectoryCandidates({
    anchorDir,
    cwd,
    baseDir: config.baseDir,
    project: config.project
  })
  return { config, tree, candidates, applicator }
}

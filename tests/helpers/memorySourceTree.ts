import { UndecodableFileError, type ListFilesOptions, type SourceTree } from '../../src/core/ports/sourceTree.js'

/** In-process SourceTree keyed by absolute POSIX paths. */
export class MemorySourceTree implements SourceTree {
  readonly files = new Map<string, string>()
  readonly directories = new Set<string>()
  readonly undecodable = new Set<string>()
  readonly failWrites = new Set<string>()
  readonly reads: string[] = []
  readonly writes: string[] = []
  readonly probes: string[] = []

  constructor(files: Record<string, string> = {}, directories: string[] = []) {
    for (const [path, content] of Object.entries(files)) this.files.set(path, content)
    for (const dir of directories) this.directories.add(dir)
  }

  async isDirectory(path: string): Promise<boolean> {
    this.probes.push(path)
    return this.directories.has(path)
  }

  async listFiles(baseDir: string, options: ListFilesOptions): Promise<string[]> {
    return [...this.files.keys()]
      .filter((path) => path.startsWith(`${baseDir}/`) && path.endsWith(options.extension))
      .sort()
  }

  async readText(path: string): Promise<string> {
    this.reads.push(path)
    if (this.undecodable.has(path)) throw new UndecodableFileError(path)
    const content = this.files.get(path)
    if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`)
    return content
  }

  async writeText(path: string, content: string): Promise<void> {
    if (this.failWrites.has(path)) throw new Error(`EACCES: permission denied, open '${path}'`)
    this.writes.push(path)
    this.files.set(path, content)
  }
}

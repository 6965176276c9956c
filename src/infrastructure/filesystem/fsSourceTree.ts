import { readFile, stat } from 'node:fs/promises'
import { escape, glob } from 'glob'
import { UndecodableFileError, type ListFilesOptions, type SourceTree } from '../../core/ports/sourceTree.js'
import { writeFileAtomic } from './atomicWrite.js'

export class FsSourceTree implements SourceTree {
  readonly #decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true })

  async isDirectory(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory()
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code
      if (code === 'ENOENT' || code === 'ENOTDIR') return false
      throw error
    }
  }

  async listFiles(baseDir: string, options: ListFilesOptions): Promise<string[]> {
    // Hidden files and directories are skipped (glob's default `dot: false`).
    const matches = await glob(`**/*${escape(options.extension)}`, {
      cwd: baseDir,
      absolute: true,
      nodir: true,
      ignore: options.ignore ? [...options.ignore] : undefined
    })
    return matches.sort()
  }

  async readText(path: string): Promise<string> {
    const bytes = await readFile(path)
    try {
      return this.#decoder.decode(bytes)
    } catch (error) {
      throw new UndecodableFileError(path, error)
    }
  }

  async writeText(path: string, content: string): Promise<void> {
    await writeFileAtomic(path, content)
  }
}

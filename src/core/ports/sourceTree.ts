/**
 * Core - Ports
 *
 * SourceTree is the filesystem surface the header applicator works against.
 * Infrastructure provides the disk-backed implementation; tests use fakes.
 */

export type ListFilesOptions = {
  /** Suffix including the leading dot, e.g. ".rs" */
  extension: string
  /** Glob patterns relative to the base directory */
  ignore?: readonly string[]
}

export interface SourceTree {
  /** True when `path` exists and is a directory. */
  isDirectory(path: string): Promise<boolean>

  /**
   * Recursively list files under `baseDir` whose name ends with the extension.
   *
   * @returns Absolute paths, sorted
   */
  listFiles(baseDir: string, options: ListFilesOptions): Promise<string[]>

  /**
   * Read a file as UTF-8 text.
   *
   * @throws UndecodableFileError when the bytes are not valid UTF-8
   */
  readText(path: string): Promise<string>

  /** Replace the file's content. The original is left intact if the write fails. */
  writeText(path: string, content: string): Promise<void>
}

export class UndecodableFileError extends Error {
  readonly path: string

  constructor(path: string, cause?: unknown) {
    super(`File is not valid UTF-8 text: ${path}`, { cause })
    this.name = 'UndecodableFileError'
    this.path = path
  }
}

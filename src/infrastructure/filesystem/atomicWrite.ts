import { chmod, chown, realpath, rename, stat, unlink, writeFile } from 'node:fs/promises'
import type { Stats } from 'node:fs'
import { basename, dirname, join } from 'node:path'

/**
 * Replace the file at `path` with `content` via a temp file and a rename, so
 * a failed write never leaves the original truncated.
 *
 * Symlinks are followed: the temp file sits beside the resolved target and
 * replaces it, so the link stays a link. Mode and ownership are carried over.
 * Where a rename would change what other paths see (a file with several hard
 * links) or ownership cannot be carried over, the content is written in place.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const target = await realpath(path)
  const stats = await stat(target)
  if (stats.isFile() && stats.nlink > 1) {
    await writeFile(target, content, 'utf8')
    return
  }

  const permissions = stats.mode & 0o7777
  const tmpPath = join(dirname(target), `.${basename(target)}.${process.pid}.${Date.now()}.tmp`)

  try {
    await writeFile(tmpPath, content, { encoding: 'utf8', mode: permissions })
    await chmod(tmpPath, permissions)
    if (!(await copyOwnership(tmpPath, stats))) {
      await removeTempFile(tmpPath)
      await writeFile(target, content, 'utf8')
      return
    }
    await rename(tmpPath, target)
  } catch (error) {
    await removeTempFile(tmpPath)
    throw error
  }
}

/** False when the process may not give the temp file the original owner. */
async function copyOwnership(tmpPath: string, original: Stats): Promise<boolean> {
  const created = await stat(tmpPath)
  if (created.uid === original.uid && created.gid === original.gid) return true
  try {
    await chown(tmpPath, original.uid, original.gid)
    return true
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EPERM') return false
    throw error
  }
}

async function removeTempFile(tmpPath: string): Promise<void> {
  try {
    await unlink(tmpPath)
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return
    console.warn(`[writeFileAtomic] Failed to remove temporary file ${tmpPath}:`, error)
  }
}

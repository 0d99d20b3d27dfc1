import { mkdir, open, rename, unlink } from 'fs/promises'
import { randomUUID } from 'crypto'
import { dirname } from 'path'

export function isFileMissingError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * Replace `filePath` with `content` without ever exposing a partial file
 *
 * The content goes to a uniquely named temporary file beside the target,
 * which is flushed and closed before being renamed over the target. On any
 * failure the temporary file is removed and the target is left as it was.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempFilePath = `${filePath}.${process.pid}.${randomUUID()}.tmp`

  await mkdir(dirname(filePath), { recursive: true })

  try {
    const handle = await open(tempFilePath, 'wx')
    try {
      await handle.writeFile(content, 'utf-8')
      await handle.sync()
    } finally {
      await handle.close()
    }
    await rename(tempFilePath, filePath)
  } catch (error) {
    try {
      await unlink(tempFilePath)
    } catch (cleanupError) {
      if (!isFileMissingError(cleanupError)) {
        throw cleanupError
      }
    }
    throw error
  }
}

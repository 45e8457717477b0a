import { promises as fs } from 'node:fs'
import { dirname, join } from 'node:path'
import { randomBytes } from 'node:crypto'
import { DriftValidationError } from '../errors.js'

/**
 * Returns true if err is a Node.js filesystem error with code ENOENT.
 */
export function isEnoent(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    (err as NodeJS.ErrnoException).code === 'ENOENT'
  )
}

/**
 * Reads a UTF-8 input file. `label` names the file's role in the error
 * raised when it is missing (e.g. "config file").
 *
 * @throws {DriftValidationError} if the file does not exist.
 * @throws Any other read error unchanged.
 */
export async function readInputFile(filePath: string, label: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8')
  } catch (err) {
    if (isEnoent(err)) throw new DriftValidationError(`${label} not found: ${filePath}`)
    throw err
  }
}

/**
 * Writes content to a temporary file beside filePath, then renames it over
 * filePath so readers never see a partial report. Creates the parent
 * directory when needed.
 *
 * @throws If the write or rename fails.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath)
  const tmpPath = join(dir, `.tmp-${randomBytes(6).toString('hex')}`)

  await fs.mkdir(dir, { recursive: true })
  try {
    await fs.writeFile(tmpPath, content, 'utf-8')
    await fs.rename(tmpPath, filePath)
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => {
      // The original error is rethrown below.
    })
    throw new Error(
      `Atomic write failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    )
  }
}

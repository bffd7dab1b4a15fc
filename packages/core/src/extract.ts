import { chmod } from 'node:fs/promises'
import { createRequire } from 'node:module'
import { Worker } from 'node:worker_threads'
import AdmZip from 'adm-zip'
import {
  ArchiveError,
  FilesystemError,
  errorMessage,
} from './errors/index.js'
import { getPlatformInfo, type PlatformInfo } from './platform.js'

const require = createRequire(import.meta.url)

// Runs in a worker: inflating is synchronous, and adm-zip's sync API throws
// on corrupt entry data where its async API does not report it.
const EXTRACT_WORKER_SOURCE = `
const { workerData } = require('node:worker_threads')
const AdmZip = require(workerData.admZipPath)
new AdmZip(Buffer.from(workerData.data)).extractAllTo(workerData.destination, true, false)
`

export type ExtractOptions = {
  data: Buffer
  destination: string
}

function listEntries(data: Buffer, destination: string): string[] {
  try {
    return new AdmZip(data).getEntries().map((entry) => entry.entryName)
  } catch (error) {
    throw new ArchiveError(
      `Failed to read zip archive: ${errorMessage(error)}`,
      { destination, cause: error },
    )
  }
}

/**
 * Extracts every entry of an in-memory zip under `destination`, keeping the
 * archive's directory structure. Decoding runs in a worker thread.
 *
 * @returns the archive's entry names
 */
export async function extractZip(options: ExtractOptions): Promise<string[]> {
  const { data, destination } = options

  const entries = listEntries(data, destination)

  // Permissions come from makeExecutable; zip producers disagree on mode bits.
  await new Promise<void>((resolve, reject) => {
    const fail = (error: unknown) =>
      reject(
        new ArchiveError(
          `Failed to extract zip archive into ${destination}: ${errorMessage(error)}`,
          { destination, cause: error },
        ),
      )

    const worker = new Worker(EXTRACT_WORKER_SOURCE, {
      eval: true,
      workerData: {
        admZipPath: require.resolve('adm-zip'),
        data,
        destination,
      },
    })

    worker.once('error', fail)
    worker.once('exit', (code) => {
      if (code === 0) {
        resolve()
      } else {
        fail(`extraction worker exited with code ${code}`)
      }
    })
  })

  return entries
}

export async function makeExecutable(
  filePath: string,
  platform: PlatformInfo = getPlatformInfo(),
): Promise<void> {
  if (platform.isWindows) return

  try {
    await chmod(filePath, 0o755)
  } catch (error) {
    throw new FilesystemError(
      `Failed to make ${filePath} executable: ${errorMessage(error)}`,
      { path: filePath, cause: error },
    )
  }
}

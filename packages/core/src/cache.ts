import { homedir } from 'node:os'
import { join } from 'node:path'
import { mkdir } from 'node:fs/promises'
import { FilesystemError, errorMessage } from './errors/index.js'

export type CacheOptions = {
  cacheDir?: string
}

/**
 * Directory drivers are installed into when the caller names none.
 */
export function getCacheDir(options: CacheOptions = {}): string {
  if (options.cacheDir) {
    return options.cacheDir
  }

  if (process.env['DRIVERDOCK_DIR']) {
    return process.env['DRIVERDOCK_DIR']
  }

  // Follow XDG Base Directory Specification on Unix
  if (process.platform !== 'win32' && process.env['XDG_CACHE_HOME']) {
    return join(process.env['XDG_CACHE_HOME'], 'driverdock')
  }

  if (process.platform === 'win32') {
    return join(
      process.env['LOCALAPPDATA'] || join(homedir(), 'AppData', 'Local'),
      'driverdock',
      'cache',
    )
  }

  return join(homedir(), '.cache', 'driverdock')
}

export async function ensureCacheDir(options: CacheOptions = {}): Promise<string> {
  const cacheDir = getCacheDir(options)

  try {
    await mkdir(cacheDir, { recursive: true })
  } catch (error) {
    throw new FilesystemError(
      `Failed to create directory ${cacheDir}: ${errorMessage(error)}`,
      { path: cacheDir, cause: error },
    )
  }

  return cacheDir
}

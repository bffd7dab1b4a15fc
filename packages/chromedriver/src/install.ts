import { existsSync } from 'node:fs'
import { join } from 'node:path'
import {
  ArchiveError,
  createLogger,
  downloadToBuffer,
  ensureCacheDir,
  extractZip,
  makeExecutable,
  type Logger,
} from '@driverdock/core'
import { getDownloadUrl } from './endpoints.js'
import type { PlatformTarget } from './platform.js'

export type DriverDescriptor = Readonly<{
  /**
   * `<outDir>/<archiveBaseName>/<executableName>` built with `path.join`, so
   * `outDir` is normalized (`./drivers/` becomes `drivers`) and separators
   * follow the host.
   */
  driverPath: string
  version: string
}>

export type InstallOptions = {
  outDir: string
  target: PlatformTarget
  version: string
  downloadHost?: string
  signal?: AbortSignal
  logger?: Logger
  onProgress?: (downloaded: number, total: number) => void
}

/**
 * Normalizes `outDir`, see {@link DriverDescriptor.driverPath}.
 */
export function getDriverPath(outDir: string, target: PlatformTarget): string {
  return join(outDir, target.archiveBaseName, target.executableName)
}

function describeDriver(driverPath: string, version: string): DriverDescriptor {
  return Object.freeze({ driverPath, version })
}

/**
 * Installs ChromeDriver `version` for `target` under `outDir`, unless an
 * executable is already there. An existing install is kept whatever its
 * version.
 */
export async function installDriver(
  options: InstallOptions,
): Promise<DriverDescriptor> {
  const {
    outDir,
    target,
    version,
    signal,
    onProgress,
    logger = createLogger(),
  } = options

  const driverPath = getDriverPath(outDir, target)
  if (existsSync(driverPath)) {
    logger.success(`Already installed: ${driverPath}`)
    return describeDriver(driverPath, version)
  }

  const url = getDownloadUrl(options)
  logger.info(`Downloading from: ${url}`)

  const { data } = await downloadToBuffer({ url, signal, onProgress })

  await ensureCacheDir({ cacheDir: outDir })
  await extractZip({ data, destination: outDir })

  if (!existsSync(driverPath)) {
    throw new ArchiveError(
      `Archive ${url} did not contain ` +
        `${target.archiveBaseName}/${target.executableName}`,
      { destination: outDir },
    )
  }

  await makeExecutable(driverPath)

  logger.success(`ChromeDriver ready at: ${driverPath}`)
  return describeDriver(driverPath, version)
}

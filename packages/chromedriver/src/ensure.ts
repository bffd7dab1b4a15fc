import { getCacheDir, createLogger, type Logger } from '@driverdock/core'
import { installDriver, type DriverDescriptor } from './install.js'
import { detectPlatformTarget } from './platform.js'
import { resolveLatestVersion, type ReleaseChannel } from './version.js'

export type EnsureDriverOptions = {
  /** Install root; defaults to {@link getCacheDir} */
  outDir?: string
  /** Pins the version instead of asking the versions endpoint */
  version?: string
  channel?: ReleaseChannel
  os?: string
  arch?: string
  versionsUrl?: string
  downloadHost?: string
  signal?: AbortSignal
  logger?: Logger
  onProgress?: (downloaded: number, total: number) => void
}

/**
 * Makes sure the current ChromeDriver for this platform is installed and
 * returns where it is.
 */
export async function ensureLatestDriver(
  options: EnsureDriverOptions = {},
): Promise<DriverDescriptor> {
  const { channel, versionsUrl, signal, logger = createLogger() } = options

  const version =
    options.version ??
    (await resolveLatestVersion({ channel, versionsUrl, signal, logger }))

  const target = detectPlatformTarget({ os: options.os, arch: options.arch })

  return installDriver({
    outDir: getCacheDir({ cacheDir: options.outDir }),
    target,
    version,
    downloadHost: options.downloadHost,
    signal,
    logger,
    onProgress: options.onProgress,
  })
}

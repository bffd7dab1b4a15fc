import type { PlatformTarget } from './platform.js'

export const DEFAULT_VERSIONS_URL =
  'https://googlechromelabs.github.io/chrome-for-testing/last-known-good-versions.json'

export const DEFAULT_DOWNLOAD_HOST =
  'https://edgedl.me.gvt1.com/edgedl/chrome/chrome-for-testing'

export function getVersionsUrl(options: { versionsUrl?: string } = {}): string {
  return (
    options.versionsUrl ||
    process.env['CHROMEDRIVER_VERSIONS_URL'] ||
    DEFAULT_VERSIONS_URL
  )
}

export function getDownloadHost(options: { downloadHost?: string } = {}): string {
  const host =
    options.downloadHost ||
    process.env['CHROMEDRIVER_CDN_URL'] ||
    DEFAULT_DOWNLOAD_HOST
  return host.replace(/\/+$/, '')
}

/**
 * `<host>/<version>/<platform>/<archiveBaseName>.zip`
 */
export function getDownloadUrl(options: {
  version: string
  target: PlatformTarget
  downloadHost?: string
}): string {
  const { version, target } = options
  const host = getDownloadHost(options)
  return `${host}/${version}/${target.platform}/${target.archiveBaseName}.zip`
}

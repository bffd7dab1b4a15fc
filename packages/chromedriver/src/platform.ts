import {
  getPlatformInfo,
  UnsupportedPlatformError,
  type PlatformOverrides,
} from '@driverdock/core'

export type PlatformTag = 'mac-arm64' | 'mac-x64' | 'win64'

export type PlatformTarget = {
  /** Chrome for Testing platform tag, used in the download URL */
  platform: PlatformTag
  executableName: string
  /** Archive file stem, also the top-level directory inside the archive */
  archiveBaseName: string
}

export type PlatformResolution =
  | { ok: true; target: PlatformTarget }
  | { ok: false; error: UnsupportedPlatformError }

export const SUPPORTED_PLATFORMS: PlatformTag[] = [
  'mac-arm64',
  'mac-x64',
  'win64',
]

function toTarget(platform: PlatformTag, executableExtension: string): PlatformTarget {
  return {
    platform,
    executableName: `chromedriver${executableExtension}`,
    archiveBaseName: `chromedriver-${platform}`,
  }
}

export function resolvePlatformTarget(os: string, arch: string): PlatformResolution {
  const { executableExtension } = getPlatformInfo({ os, arch })

  switch (os) {
    case 'darwin':
      return {
        ok: true,
        target: toTarget(arch === 'arm64' ? 'mac-arm64' : 'mac-x64', executableExtension),
      }
    case 'win32':
      return { ok: true, target: toTarget('win64', executableExtension) }
    default:
      return {
        ok: false,
        error: new UnsupportedPlatformError(
          `Unsupported OS: ${os} (${arch}). ` +
            `Supported platforms: ${SUPPORTED_PLATFORMS.join(', ')}`,
          { os, arch },
        ),
      }
  }
}

/**
 * Maps the host, or the platform named by `overrides`, to its download target.
 *
 * @throws {UnsupportedPlatformError} for anything but macOS and Windows
 */
export function detectPlatformTarget(overrides: PlatformOverrides = {}): PlatformTarget {
  const { os, arch } = getPlatformInfo(overrides)
  const resolution = resolvePlatformTarget(os, arch)

  if (!resolution.ok) {
    throw resolution.error
  }

  return resolution.target
}

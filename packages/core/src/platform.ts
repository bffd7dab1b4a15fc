export type PlatformInfo = {
  os: string
  arch: string
  isWindows: boolean
  executableExtension: string
}

export type PlatformOverrides = {
  os?: string
  arch?: string
}

/**
 * Describes the host, or the platform named by `overrides`. Identifiers use
 * Node's vocabulary (`process.platform`, `process.arch`).
 */
export function getPlatformInfo(overrides: PlatformOverrides = {}): PlatformInfo {
  const os = overrides.os ?? process.platform
  const arch = overrides.arch ?? process.arch
  const isWindows = os === 'win32'

  return {
    os,
    arch,
    isWindows,
    executableExtension: isWindows ? '.exe' : '',
  }
}

export {
  type DriverDescriptor,
  type InstallOptions,
  getDriverPath,
  installDriver,
} from './install.js'

export { type EnsureDriverOptions, ensureLatestDriver } from './ensure.js'

export {
  type PlatformTag,
  type PlatformTarget,
  type PlatformResolution,
  resolvePlatformTarget,
  detectPlatformTarget,
  SUPPORTED_PLATFORMS,
} from './platform.js'

export {
  type ReleaseChannel,
  type ResolveVersionOptions,
  parseVersionsDocument,
  resolveLatestVersion,
} from './version.js'

export { type ProbeOptions, type ProbeResult, checkDriverVersion } from './probe.js'

export {
  DEFAULT_VERSIONS_URL,
  DEFAULT_DOWNLOAD_HOST,
  getVersionsUrl,
  getDownloadHost,
  getDownloadUrl,
} from './endpoints.js'

export {
  DriverdockError,
  NetworkError,
  ParseError,
  MissingFieldError,
  UnsupportedPlatformError,
  ArchiveError,
  FilesystemError,
  ProcessError,
} from '@driverdock/core'

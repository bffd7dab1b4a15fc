// Platform detection
export {
  type PlatformInfo,
  type PlatformOverrides,
  getPlatformInfo,
} from './platform.js'

// Download utilities
export {
  type RequestOptions,
  type DownloadOptions,
  type DownloadResult,
  USER_AGENT,
  fetchText,
  downloadToBuffer,
  formatBytes,
  createProgressLogger,
} from './download.js'

// Extract utilities
export {
  type ExtractOptions,
  extractZip,
  makeExecutable,
} from './extract.js'

// Output directory
export {
  type CacheOptions,
  getCacheDir,
  ensureCacheDir,
} from './cache.js'

// Subprocesses
export {
  type RunOptions,
  type RunResult,
  runExecutable,
} from './process.js'

// Logging
export {
  type LogOutput,
  type Logger,
  type LoggerOptions,
  createLogger,
  silentLogger,
} from './log.js'

// Errors
export * from './errors/index.js'

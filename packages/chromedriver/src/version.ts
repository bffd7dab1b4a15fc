import {
  createLogger,
  fetchText,
  MissingFieldError,
  ParseError,
  errorMessage,
  type Logger,
} from '@driverdock/core'
import { getVersionsUrl } from './endpoints.js'

export type ReleaseChannel = 'Stable' | 'Beta' | 'Dev' | 'Canary'

export type ResolveVersionOptions = {
  channel?: ReleaseChannel
  versionsUrl?: string
  signal?: AbortSignal
  logger?: Logger
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reads `channels.<channel>.version` from a last-known-good-versions document.
 */
export function parseVersionsDocument(
  body: string,
  options: { channel?: ReleaseChannel; url?: string } = {},
): string {
  const { channel = 'Stable', url = getVersionsUrl() } = options

  let document: unknown
  try {
    document = JSON.parse(body)
  } catch (error) {
    throw new ParseError(
      `Version metadata from ${url} is not valid JSON: ${errorMessage(error)}`,
      { url, cause: error },
    )
  }

  if (!isRecord(document)) {
    throw new ParseError(`Version metadata from ${url} is not a JSON object`, {
      url,
    })
  }

  const path = ['channels', channel, 'version']
  let current: unknown = document
  for (const key of path) {
    current = isRecord(current) ? current[key] : undefined
  }

  const field = path.join('.')
  if (typeof current !== 'string' || current.length === 0) {
    throw new MissingFieldError(
      `Version metadata from ${url} has no ${field}`,
      { field, url },
    )
  }

  return current
}

export async function resolveLatestVersion(
  options: ResolveVersionOptions = {},
): Promise<string> {
  const { channel = 'Stable', signal, logger = createLogger() } = options
  const url = getVersionsUrl(options)

  const body = await fetchText(url, { signal })
  const version = parseVersionsDocument(body, { channel, url })

  logger.info(`Latest ChromeDriver version: ${version}`)
  return version
}

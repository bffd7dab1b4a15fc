import { NetworkError, errorMessage } from './errors/index.js'
import type { LogOutput } from './log.js'

export const USER_AGENT = 'driverdock/0.1.0'

export type RequestOptions = {
  signal?: AbortSignal
}

export type DownloadOptions = RequestOptions & {
  url: string
  onProgress?: (downloaded: number, total: number) => void
}

export type DownloadResult = {
  url: string
  data: Buffer
  size: number
}

async function request(url: string, options: RequestOptions): Promise<Response> {
  let response: Response

  try {
    response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
      },
      signal: options.signal,
    })
  } catch (error) {
    throw new NetworkError(`Failed to fetch ${url}: ${errorMessage(error)}`, {
      url,
      cause: error,
    })
  }

  if (!response.ok) {
    throw new NetworkError(
      `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
      { url, status: response.status },
    )
  }

  return response
}

export async function fetchText(
  url: string,
  options: RequestOptions = {},
): Promise<string> {
  const response = await request(url, options)

  try {
    return await response.text()
  } catch (error) {
    throw new NetworkError(
      `Failed to read response from ${url}: ${errorMessage(error)}`,
      { url, cause: error },
    )
  }
}

/**
 * Downloads the whole response body into memory.
 */
export async function downloadToBuffer(
  options: DownloadOptions,
): Promise<DownloadResult> {
  const { url, onProgress } = options

  const response = await request(url, options)

  if (!response.body) {
    throw new NetworkError(`No response body received from ${url}`, { url })
  }

  const total = Number(response.headers.get('content-length')) || 0
  let downloaded = 0

  const chunks: Uint8Array[] = []
  const reader = response.body.getReader()

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      chunks.push(value)
      downloaded += value.length
      onProgress?.(downloaded, total)
    }
  } catch (error) {
    throw new NetworkError(
      `Download of ${url} was interrupted: ${errorMessage(error)}`,
      { url, cause: error },
    )
  }

  return {
    url,
    data: Buffer.concat(chunks, downloaded),
    size: downloaded,
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const k = 1024
  const sizes = ['B', 'KB', 'MB', 'GB']
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}

export function createProgressLogger(
  options: { prefix?: string; output?: LogOutput } = {},
): (downloaded: number, total: number) => void {
  const { prefix = '', output = process.stdout } = options
  let lastPercent = -1

  return (downloaded: number, total: number) => {
    const percent = total > 0 ? Math.round((downloaded / total) * 100) : 0

    if (percent !== lastPercent) {
      lastPercent = percent
      const downloadedStr = formatBytes(downloaded)
      const totalStr = total > 0 ? formatBytes(total) : 'unknown'
      output.write(
        `\r${prefix}Downloading... ${percent}% (${downloadedStr}/${totalStr})`,
      )
    }
  }
}

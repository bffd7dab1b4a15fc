import { spawn, type ChildProcessByStdio } from 'node:child_process'
import type { Readable } from 'node:stream'
import { ProcessError, errorMessage } from './errors/index.js'

export type RunOptions = {
  signal?: AbortSignal
}

export type RunResult = {
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
}

/**
 * Runs an executable to completion. Rejects with {@link ProcessError} only
 * when the process cannot be spawned or is aborted; the exit status is
 * reported in the result.
 */
export function runExecutable(
  file: string,
  args: string[],
  options: RunOptions = {},
): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const fail = (error: unknown) =>
      reject(
        new ProcessError(`Failed to run ${file}: ${errorMessage(error)}`, {
          path: file,
          cause: error,
        }),
      )

    let child: ChildProcessByStdio<null, Readable, Readable>
    try {
      child = spawn(file, args, {
        signal: options.signal,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      })
    } catch (error) {
      fail(error)
      return
    }

    let stdout = ''
    let stderr = ''
    child.stdout.setEncoding('utf8')
    child.stderr.setEncoding('utf8')
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk
    })
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk
    })

    child.once('error', fail)
    child.once('close', (exitCode, signal) => {
      resolve({ exitCode, signal, stdout, stderr })
    })
  })
}

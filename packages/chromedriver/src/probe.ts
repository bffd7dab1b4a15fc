import {
  createLogger,
  runExecutable,
  type Logger,
  type RunResult,
} from '@driverdock/core'

export type ProbeResult = RunResult

export type ProbeOptions = {
  signal?: AbortSignal
  logger?: Logger
}

/**
 * Runs `<driverPath> --version` to confirm the installed driver starts.
 * A non-zero exit is logged and returned rather than thrown.
 *
 * @throws {ProcessError} when the driver cannot be spawned
 */
export async function checkDriverVersion(
  driverPath: string,
  options: ProbeOptions = {},
): Promise<ProbeResult> {
  const { signal, logger = createLogger() } = options

  const result = await runExecutable(driverPath, ['--version'], { signal })
  const status = result.exitCode ?? result.signal

  if (result.exitCode === 0) {
    logger.success(`Driver check finished: ${result.stdout.trim()}`)
  } else {
    logger.warn(`Driver check finished with status: ${status}`)
  }

  return result
}

export type LogOutput = {
  write(chunk: string): unknown
  isTTY?: boolean
}

export type Logger = {
  info(message: string): void
  success(message: string): void
  warn(message: string): void
}

export type LoggerOptions = {
  output?: LogOutput
  colors?: boolean
}

const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
}

/**
 * Line logger for install notices. Colors default to on when the output is a
 * terminal.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { output = process.stdout } = options
  const useColors = options.colors ?? output.isTTY === true

  const paint = (color: string, symbol: string) =>
    useColors ? `${color}${symbol}${colors.reset}` : symbol

  return {
    info(message) {
      output.write(`${paint(colors.cyan, '▶')} ${message}\n`)
    },
    success(message) {
      output.write(`${paint(colors.green, '✓')} ${message}\n`)
    },
    warn(message) {
      output.write(`${paint(colors.yellow, '⚠')} ${message}\n`)
    },
  }
}

export const silentLogger: Logger = {
  info() {},
  success() {},
  warn() {},
}

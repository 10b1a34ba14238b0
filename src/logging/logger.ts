/**
 * Line-oriented component logger.
 *
 * Writes through process.stderr so stdout stays reserved for command output
 * (decision JSON, tables). No colors, no emojis.
 */
export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export type LogLevel = 'info' | 'warn' | 'error'

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 }

/**
 * Create a stderr logger. Each line is `[component] LEVEL: message`.
 *
 * @param component - Name shown in brackets at the start of each line
 * @param minLevel - Messages below this level are dropped
 */
export function createLogger(component: string, minLevel: LogLevel = 'info'): Logger {
  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return
    process.stderr.write(`[${component}] ${level.toUpperCase()}: ${message}\n`)
  }
  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  }
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
}

/** Render an unknown thrown value as a message string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

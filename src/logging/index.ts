/**
 * logging — Namespaced, levelled console output.
 *
 * Library code logs through createLogger(); applications pick the threshold
 * with configureLogging() or the DEEPSKY_LOG_LEVEL environment variable.
 * Default threshold is 'warn', so a quiet library stays quiet.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void
  info(message: string, details?: Record<string, unknown>): void
  warn(message: string, details?: Record<string, unknown>): void
  error(message: string, details?: Record<string, unknown>): void
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

function levelFromEnv(): LogLevel {
  const raw = process.env['DEEPSKY_LOG_LEVEL']?.toLowerCase()
  return isLogLevel(raw) ? raw : 'warn'
}

let threshold: LogLevel = levelFromEnv()

/**
 * Set the minimum level that reaches the console.
 * Omitting the level restores the environment default.
 */
export function configureLogging(options: { level?: LogLevel } = {}): void {
  threshold = options.level ?? levelFromEnv()
}

export function getLogLevel(): LogLevel {
  return threshold
}

/** Create a logger whose lines are prefixed with `[deepsky:<namespace>]`. */
export function createLogger(namespace: string): Logger {
  const prefix = `[deepsky:${namespace}]`

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return
    const line = `${prefix} ${message}`
    if (details) console[level](line, details)
    else console[level](line)
  }

  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
  }
}

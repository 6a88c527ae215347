/**
 * Console logging with `[Component]` prefixes.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value)
}

export function createLogger(component: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVELS[level]
  const prefix = `[${component}]`

  return {
    debug: (message, ...args) => {
      if (threshold <= LEVELS.debug) console.debug(`${prefix} ${message}`, ...args)
    },
    info: (message, ...args) => {
      if (threshold <= LEVELS.info) console.log(`${prefix} ${message}`, ...args)
    },
    warn: (message, ...args) => {
      if (threshold <= LEVELS.warn) console.warn(`${prefix} ${message}`, ...args)
    },
    error: (message, ...args) => {
      if (threshold <= LEVELS.error) console.error(`${prefix} ${message}`, ...args)
    }
  }
}

export const silentLogger: Logger = createLogger('silent', 'silent')

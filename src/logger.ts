/**
 * Leveled console logging, one scope per service
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

let currentLevel: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

export function getLogLevel(): LogLevel {
  return currentLevel
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel]
}

export interface Logger {
  debug(message: string, data?: unknown): void
  info(message: string, data?: unknown): void
  warn(message: string, data?: unknown): void
  error(message: string, error?: unknown): void
}

export function createLogger(scope: string): Logger {
  const prefix = (level: string) => `[${level}] [${scope}]`

  return {
    debug: (message, data) => {
      if (enabled('debug')) {
        console.log(`${prefix('DEBUG')} ${message}`, data !== undefined ? data : '')
      }
    },

    info: (message, data) => {
      if (enabled('info')) {
        console.log(`${prefix('INFO')} ${message}`, data !== undefined ? data : '')
      }
    },

    warn: (message, data) => {
      if (enabled('warn')) {
        console.warn(`${prefix('WARN')} ${message}`, data !== undefined ? data : '')
      }
    },

    error: (message, error) => {
      if (enabled('error')) {
        console.error(`${prefix('ERROR')} ${message}`, error !== undefined ? error : '')
      }
    }
  }
}

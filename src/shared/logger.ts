export type LogLevel = 'info' | 'warn' | 'error' | 'debug'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

const styles = {
  info: { label: 'INFO', ansi: '\x1b[32m' },
  warn: { label: 'WARN', ansi: '\x1b[33m' },
  error: { label: 'ERROR', ansi: '\x1b[31m' },
  debug: { label: 'DEBUG', ansi: '\x1b[34m' }
}

let threshold: LogLevel = 'info'

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Messages below this level are dropped.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
}

function format(level: LogLevel, message: unknown, args: unknown[]): unknown[] {
  const style = styles[level]
  return [`${style.ansi}[${style.label}]\x1b[0m`, message, ...args]
}

export const log = {
  info: (message: unknown, ...args: unknown[]) => {
    if (enabled('info')) console.info(...format('info', message, args))
  },
  warn: (message: unknown, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(...format('warn', message, args))
  },
  error: (message: unknown, ...args: unknown[]) => {
    if (enabled('error')) console.error(...format('error', message, args))
  },
  debug: (message: unknown, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(...format('debug', message, args))
  }
}

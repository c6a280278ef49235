/**
 * termflow Logging
 * ================
 *
 * Minimal leveled logger over `console`. Managers, routers and apps accept any
 * object with this shape, so a host can pass its own logger instead.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

/** Destination for log lines. `console` matches it. */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

export interface LoggerOptions {
  level?: LogLevel
  prefix?: string
  sink?: LogSink
}

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', prefix = '[termflow]', sink = console } = options
  const threshold = LEVELS[level]
  const write = (messageLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...details: unknown[]): void => {
      if (LEVELS[messageLevel] < threshold) return
      sink[messageLevel](prefix ? `${prefix} ${message}` : message, ...details)
    }

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  }
}

export const consoleLogger: Logger = createLogger()

export const nullLogger: Logger = createLogger({ level: 'silent' })

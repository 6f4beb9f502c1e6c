export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  [key: string]: unknown
}

/**
 * Minimal logger accepted by every component
 */
export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

export interface ConsoleLoggerOptions {
  /** Prefix printed in brackets before every line (default: 'transcribe') */
  prefix?: string
  /** Print debug lines (default: false) */
  verbose?: boolean
}

/**
 * Console-backed logger. Debug output only appears in verbose mode.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${options.prefix ?? 'transcribe'}]`
  const verbose = options.verbose ?? false

  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    const args: unknown[] = context && Object.keys(context).length > 0
      ? [`${prefix} ${message}`, context]
      : [`${prefix} ${message}`]

    if (level === 'error') {
      console.error(...args)
    } else if (level === 'warn') {
      console.warn(...args)
    } else if (level === 'debug') {
      if (verbose) {
        console.debug(...args)
      }
    } else {
      console.log(...args)
    }
  }

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context)
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
}

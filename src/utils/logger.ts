/**
 * Logging interface shared by the resolver, adapters, merge engine and pipeline
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogMethod = (message: string, context?: Record<string, unknown>) => void

/**
 * Structured logger. Components receive one through their options and fall
 * back to a silent logger.
 */
export type Logger = Record<LogLevel, LogMethod>

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

/**
 * Console logger writing `[LEVEL] message` lines. Levels below `minLevel`
 * are dropped.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger('debug')
 * logger.warn('Conflicting value kept', { field: 'homeGoals' })
 * // [WARN] Conflicting value kept { field: 'homeGoals' }
 * ```
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const method =
    (level: LogLevel): LogMethod =>
    (message, context) => {
      if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return
      const line = `[${level.toUpperCase()}] ${message}`
      if (context === undefined) {
        console[level](line)
      } else {
        console[level](line, context)
      }
    }

  return {
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
  }
}

export const defaultLogger: Logger = createConsoleLogger('info')

export function createSilentLogger(): Logger {
  const noop: LogMethod = () => {}
  return { debug: noop, info: noop, warn: noop, error: noop }
}

/**
 * Tags every message with `[name]`. Prefixed loggers nest:
 * `[ingestion] [league-matches] ...`.
 */
export function createPrefixedLogger(name: string, base: Logger): Logger {
  const tag = (message: string): string => `[${name}] ${message}`
  return {
    debug: (message, context) => base.debug(tag(message), context),
    info: (message, context) => base.info(tag(message), context),
    warn: (message, context) => base.warn(tag(message), context),
    error: (message, context) => base.error(tag(message), context),
  }
}

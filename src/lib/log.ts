import { z } from 'zod'
import { LOG_LEVELS, type LogLevel } from './config'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 }

const envLevel = z.enum(LOG_LEVELS).catch('info')

/** Level from FEDSTATS_LOG_LEVEL, read on every call so tests and hosts can change it. */
function currentLevel(): LogLevel {
  return envLevel.parse(process.env.FEDSTATS_LOG_LEVEL?.trim() || 'info')
}

/** Console logger with a `[scope]` prefix. A fixed level overrides the environment. */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const enabled = (at: LogLevel) => RANK[at] >= RANK[level ?? currentLevel()]
  const prefix = `[${scope}]`
  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(prefix, message)
    },
    info: (message) => {
      if (enabled('info')) console.info(prefix, message)
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(prefix, message)
    },
    error: (message) => {
      if (enabled('error')) console.error(prefix, message)
    },
  }
}

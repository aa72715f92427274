import type { LogLevel } from '@/features/settings/settingsTypes'

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

export type Logger = {
  error: (message: string, ...details: unknown[]) => void
  warn: (message: string, ...details: unknown[]) => void
  info: (message: string, ...details: unknown[]) => void
  debug: (message: string, ...details: unknown[]) => void
}

export const createLogger = (scope: string, level: LogLevel = 'warn'): Logger => {
  const enabled = (at: LogLevel) => LEVEL_RANK[at] <= LEVEL_RANK[level]
  const prefix = `[${scope}]`

  return {
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details)
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details)
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(prefix, message, ...details)
    },
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details)
    },
  }
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export type BrowserSettings = {
  startDir: string
  cacheSize: number
  maxFileBytes: number
  showHidden: boolean
  logLevel: LogLevel
}

export const MAX_FILE_BYTES = 10 * 1024 * 1024

export const DEFAULT_SETTINGS: BrowserSettings = {
  startDir: '.',
  cacheSize: 100,
  maxFileBytes: MAX_FILE_BYTES,
  showHidden: true,
  logLevel: 'warn',
}

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug']

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value)

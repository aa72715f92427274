export * from './features/navigation'
export * from './features/settings'
export * from './features/shortcuts'
export { BrowserError, isBrowserError, normalizeError, getErrorMessage, getErrorCode } from './shared/lib/error'
export type { ErrorKind, NormalizedError } from './shared/lib/error'
export { createLogger, silentLogger } from './shared/lib/log'
export type { Logger } from './shared/lib/log'

export type ErrorKind = 'io' | 'path' | 'parse' | 'cache' | 'state'

const KIND_LABEL: Record<ErrorKind, string> = {
  io: 'IO error',
  path: 'Path error',
  parse: 'Parse error',
  cache: 'Cache error',
  state: 'State error',
}

export class BrowserError extends Error {
  readonly kind: ErrorKind
  readonly path?: string

  constructor(kind: ErrorKind, message: string, opts: { path?: string; cause?: unknown } = {}) {
    super(`${KIND_LABEL[kind]}: ${message}`, opts.cause === undefined ? undefined : { cause: opts.cause })
    this.name = 'BrowserError'
    this.kind = kind
    this.path = opts.path
  }
}

export const isBrowserError = (value: unknown, kind?: ErrorKind): value is BrowserError =>
  value instanceof BrowserError && (kind === undefined || value.kind === kind)

export type NormalizedError = Error & {
  code?: string
  details?: unknown
  raw?: unknown
}

type ErrorLike = {
  code?: unknown
  message?: unknown
  details?: unknown
}

const asRecord = (value: unknown): Record<string, unknown> | null => {
  if (value && typeof value === 'object') return { ...value }
  return null
}

const asErrorLike = (value: unknown): ErrorLike | null => {
  const record = asRecord(value)
  if (!record) return null
  return {
    code: record.code,
    message: record.message,
    details: record.details,
  }
}

export const normalizeError = (value: unknown): NormalizedError => {
  if (value instanceof Error) {
    return value
  }

  const like = asErrorLike(value)
  const message =
    typeof like?.message === 'string'
      ? like.message
      : typeof value === 'string'
        ? value
        : (() => {
            try {
              return JSON.stringify(value)
            } catch {
              return String(value)
            }
          })()

  const error: NormalizedError = new Error(message || 'Unknown error')
  if (typeof like?.code === 'string') error.code = like.code
  if (like && 'details' in like) error.details = like.details
  error.raw = value
  return error
}

export const getErrorMessage = (value: unknown): string => normalizeError(value).message

export const getErrorCode = (value: unknown): string | undefined => normalizeError(value).code

// Node errno codes (ENOENT, EACCES, ...) are appended to the message.
export const toBrowserError = (value: unknown, kind: ErrorKind, message: string, path?: string) => {
  if (value instanceof BrowserError) return value
  const code = getErrorCode(value)
  const detail = code ? `${message} (${code})` : message
  return new BrowserError(kind, detail, { path, cause: value })
}

import { DEFAULT_SETTINGS, isLogLevel, type BrowserSettings } from './settingsTypes'

export const SETTINGS_ENV = {
  startDir: 'FOLDTRAIL_START_DIR',
  cacheSize: 'FOLDTRAIL_CACHE_SIZE',
  maxFileBytes: 'FOLDTRAIL_MAX_FILE_BYTES',
  showHidden: 'FOLDTRAIL_SHOW_HIDDEN',
  logLevel: 'FOLDTRAIL_LOG_LEVEL',
} as const

type Env = Record<string, string | undefined>

const parsePositiveInt = (raw: string | undefined) => {
  if (raw === undefined || raw.trim() === '') return null
  if (!/^\d+$/.test(raw.trim())) return undefined
  const value = Number(raw.trim())
  return Number.isSafeInteger(value) && value > 0 ? value : undefined
}

const parseBool = (raw: string | undefined) => {
  if (raw === undefined || raw.trim() === '') return null
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false
    default:
      return undefined
  }
}

/**
 * Reads overrides from the environment. Unset variables keep the defaults;
 * malformed values keep the defaults too and are reported through `onInvalid`.
 */
export const loadSettings = (
  env: Env = process.env,
  onInvalid: (name: string, value: string) => void = (name, value) =>
    console.warn(`Ignoring invalid ${name}=${JSON.stringify(value)}`),
): BrowserSettings => {
  const settings: BrowserSettings = { ...DEFAULT_SETTINGS }

  const startDir = env[SETTINGS_ENV.startDir]?.trim()
  if (startDir) settings.startDir = startDir

  const cacheSize = parsePositiveInt(env[SETTINGS_ENV.cacheSize])
  if (cacheSize) {
    settings.cacheSize = cacheSize
  } else if (cacheSize === undefined) {
    onInvalid(SETTINGS_ENV.cacheSize, env[SETTINGS_ENV.cacheSize] ?? '')
  }

  const maxFileBytes = parsePositiveInt(env[SETTINGS_ENV.maxFileBytes])
  if (maxFileBytes) {
    settings.maxFileBytes = maxFileBytes
  } else if (maxFileBytes === undefined) {
    onInvalid(SETTINGS_ENV.maxFileBytes, env[SETTINGS_ENV.maxFileBytes] ?? '')
  }

  const showHidden = parseBool(env[SETTINGS_ENV.showHidden])
  if (typeof showHidden === 'boolean') {
    settings.showHidden = showHidden
  } else if (showHidden === undefined) {
    onInvalid(SETTINGS_ENV.showHidden, env[SETTINGS_ENV.showHidden] ?? '')
  }

  const logLevel = env[SETTINGS_ENV.logLevel]?.trim().toLowerCase()
  if (logLevel) {
    if (isLogLevel(logLevel)) {
      settings.logLevel = logLevel
    } else {
      onInvalid(SETTINGS_ENV.logLevel, env[SETTINGS_ENV.logLevel] ?? '')
    }
  }

  return settings
}

export { DEFAULT_SETTINGS, MAX_FILE_BYTES, LOG_LEVELS, isLogLevel } from './settingsTypes'
export type { BrowserSettings, LogLevel } from './settingsTypes'
export { loadSettings, SETTINGS_ENV } from './loadSettings'

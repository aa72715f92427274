export { createBrowser } from './createBrowser'
export type { Browser } from './createBrowser'
export { createNavigationEngine } from './state/createNavigationEngine'
export type { NavigationEngine } from './state/createNavigationEngine'
export { createDirectoryCache, DEFAULT_CACHE_SIZE } from './state/directoryCache'
export type { DirectoryCache, RemovalReason } from './state/directoryCache'
export { createModeMachine, INITIAL_MODE_STATE } from './state/modeMachine'
export type { ModeMachine, ModeState } from './state/modeMachine'
export { createBrowserSession } from './session/createBrowserSession'
export type { BrowserSession, OpenedFile } from './session/createBrowserSession'
export { scrollFileView, PAGE_ROWS } from './session/fileViewScroll'
export type { ScrollCommand, ScrollPosition } from './session/fileViewScroll'
export { createKeyHandler } from './handlers/createKeyHandler'
export type { KeyHandler } from './handlers/createKeyHandler'
export { createInputBuffer } from './handlers/inputBuffer'
export type { InputBuffer } from './handlers/inputBuffer'
export { shouldSelect } from './filters/fuzzyMatch'
export { wrapIndex } from './helpers/navigationController'
export {
  canonicalPath,
  entryFromPath,
  fullPath,
  isParentShortcut,
  parentShortcut,
  relativeTo,
  PARENT_SHORTCUT,
} from './model/entry'
export type { DirectorySnapshot, Entry, FileTextInfo, InputMode, ViewMode } from './model/types'
export { listDir } from './services/listing.service'
export type { ListDir, ListOptions } from './services/listing.service'
export { loadFileText, removeEntry, textDimensions } from './services/files.service'
export { plainTextHighlighter, splitLinesWithEndings } from './services/highlighter'
export type { Highlighter } from './services/highlighter'

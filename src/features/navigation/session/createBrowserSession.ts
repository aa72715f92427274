import { get, writable, type Readable } from 'svelte/store'
import { BrowserError, getErrorMessage, isBrowserError } from '@/shared/lib/error'
import { silentLogger, type Logger } from '@/shared/lib/log'
import { MAX_FILE_BYTES } from '@/features/settings/settingsTypes'
import type { FileTextInfo } from '../model/types'
import { wrapIndex } from '../helpers/navigationController'
import {
  isDirectoryPath,
  loadFileText,
  removeEntry as removeFromDisk,
  type LoadFileText,
  type RemoveEntry,
} from '../services/files.service'
import type { Highlighter } from '../services/highlighter'
import type { NavigationEngine } from '../state/createNavigationEngine'
import type { ModeMachine } from '../state/modeMachine'
import { scrollFileView, TOP_LEFT, type ScrollCommand, type ScrollPosition } from './fileViewScroll'

export type OpenedFile = {
  path: string
  info: FileTextInfo
  scroll: ScrollPosition
}

type Deps = {
  engine: NavigationEngine
  modes: ModeMachine
  maxFileBytes?: number
  highlighter?: Highlighter
  loadFile?: LoadFileText
  removeEntry?: RemoveEntry
  logger?: Logger
}

/**
 * Sits between key handling and the navigation engine: keeps the signed
 * highlight index, decides what a submit means and owns the opened file.
 */
export const createBrowserSession = (deps: Deps) => {
  const {
    engine,
    modes,
    maxFileBytes = MAX_FILE_BYTES,
    highlighter,
    loadFile = loadFileText,
    removeEntry = removeFromDisk,
    logger = silentLogger,
  } = deps

  let rawHighlightIndex = 0
  const fileView = writable<OpenedFile | null>(null)
  const status = writable<string | null>(null)

  const resetIndex = () => {
    rawHighlightIndex = 0
  }
  const moveUp = () => {
    rawHighlightIndex -= 1
  }
  const moveDown = () => {
    rawHighlightIndex += 1
  }

  /** Wrapped index into the current selection, or null when nothing is selected. */
  const highlightIndex = () => {
    const len = get(engine.selected).length
    return len === 0 ? null : wrapIndex(rawHighlightIndex, len)
  }

  const update = (filter?: string) => {
    engine.update(filter)
    resetIndex()
  }

  const openFile = (filePath: string) => {
    const info = loadFile(filePath, { maxBytes: maxFileBytes, highlighter })
    fileView.set({ path: filePath, info, scroll: TOP_LEFT })
    modes.toFileView()
  }

  const resolveHighlighted = (index: number) => {
    const target = engine.submit(index)
    return { target, isDirectory: isDirectoryPath(target) }
  }

  const submit = () => {
    const index = highlightIndex()
    if (index === null) return

    let resolved: { target: string; isDirectory: boolean }
    try {
      resolved = resolveHighlighted(index)
    } catch (err) {
      if (!isBrowserError(err, 'path')) throw err
      logger.info(getErrorMessage(err))
      if (modes.isHistorySearch()) {
        engine.dropInvalidFolder(index)
      } else {
        engine.refresh()
      }
      return
    }

    if (!resolved.isDirectory) {
      openFile(resolved.target)
      return
    }
    if (modes.isHistorySearch()) modes.toSearch()
    engine.enter(resolved.target)
    resetIndex()
  }

  const toParent = () => {
    update('')
    submit()
  }

  const refresh = () => {
    engine.refresh()
  }

  const deleteHighlighted = () => {
    const index = highlightIndex()
    if (index === null) return

    let target: string
    try {
      target = engine.submit(index)
    } catch (err) {
      if (!isBrowserError(err, 'path')) throw err
      logger.warn(getErrorMessage(err))
      return
    }

    try {
      removeEntry(target)
    } catch (err) {
      logger.warn(`Delete failed for ${target}`, getErrorMessage(err))
    }
    engine.refresh()
  }

  const resetFileView = () => {
    fileView.set(null)
  }

  const reset = () => {
    engine.update('')
    resetFileView()
    resetIndex()
  }

  const closeFile = () => {
    resetFileView()
    modes.restorePreviousState()
  }

  const scroll = (command: ScrollCommand) => {
    const opened = get(fileView)
    if (!opened) {
      throw new BrowserError('state', 'No file is open')
    }
    fileView.set({ ...opened, scroll: scrollFileView(opened.scroll, opened.info, command) })
  }

  const report = (err: unknown) => {
    status.set(getErrorMessage(err))
  }

  const clearStatus = () => {
    status.set(null)
  }

  return {
    fileView: { subscribe: fileView.subscribe } satisfies Readable<OpenedFile | null>,
    status: { subscribe: status.subscribe } satisfies Readable<string | null>,
    rawHighlightIndex: () => rawHighlightIndex,
    highlightIndex,
    moveUp,
    moveDown,
    resetIndex,
    update,
    expand: () => engine.expand(),
    collapse: () => engine.collapse(),
    submit,
    toParent,
    refresh,
    deleteHighlighted,
    reset,
    resetFileView,
    closeFile,
    scroll,
    report,
    clearStatus,
  }
}

export type BrowserSession = ReturnType<typeof createBrowserSession>

import { get, writable } from 'svelte/store'
import type { InputMode, ViewMode } from '../model/types'

export type ModeState = {
  inputMode: InputMode
  viewMode: ViewMode
  prevInputMode: InputMode
  prevViewMode: ViewMode
}

export const INITIAL_MODE_STATE: ModeState = {
  inputMode: 'edit',
  viewMode: 'search',
  prevInputMode: 'edit',
  prevViewMode: 'search',
}

/**
 * Input mode x view mode. Reachable pairs: (normal, search), (edit, search),
 * (edit, historyFolderView) and (normal, fileView).
 *
 * Every transition remembers the pair it left, so `restorePreviousState` can
 * step back exactly once (used when leaving the file view).
 */
export const createModeMachine = (initial: ModeState = INITIAL_MODE_STATE) => {
  const state = writable<ModeState>({ ...initial })

  const transition = (inputMode: InputMode, viewMode: ViewMode) => {
    state.update((s) => ({
      inputMode,
      viewMode,
      prevInputMode: s.inputMode,
      prevViewMode: s.viewMode,
    }))
  }

  const toSearch = () => transition('normal', 'search')
  const toSearchEdit = () => transition('edit', 'search')
  const toHistorySearch = () => transition('edit', 'historyFolderView')
  const toFileView = () => transition('normal', 'fileView')

  const restorePreviousState = () => {
    state.update((s) => ({ ...s, inputMode: s.prevInputMode, viewMode: s.prevViewMode }))
  }

  const isEdit = () => get(state).inputMode === 'edit'
  const isHistorySearch = () => get(state).viewMode === 'historyFolderView'
  const isFileView = () => get(state).viewMode === 'fileView'

  const modeKey = (): `${InputMode}:${ViewMode}` => {
    const { inputMode, viewMode } = get(state)
    return `${inputMode}:${viewMode}`
  }

  return {
    subscribe: state.subscribe,
    toSearch,
    toSearchEdit,
    toHistorySearch,
    toFileView,
    restorePreviousState,
    isEdit,
    isHistorySearch,
    isFileView,
    modeKey,
  }
}

export type ModeMachine = ReturnType<typeof createModeMachine>

import type { InputMode, ViewMode } from '@/features/navigation/model/types'
import { BrowserError } from '@/shared/lib/error'

export type ShortcutContext = `${InputMode}:${ViewMode}` | 'global'

export type ShortcutCommandId =
  | 'refresh'
  | 'history'
  | 'expand'
  | 'collapse'
  | 'edit_search'
  | 'normal_search'
  | 'move_up'
  | 'move_down'
  | 'to_parent'
  | 'submit'
  | 'delete'
  | 'clear_filter'
  | 'close_file'
  | 'scroll_down'
  | 'scroll_up'
  | 'scroll_left'
  | 'scroll_right'
  | 'scroll_home'
  | 'scroll_end'
  | 'page_up'
  | 'page_down'
  | 'exit'

export type ShortcutBinding = {
  commandId: ShortcutCommandId
  label: string
  context: ShortcutContext
  defaultAccelerator: string
  accelerator: string
}

/** A key as delivered by the terminal layer, already decoded. */
export type KeyInput = {
  key: string
  ctrl?: boolean
  alt?: boolean
  shift?: boolean
}

type ParsedAccelerator = {
  ctrl: boolean
  alt: boolean
  shift: boolean
  key: string
}

const bind = (
  context: ShortcutContext,
  commandId: ShortcutCommandId,
  label: string,
  accelerator: string,
): ShortcutBinding => ({ commandId, label, context, defaultAccelerator: accelerator, accelerator })

export const DEFAULT_SHORTCUTS: ShortcutBinding[] = [
  bind('normal:search', 'edit_search', 'Switch to FileSearch', 'Tab'),
  bind('normal:search', 'refresh', 'Update', 'U'),
  bind('normal:search', 'expand', 'Expand', 'E'),
  bind('normal:search', 'collapse', 'Collapse', 'C'),
  bind('normal:search', 'delete', 'Delete', 'Ctrl+D'),
  bind('normal:search', 'to_parent', 'To Parent', 'Ctrl+K'),
  bind('normal:search', 'to_parent', 'To Parent', 'Ctrl+ArrowUp'),
  bind('normal:search', 'history', 'Switch to FileSearchHistory', 'H'),
  bind('normal:search', 'move_up', 'Up', 'K'),
  bind('normal:search', 'move_up', 'Up', 'ArrowUp'),
  bind('normal:search', 'move_down', 'Down', 'J'),
  bind('normal:search', 'move_down', 'Down', 'ArrowDown'),
  bind('normal:search', 'submit', 'Open', 'Enter'),

  bind('edit:search', 'normal_search', 'Switch to Normal', 'Tab'),
  bind('edit:search', 'clear_filter', 'Clear', 'Ctrl+C'),
  bind('edit:search', 'move_up', 'Up', 'ArrowUp'),
  bind('edit:search', 'move_down', 'Down', 'ArrowDown'),
  bind('edit:search', 'submit', 'Open', 'Enter'),

  bind('edit:historyFolderView', 'normal_search', 'Switch to FileSearch', 'Tab'),
  bind('edit:historyFolderView', 'move_up', 'Up', 'ArrowUp'),
  bind('edit:historyFolderView', 'move_down', 'Down', 'ArrowDown'),
  bind('edit:historyFolderView', 'submit', 'Open', 'Enter'),

  bind('normal:fileView', 'close_file', 'Quit', 'Q'),
  bind('normal:fileView', 'scroll_down', 'Down', 'J'),
  bind('normal:fileView', 'scroll_down', 'Down', 'ArrowDown'),
  bind('normal:fileView', 'scroll_up', 'Up', 'K'),
  bind('normal:fileView', 'scroll_up', 'Up', 'ArrowUp'),
  bind('normal:fileView', 'scroll_left', 'Left', 'H'),
  bind('normal:fileView', 'scroll_left', 'Left', 'ArrowLeft'),
  bind('normal:fileView', 'scroll_right', 'Right', 'L'),
  bind('normal:fileView', 'scroll_right', 'Right', 'ArrowRight'),
  bind('normal:fileView', 'scroll_home', 'Top', 'Home'),
  bind('normal:fileView', 'scroll_end', 'Bottom', 'End'),
  bind('normal:fileView', 'page_up', 'Page up', 'PageUp'),
  bind('normal:fileView', 'page_down', 'Page down', 'PageDown'),

  bind('global', 'exit', 'Exit', 'Ctrl+C'),
  bind('global', 'exit', 'Exit', 'Ctrl+Z'),
]

const CONTEXT_TITLES: Record<ShortcutContext, string> = {
  'normal:search': 'Normal',
  'edit:search': 'FileSearch',
  'edit:historyFolderView': 'FileSearchHistory',
  'normal:fileView': 'FileView',
  'normal:historyFolderView': 'FileSearchHistory',
  'edit:fileView': 'FileView',
  global: 'Global',
}

const HELP_COMMANDS: Partial<Record<ShortcutContext, ShortcutCommandId[]>> = {
  'normal:search': ['edit_search', 'refresh', 'expand', 'collapse', 'delete', 'to_parent', 'history'],
  'edit:search': ['normal_search', 'clear_filter'],
  'edit:historyFolderView': ['normal_search'],
  'normal:fileView': ['close_file'],
}

const normalizeKeyToken = (token: string): string | null => {
  if (token === ' ') return 'space'
  const lowered = token.trim().toLowerCase()
  if (!lowered) return null
  if (lowered.length === 1) return lowered
  if (/^f([1-9]|1[0-9]|2[0-4])$/.test(lowered)) return lowered
  switch (lowered) {
    case 'esc':
    case 'escape':
      return 'escape'
    case 'enter':
    case 'return':
      return 'enter'
    case 'tab':
      return 'tab'
    case 'space':
    case 'spacebar':
      return 'space'
    case 'backspace':
      return 'backspace'
    case 'delete':
    case 'del':
      return 'delete'
    case 'insert':
    case 'ins':
      return 'insert'
    case 'home':
      return 'home'
    case 'end':
      return 'end'
    case 'pageup':
    case 'pgup':
      return 'pageup'
    case 'pagedown':
    case 'pgdn':
      return 'pagedown'
    case 'arrowup':
    case 'up':
      return 'arrowup'
    case 'arrowdown':
    case 'down':
      return 'arrowdown'
    case 'arrowleft':
    case 'left':
      return 'arrowleft'
    case 'arrowright':
    case 'right':
      return 'arrowright'
    default:
      return null
  }
}

export const parseAccelerator = (accelerator: string): ParsedAccelerator | null => {
  let ctrl = false
  let alt = false
  let shift = false
  let key: string | null = null

  const parts = accelerator.split('+').map((part) => part.trim()).filter(Boolean)
  if (parts.length === 0) return null

  for (const part of parts) {
    const lowered = part.toLowerCase()
    if (lowered === 'ctrl' || lowered === 'control') {
      ctrl = true
      continue
    }
    if (lowered === 'alt' || lowered === 'option') {
      alt = true
      continue
    }
    if (lowered === 'shift') {
      shift = true
      continue
    }
    if (key) return null
    key = normalizeKeyToken(part)
    if (!key) return null
  }

  if (!key) return null
  return { ctrl, alt, shift, key }
}

export const keyToken = (input: KeyInput) => normalizeKeyToken(input.key)

/** True for a key that produces text: one character with no Ctrl or Alt held. */
export const isPrintable = (input: KeyInput) =>
  input.key.length === 1 && !input.ctrl && !input.alt

// Shift is already folded into a typed character, so it is only compared for named keys.
export const inputMatchesAccelerator = (input: KeyInput, accelerator: string): boolean => {
  const parsed = parseAccelerator(accelerator)
  if (!parsed) return false
  const key = keyToken(input)
  if (!key) return false
  return (
    parsed.ctrl === Boolean(input.ctrl) &&
    parsed.alt === Boolean(input.alt) &&
    (key.length === 1 || parsed.shift === Boolean(input.shift)) &&
    parsed.key === key
  )
}

export const commandFor = (
  context: ShortcutContext,
  input: KeyInput,
  shortcuts: ShortcutBinding[] = DEFAULT_SHORTCUTS,
): ShortcutCommandId | null => {
  const found = shortcuts.find(
    (shortcut) => shortcut.context === context && inputMatchesAccelerator(input, shortcut.accelerator),
  )
  return found?.commandId ?? null
}

export const shortcutFor = (
  shortcuts: ShortcutBinding[],
  context: ShortcutContext,
  commandId: ShortcutCommandId,
): ShortcutBinding | null => {
  return shortcuts.find((shortcut) => shortcut.context === context && shortcut.commandId === commandId) ?? null
}

/** One-line key legend for a mode, e.g. `FileView Quit <Q>`. */
export const helpLine = (context: ShortcutContext, shortcuts: ShortcutBinding[] = DEFAULT_SHORTCUTS) => {
  const parts = [CONTEXT_TITLES[context]]
  for (const commandId of HELP_COMMANDS[context] ?? []) {
    const binding = shortcutFor(shortcuts, context, commandId)
    if (binding) parts.push(`${binding.label} <${binding.accelerator}>`)
  }
  return parts.join(' ')
}

export const rebindShortcut = (
  shortcuts: ShortcutBinding[],
  context: ShortcutContext,
  commandId: ShortcutCommandId,
  accelerator: string,
): ShortcutBinding[] => {
  if (!parseAccelerator(accelerator)) {
    throw new BrowserError('parse', `Invalid accelerator: ${accelerator}`)
  }
  return shortcuts.map((shortcut) =>
    shortcut.context === context && shortcut.commandId === commandId ? { ...shortcut, accelerator } : shortcut,
  )
}

export const resetShortcuts = (shortcuts: ShortcutBinding[]): ShortcutBinding[] =>
  shortcuts.map((shortcut) => ({ ...shortcut, accelerator: shortcut.defaultAccelerator }))

export {
  DEFAULT_SHORTCUTS,
  commandFor,
  helpLine,
  inputMatchesAccelerator,
  isPrintable,
  keyToken,
  parseAccelerator,
  rebindShortcut,
  resetShortcuts,
  shortcutFor,
} from './keymap'
export type { KeyInput, ShortcutBinding, ShortcutCommandId, ShortcutContext } from './keymap'

import { get, writable } from 'svelte/store'
import { isPrintable, type KeyInput } from '@/features/shortcuts/keymap'

/**
 * Filter text typed by the user. Only appending, Backspace and Ctrl+U
 * (clear) are understood; anything else leaves the text alone.
 */
export const createInputBuffer = (initial = '') => {
  const text = writable(initial)

  /** Applies an editing key, returning whether the text changed. */
  const handleKey = (input: KeyInput) => {
    const before = get(text)
    if (input.key === 'Backspace' && !input.ctrl && !input.alt) {
      text.set(before.slice(0, -1))
    } else if (input.ctrl && !input.alt && input.key.toLowerCase() === 'u') {
      text.set('')
    } else if (isPrintable(input)) {
      text.set(before + input.key)
    }
    return get(text) !== before
  }

  return {
    subscribe: text.subscribe,
    value: () => get(text),
    handleKey,
    reset: () => text.set(''),
  }
}

export type InputBuffer = ReturnType<typeof createInputBuffer>

import type { FileTextInfo } from '../model/types'
import { moveCaret } from '../helpers/navigationController'

export const PAGE_ROWS = 30

export type ScrollPosition = {
  vertical: number
  horizontal: number
}

export type ScrollCommand =
  | 'scroll_down'
  | 'scroll_up'
  | 'scroll_left'
  | 'scroll_right'
  | 'page_down'
  | 'page_up'
  | 'scroll_home'
  | 'scroll_end'

export const TOP_LEFT: ScrollPosition = { vertical: 0, horizontal: 0 }

// Offsets may sit one past the last row or column, so the limits are inclusive.
const clamp = (current: number, delta: number, limit: number) =>
  moveCaret({ count: limit + 1, current, delta }) ?? 0

export const scrollFileView = (
  position: ScrollPosition,
  info: Pick<FileTextInfo, 'rows' | 'maxLineLength'>,
  command: ScrollCommand,
): ScrollPosition => {
  const { vertical, horizontal } = position
  switch (command) {
    case 'scroll_down':
      return { horizontal, vertical: clamp(vertical, 1, info.rows) }
    case 'scroll_up':
      return { horizontal, vertical: clamp(vertical, -1, info.rows) }
    case 'page_down':
      return { horizontal, vertical: clamp(vertical, PAGE_ROWS, info.rows) }
    case 'page_up':
      return { horizontal, vertical: clamp(vertical, -PAGE_ROWS, info.rows) }
    case 'scroll_right':
      return { vertical, horizontal: clamp(horizontal, 1, info.maxLineLength) }
    case 'scroll_left':
      return { vertical, horizontal: clamp(horizontal, -1, info.maxLineLength) }
    case 'scroll_home':
      return TOP_LEFT
    case 'scroll_end':
      return { horizontal, vertical: Math.max(0, info.rows - PAGE_ROWS) }
  }
}

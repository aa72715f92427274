import { BrowserError } from '@/shared/lib/error'

export type NavigateArgs = {
  count: number
  current: number | null
  delta?: number
  toStart?: boolean
  toEnd?: boolean
}

export const moveCaret = ({ count, current, delta = 0, toStart, toEnd }: NavigateArgs) => {
  if (count === 0) return null
  if (toStart) return 0
  if (toEnd) return count - 1
  const base = current ?? 0
  const next = Math.min(count - 1, Math.max(0, base + delta))
  return next
}

/**
 * Euclidean modulo of a signed highlight index, so stepping above the first
 * row lands on the last one. Callers check for an empty list first.
 */
export const wrapIndex = (raw: number, len: number) => {
  if (!Number.isInteger(len) || len <= 0) {
    throw new BrowserError('state', `Cannot wrap highlight index into a list of length ${len}`)
  }
  if (!Number.isInteger(raw)) {
    throw new BrowserError('parse', `Highlight index ${raw} is not an integer`)
  }
  return ((raw % len) + len) % len
}

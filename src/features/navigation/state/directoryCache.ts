import { BrowserError } from '@/shared/lib/error'
import { silentLogger, type Logger } from '@/shared/lib/log'
import type { DirectorySnapshot } from '../model/types'

export const DEFAULT_CACHE_SIZE = 100

export type RemovalReason = 'evicted' | 'invalidated'

type CacheOptions = {
  capacity?: number
  logger?: Logger
  onRemove?: (key: string, reason: RemovalReason) => void
}

/**
 * Bounded LRU map of canonical directory path -> snapshot. A Map keeps
 * insertion order, so the first key is always the least recently used one.
 */
export const createDirectoryCache = ({ capacity = DEFAULT_CACHE_SIZE, logger = silentLogger, onRemove }: CacheOptions = {}) => {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new BrowserError('cache', `Cache capacity must be a positive integer, got ${capacity}`)
  }
  const entries = new Map<string, DirectorySnapshot>()

  const touch = (key: string, snapshot: DirectorySnapshot) => {
    entries.delete(key)
    entries.set(key, snapshot)
  }

  const get = (key: string) => {
    const snapshot = entries.get(key)
    if (snapshot) touch(key, snapshot)
    return snapshot
  }

  const peek = (key: string) => entries.get(key)

  const has = (key: string) => entries.has(key)

  const put = (key: string, snapshot: DirectorySnapshot) => {
    touch(key, snapshot)
    while (entries.size > capacity) {
      const oldest = entries.keys().next().value
      if (oldest === undefined) break
      entries.delete(oldest)
      logger.debug(`evicted ${oldest} (capacity ${capacity})`)
      onRemove?.(oldest, 'evicted')
    }
  }

  const invalidate = (key: string) => {
    if (!entries.delete(key)) return false
    logger.info(`invalidated stale ${key}`)
    onRemove?.(key, 'invalidated')
    return true
  }

  /** Keys from most to least recently used. */
  const keys = () => [...entries.keys()].reverse()

  return {
    capacity,
    get,
    peek,
    has,
    put,
    invalidate,
    keys,
    size: () => entries.size,
  }
}

export type DirectoryCache = ReturnType<typeof createDirectoryCache>

import { realpathSync, statSync } from 'node:fs'
import path from 'node:path'
import { get, writable, type Readable } from 'svelte/store'
import { BrowserError, isBrowserError, toBrowserError } from '@/shared/lib/error'
import { silentLogger, type Logger } from '@/shared/lib/log'
import { shouldSelect } from '../filters/fuzzyMatch'
import { canonicalPath, entryFromPath, fullPath, isParentShortcut, relativeTo } from '../model/entry'
import type { DirectorySnapshot, Entry } from '../model/types'
import { listDir as listDirFromDisk, type ListDir } from '../services/listing.service'
import { createDirectoryCache, DEFAULT_CACHE_SIZE, type RemovalReason } from './directoryCache'
import type { ModeMachine } from './modeMachine'

type Deps = {
  modes: Pick<ModeMachine, 'isHistorySearch' | 'subscribe'>
  listDir?: ListDir
  cacheSize?: number
  showHidden?: boolean
  logger?: Logger
  onCacheRemove?: (key: string, reason: RemovalReason) => void
}

const canonicalDir = (target: string) => {
  try {
    return realpathSync(target)
  } catch (err) {
    throw toBrowserError(err, 'path', `Unable to resolve ${target}`, target)
  }
}

const isDirectory = (target: string) => {
  try {
    return statSync(target).isDirectory()
  } catch {
    return null
  }
}

// Cache keys are directories, so no stat is needed; the root has no name and
// is shown as "<root>/.", which joins back to the key.
const historyEntry = (key: string): Entry => {
  const name = path.basename(key)
  const parent = path.dirname(key)
  if (!name || parent === key) return { parent: key, name: '.', isFile: false }
  return { parent, name, isFile: false }
}

const depthOf = (relative: string) => relative.split('/').length - 1

const splitShortcut = (list: Entry[]) => {
  const [first, ...rest] = list
  if (first && isParentShortcut(first)) return { head: [first], tail: rest }
  return { head: [], tail: list }
}

export const createNavigationEngine = (startDir: string, deps: Deps) => {
  const {
    modes,
    listDir = listDirFromDisk,
    cacheSize = DEFAULT_CACHE_SIZE,
    showHidden = true,
    logger = silentLogger,
    onCacheRemove,
  } = deps

  const cache = createDirectoryCache({ capacity: cacheSize, logger, onRemove: onCacheRemove })
  const current = writable(canonicalDir(startDir))
  const filter = writable('')
  const expandLevel = writable(0)
  const selected = writable<Entry[]>([])
  let children: Entry[] = []

  const read = (dir: string, addParentShortcut: boolean) => listDir(dir, { addParentShortcut, showHidden })

  const loadOrGet = (dir: string, addParentShortcut = true): DirectorySnapshot => {
    const cached = cache.get(dir)
    if (cached) return cached
    // Read before touching the cache so a failed read leaves it as it was.
    const snapshot = read(dir, addParentShortcut)
    cache.put(dir, snapshot)
    return snapshot
  }

  const matchHistory = (needle: string) =>
    cache
      .keys()
      .filter((key) => shouldSelect(key, needle))
      .map(historyEntry)

  const matchChildren = (needle: string) => {
    const dir = get(current)
    return children.filter((entry) => shouldSelect(relativeTo(entry, dir), needle))
  }

  /**
   * Recomputes `selected` from the filter and either the cache keys (history)
   * or the current children (browse). A given filter replaces the stored one.
   */
  const update = (nextFilter?: string) => {
    const needle = nextFilter ?? get(filter)
    const next = modes.isHistorySearch() ? matchHistory(needle) : matchChildren(needle)
    filter.set(needle)
    selected.set(next)
  }

  const enter = (target: string) => {
    const dir = canonicalDir(target)
    const snapshot = loadOrGet(dir, true)
    current.set(dir)
    children = [...snapshot.entries]
    filter.set('')
    expandLevel.set(0)
    update()
  }

  const expand = () => {
    const { head, tail } = splitShortcut(children)
    const next: Entry[] = [...head]

    for (const entry of tail) {
      const target = fullPath(entry)
      const dir = isDirectory(target)
      if (dir === null) {
        logger.debug(`skipping stale ${target} while expanding`)
        continue
      }
      if (dir) {
        try {
          next.push(...read(target, false).entries)
        } catch (err) {
          if (!isBrowserError(err, 'io')) throw err
          logger.warn(`keeping ${target} folded`, err.message)
          next.push(entry)
        }
      } else {
        next.push(entry)
      }
    }

    children = next
    expandLevel.update((level) => level + 1)
    update()
  }

  const collapse = () => {
    const level = get(expandLevel)
    if (level === 0) return

    const nextLevel = level - 1
    const dir = get(current)
    const { head, tail } = splitShortcut(children)
    const next: Entry[] = [...head]
    const seen = new Set<string>()

    for (const entry of tail) {
      const folded = depthOf(relativeTo(entry, dir)) > nextLevel ? entry.parent : null
      let row: Entry
      let key: string
      try {
        row = folded === null ? entry : entryFromPath(folded)
        key = canonicalPath(row)
      } catch (err) {
        if (!isBrowserError(err, 'path')) throw err
        logger.debug(`skipping stale ${fullPath(entry)} while collapsing`)
        continue
      }
      if (seen.has(key)) continue
      seen.add(key)
      next.push(row)
    }

    children = next
    expandLevel.set(nextLevel)
    update()
  }

  const entryAt = (index: number) => {
    const entry = get(selected)[index]
    if (!entry) {
      throw new BrowserError('state', `No selected entry at index ${index}`)
    }
    return entry
  }

  /** Canonical path of `selected[index]`; a path error when it no longer exists. */
  const submit = (index: number) => canonicalPath(entryAt(index))

  const dropInvalidFolder = (index: number) => {
    if (!modes.isHistorySearch()) {
      throw new BrowserError('state', 'Must be in history mode to drop a folder')
    }
    const removed = entryAt(index)
    selected.update((list) => list.filter((_, i) => i !== index))
    const key = fullPath(removed)
    if (!cache.invalidate(key)) {
      throw new BrowserError('cache', `Expected ${key} in the folder cache`, { path: key })
    }
  }

  const refresh = () => {
    const dir = get(current)
    const snapshot = read(dir, true)
    cache.put(dir, snapshot)
    children = [...snapshot.entries]
    expandLevel.set(0)
    update()
  }

  const peek = () => {
    const dir = get(current)
    const snapshot = cache.peek(dir)
    if (!snapshot) {
      throw new BrowserError('cache', `Unable to get folder cache for ${dir}`, { path: dir })
    }
    return snapshot
  }

  const labelOf = (entry: Entry) =>
    modes.isHistorySearch() ? fullPath(entry) : relativeTo(entry, get(current))

  const labels = () => get(selected).map(labelOf)

  const readonly = <T>(store: Readable<T>): Readable<T> => ({ subscribe: store.subscribe })

  enter(get(current))

  // Switching between history and browse changes where `selected` comes from.
  let historyView = modes.isHistorySearch()
  modes.subscribe((state) => {
    const next = state.viewMode === 'historyFolderView'
    if (next === historyView) return
    historyView = next
    update()
  })

  return {
    selected: readonly(selected),
    current: readonly(current),
    filter: readonly(filter),
    expandLevel: readonly(expandLevel),
    currentDirectory: () => get(current),
    children: () => [...children],
    historyKeys: () => cache.keys(),
    loadOrGet,
    update,
    enter,
    expand,
    collapse,
    submit,
    dropInvalidFolder,
    refresh,
    peek,
    labelOf,
    labels,
  }
}

export type NavigationEngine = ReturnType<typeof createNavigationEngine>

import { realpathSync, statSync } from 'node:fs'
import path from 'node:path'
import { BrowserError, toBrowserError } from '@/shared/lib/error'
import type { Entry } from './types'

export const PARENT_SHORTCUT = '..'

export const parentShortcut = (dir: string): Entry => ({
  parent: dir,
  name: PARENT_SHORTCUT,
  isFile: false,
})

export const isParentShortcut = (entry: Entry) => entry.name === PARENT_SHORTCUT

export const fullPath = (entry: Entry) => path.join(entry.parent, entry.name)

export const canonicalPath = (entry: Entry) => {
  const target = fullPath(entry)
  try {
    return realpathSync(target)
  } catch (err) {
    throw toBrowserError(err, 'path', `Unable to resolve ${target}`, target)
  }
}

/**
 * Builds an entry for an existing path. Fails for paths without a file name or
 * parent (the filesystem root).
 */
export const entryFromPath = (target: string): Entry => {
  const resolved = path.resolve(target)
  const name = path.basename(resolved)
  const parent = path.dirname(resolved)
  if (!name || parent === resolved) {
    throw new BrowserError('path', `No file name or parent for ${resolved}`, { path: resolved })
  }

  let isFile: boolean
  try {
    isFile = statSync(resolved).isFile()
  } catch (err) {
    throw toBrowserError(err, 'path', `Unable to stat ${resolved}`, resolved)
  }
  return { parent, name, isFile }
}

/**
 * Path of the entry relative to `ref`, using `/` separators. `ref` must be the
 * entry's parent or one of its ancestors.
 */
export const relativeTo = (entry: Entry, ref: string) => {
  const rel = path.relative(ref, entry.parent)
  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new BrowserError('path', `${ref} is not a prefix of ${entry.parent}`, { path: entry.parent })
  }
  const prefix = rel.split(path.sep).join('/')
  return prefix ? `${prefix}/${entry.name}` : entry.name
}

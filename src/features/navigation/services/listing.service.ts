import { readdirSync, statSync, type Dirent } from 'node:fs'
import path from 'node:path'
import { toBrowserError } from '@/shared/lib/error'
import { parentShortcut } from '../model/entry'
import type { DirectorySnapshot, Entry } from '../model/types'

export type ListOptions = {
  addParentShortcut: boolean
  showHidden?: boolean
}

export type ListDir = (dir: string, opts: ListOptions) => DirectorySnapshot

export const byName = (a: Entry, b: Entry) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)

const direntIsFile = (dir: string, dirent: Dirent): boolean | null => {
  if (!dirent.isSymbolicLink()) return dirent.isFile()
  try {
    return statSync(path.join(dir, dirent.name)).isFile()
  } catch {
    // Dangling link: leave it out of the listing.
    return null
  }
}

/**
 * Lists `dir` sorted by name. Entries that cannot be described are skipped;
 * a directory that cannot be read at all throws.
 */
export const listDir: ListDir = (dir, { addParentShortcut, showHidden = true }) => {
  let dirents: Dirent[]
  try {
    dirents = readdirSync(dir, { withFileTypes: true })
  } catch (err) {
    throw toBrowserError(err, 'io', `Unable to read directory ${dir}`, dir)
  }

  const entries: Entry[] = []
  for (const dirent of dirents) {
    if (!showHidden && dirent.name.startsWith('.')) continue
    const isFile = direntIsFile(dir, dirent)
    if (isFile === null) continue
    entries.push({ parent: dir, name: dirent.name, isFile })
  }
  entries.sort(byName)

  if (addParentShortcut && path.dirname(dir) !== dir) {
    entries.unshift(parentShortcut(dir))
  }

  return { entries, loadedAt: new Date() }
}

export type Entry = {
  /** Directory holding the entry; for the parent shortcut this is the listed directory itself. */
  parent: string
  name: string
  isFile: boolean
}

export type DirectorySnapshot = {
  entries: Entry[]
  loadedAt: Date
}

export type FileTextInfo = {
  rows: number
  maxLineLength: number
  lines: string[]
}

export type InputMode = 'normal' | 'edit'
export type ViewMode = 'search' | 'fileView' | 'historyFolderView'

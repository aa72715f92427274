import { readFileSync, rmSync, statSync } from 'node:fs'
import { BrowserError, toBrowserError } from '@/shared/lib/error'
import { MAX_FILE_BYTES } from '@/features/settings/settingsTypes'
import type { FileTextInfo } from '../model/types'
import { plainTextHighlighter, type Highlighter } from './highlighter'

export type LoadFileOptions = {
  maxBytes?: number
  highlighter?: Highlighter
}

export type LoadFileText = (filePath: string, opts?: LoadFileOptions) => FileTextInfo

export const textDimensions = (text: string) => {
  const lines = text.split('\n')
  const maxLineLength = lines.reduce((max, line) => Math.max(max, line.length), 0)
  return { rows: lines.length, maxLineLength }
}

export const loadFileText: LoadFileText = (filePath, opts = {}) => {
  const maxBytes = opts.maxBytes ?? MAX_FILE_BYTES
  const highlighter = opts.highlighter ?? plainTextHighlighter

  let size: number
  try {
    size = statSync(filePath).size
  } catch (err) {
    throw toBrowserError(err, 'io', `Unable to stat ${filePath}`, filePath)
  }
  if (size > maxBytes) {
    throw new BrowserError('path', `${filePath} is ${size} bytes, over the ${maxBytes} byte limit`, {
      path: filePath,
    })
  }

  let content: string
  try {
    content = readFileSync(filePath, 'utf8')
  } catch (err) {
    throw toBrowserError(err, 'io', `Unable to read ${filePath}`, filePath)
  }

  let lines: string[]
  try {
    lines = highlighter.highlight(content, filePath)
  } catch (err) {
    throw toBrowserError(err, 'parse', `Unable to highlight ${filePath}`, filePath)
  }

  return { ...textDimensions(content), lines }
}

export type RemoveEntry = (target: string) => void

export const removeEntry: RemoveEntry = (target) => {
  try {
    const stats = statSync(target)
    rmSync(target, { recursive: stats.isDirectory(), force: false })
  } catch (err) {
    throw toBrowserError(err, 'io', `Unable to remove ${target}`, target)
  }
}

export const isDirectoryPath = (target: string) => {
  try {
    return statSync(target).isDirectory()
  } catch (err) {
    throw toBrowserError(err, 'path', `Unable to stat ${target}`, target)
  }
}

import { describe, expect, it } from 'vitest'
import { plainTextHighlighter, splitLinesWithEndings } from './highlighter'

describe('splitLinesWithEndings', () => {
  it('keeps the newline on every line but a trailing partial one', () => {
    expect(splitLinesWithEndings('a\nb\nc')).toEqual(['a\n', 'b\n', 'c'])
    expect(splitLinesWithEndings('a\n')).toEqual(['a\n'])
    expect(splitLinesWithEndings('')).toEqual([])
  })

  it('backs the plain-text highlighter', () => {
    expect(plainTextHighlighter.highlight('x\ny', 'notes.txt')).toEqual(['x\n', 'y'])
  })
})

export type Highlighter = {
  /** Returns one formatted line per source line, line endings kept. */
  highlight: (code: string, filePath: string) => string[]
}

export const splitLinesWithEndings = (code: string) => {
  const lines: string[] = []
  let start = 0
  for (let i = 0; i < code.length; i++) {
    if (code[i] === '\n') {
      lines.push(code.slice(start, i + 1))
      start = i + 1
    }
  }
  if (start < code.length) lines.push(code.slice(start))
  return lines
}

export const plainTextHighlighter: Highlighter = {
  highlight: (code) => splitLinesWithEndings(code),
}

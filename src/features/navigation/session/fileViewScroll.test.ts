import { describe, expect, it } from 'vitest'
import { scrollFileView, TOP_LEFT, type ScrollCommand, type ScrollPosition } from './fileViewScroll'

const info = { rows: 100, maxLineLength: 5 }

const run = (commands: ScrollCommand[], start: ScrollPosition = TOP_LEFT, dims = info) =>
  commands.reduce((position, command) => scrollFileView(position, dims, command), start)

describe('scrollFileView', () => {
  it('steps one row or column at a time', () => {
    expect(run(['scroll_down', 'scroll_down', 'scroll_right'])).toEqual({ vertical: 2, horizontal: 1 })
    expect(run(['scroll_up', 'scroll_left'])).toEqual(TOP_LEFT)
  })

  it('pages by thirty rows, stopping at the row count', () => {
    expect(run(['page_down', 'page_down'])).toEqual({ vertical: 60, horizontal: 0 })
    expect(run(['page_down', 'page_down', 'page_down', 'page_down'])).toEqual({ vertical: 100, horizontal: 0 })
    expect(run(['page_up'], { vertical: 45, horizontal: 3 })).toEqual({ vertical: 15, horizontal: 3 })
    expect(run(['page_up'], { vertical: 10, horizontal: 0 })).toEqual(TOP_LEFT)
  })

  it('caps horizontal scrolling at the longest line', () => {
    expect(run(Array<ScrollCommand>(8).fill('scroll_right'))).toEqual({ vertical: 0, horizontal: 5 })
  })

  it('jumps home on both axes and to the last page on end', () => {
    expect(run(['scroll_home'], { vertical: 40, horizontal: 4 })).toEqual(TOP_LEFT)
    expect(run(['scroll_end'], { vertical: 0, horizontal: 4 })).toEqual({ vertical: 70, horizontal: 4 })
    expect(run(['scroll_end'], TOP_LEFT, { rows: 12, maxLineLength: 0 })).toEqual(TOP_LEFT)
  })
})

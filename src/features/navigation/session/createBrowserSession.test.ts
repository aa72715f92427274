import { existsSync } from 'node:fs'
import { get } from 'svelte/store'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { BrowserError, isBrowserError } from '@/shared/lib/error'
import { createTempTree, type TempTree } from '../test/tempTree'
import { createModeMachine } from '../state/modeMachine'
import { createNavigationEngine } from '../state/createNavigationEngine'
import { createBrowserSession } from './createBrowserSession'

const createLoggerMock = () => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
})

describe('createBrowserSession', () => {
  let tree: TempTree

  beforeEach(() => {
    tree = createTempTree()
    tree.nested()
  })

  afterEach(() => {
    tree.cleanup()
  })

  const setup = (opts: Omit<Parameters<typeof createBrowserSession>[0], 'engine' | 'modes'> = {}) => {
    const modes = createModeMachine()
    const engine = createNavigationEngine(tree.root, { modes })
    const session = createBrowserSession({ engine, modes, ...opts })
    return { modes, engine, session }
  }

  const highlight = (session: ReturnType<typeof setup>['session'], steps: number) => {
    session.resetIndex()
    for (let i = 0; i < steps; i++) session.moveDown()
  }

  describe('highlight index', () => {
    it('wraps past either end of the selection', () => {
      const { session } = setup()

      session.moveUp()
      expect(session.rawHighlightIndex()).toBe(-1)
      expect(session.highlightIndex()).toBe(5)

      highlight(session, 7)
      expect(session.highlightIndex()).toBe(1)
    })

    it('has no highlight when nothing matches', () => {
      const { engine, session } = setup()
      session.update('zzz')

      expect(session.highlightIndex()).toBeNull()
      session.submit()
      expect(engine.currentDirectory()).toBe(tree.root)
    })

    it('returns to the top when the filter changes', () => {
      const { session } = setup()
      highlight(session, 3)

      session.update('r')

      expect(session.rawHighlightIndex()).toBe(0)
    })
  })

  describe('submit', () => {
    it('enters the highlighted directory', () => {
      const { engine, session } = setup()
      highlight(session, 5)

      session.submit()

      expect(engine.currentDirectory()).toBe(tree.at('src'))
      expect(engine.labels()).toEqual(['..', 'lib.rs', 'module.rs', 'nested'])
      expect(session.rawHighlightIndex()).toBe(0)
    })

    it('opens a file and switches to the file view', () => {
      const { modes, session } = setup()
      highlight(session, 2)

      session.submit()

      expect(modes.modeKey()).toBe('normal:fileView')
      expect(get(session.fileView)).toEqual({
        path: tree.at('README.md'),
        info: { rows: 2, maxLineLength: 17, lines: ['# Test Project\n', 'This is a readme.'] },
        scroll: { vertical: 0, horizontal: 0 },
      })
    })

    it('restores the previous mode when the file is closed', () => {
      const { modes, session } = setup()
      modes.toSearch()
      highlight(session, 4)
      session.submit()

      session.closeFile()

      expect(modes.modeKey()).toBe('normal:search')
      expect(get(session.fileView)).toBeNull()
    })

    it('refuses files over the configured size', () => {
      const { modes, session } = setup({ maxFileBytes: 10 })
      highlight(session, 2)

      let caught: unknown = null
      try {
        session.submit()
      } catch (err) {
        caught = err
      }

      expect(isBrowserError(caught, 'path')).toBe(true)
      expect(get(session.fileView)).toBeNull()
      expect(modes.modeKey()).toBe('edit:search')
    })

    it('refreshes the listing when a browsed entry has gone', () => {
      const logger = createLoggerMock()
      const { engine, session } = setup({ logger })
      tree.remove('main.rs')
      highlight(session, 4)

      session.submit()

      expect(engine.currentDirectory()).toBe(tree.root)
      expect(engine.labels()).toEqual(['..', '.gitkeep', 'README.md', 'empty', 'src'])
      expect(logger.info).toHaveBeenCalledTimes(1)
    })

    it('drops a history folder that has gone and enters one that exists', () => {
      const { modes, engine, session } = setup()
      engine.enter(tree.at('src'))
      engine.enter(tree.at('src/nested'))
      modes.toHistorySearch()
      session.reset()
      tree.remove('src/nested')

      session.submit()
      expect(engine.labels()).toEqual([tree.at('src'), tree.root])
      expect(modes.modeKey()).toBe('edit:historyFolderView')

      session.submit()
      expect(modes.modeKey()).toBe('normal:search')
      expect(engine.currentDirectory()).toBe(tree.at('src'))
      expect(engine.labels()).toEqual(['..', 'lib.rs', 'module.rs', 'nested'])
    })

    it('goes to the parent directory whatever the filter', () => {
      const { engine, session } = setup()
      engine.enter(tree.at('src/nested'))
      session.update('deep')
      highlight(session, 1)

      session.toParent()

      expect(engine.currentDirectory()).toBe(tree.at('src'))
      expect(get(engine.filter)).toBe('')
    })
  })

  describe('delete', () => {
    it('removes the highlighted directory with its contents', () => {
      const { engine, session } = setup()
      highlight(session, 5)

      session.deleteHighlighted()

      expect(existsSync(tree.at('src'))).toBe(false)
      expect(engine.labels()).toEqual(['..', '.gitkeep', 'README.md', 'empty', 'main.rs'])
    })

    it('removes the highlighted file', () => {
      const { engine, session } = setup()
      highlight(session, 4)

      session.deleteHighlighted()

      expect(existsSync(tree.at('main.rs'))).toBe(false)
      expect(engine.labels()).toEqual(['..', '.gitkeep', 'README.md', 'empty', 'src'])
    })

    it('logs a failed removal and still refreshes', () => {
      const logger = createLoggerMock()
      const removeEntry = vi.fn(() => {
        throw new BrowserError('io', 'Unable to remove (EACCES)')
      })
      const { engine, session } = setup({ logger, removeEntry })
      highlight(session, 4)
      tree.file('late.txt')

      session.deleteHighlighted()

      expect(removeEntry).toHaveBeenCalledWith(tree.at('main.rs'))
      expect(logger.warn).toHaveBeenCalledWith(
        `Delete failed for ${tree.at('main.rs')}`,
        'IO error: Unable to remove (EACCES)',
      )
      expect(engine.labels()).toContain('late.txt')
    })

    it('does nothing for a stale entry', () => {
      const logger = createLoggerMock()
      const removeEntry = vi.fn()
      const { session } = setup({ logger, removeEntry })
      tree.remove('main.rs')
      highlight(session, 4)

      session.deleteHighlighted()

      expect(removeEntry).not.toHaveBeenCalled()
      expect(logger.warn).toHaveBeenCalledTimes(1)
    })
  })

  describe('file view', () => {
    it('scrolls the opened file within its bounds', () => {
      tree.file('long.txt', 'line\n'.repeat(40))
      const { engine, session } = setup()
      session.update('long')
      expect(engine.labels()).toEqual(['long.txt'])
      session.submit()

      session.scroll('page_down')
      expect(get(session.fileView)?.scroll).toEqual({ vertical: 30, horizontal: 0 })

      session.scroll('page_down')
      expect(get(session.fileView)?.scroll).toEqual({ vertical: 41, horizontal: 0 })

      session.scroll('scroll_end')
      expect(get(session.fileView)?.scroll).toEqual({ vertical: 11, horizontal: 0 })

      session.scroll('scroll_right')
      session.scroll('scroll_home')
      expect(get(session.fileView)?.scroll).toEqual({ vertical: 0, horizontal: 0 })
    })

    it('needs an opened file to scroll', () => {
      const { session } = setup()

      expect(() => session.scroll('scroll_down')).toThrow('State error: No file is open')
    })

    it('clears the filter, file and index on reset', () => {
      const { engine, session } = setup()
      session.update('read')
      session.submit()
      session.moveDown()

      session.reset()

      expect(get(session.fileView)).toBeNull()
      expect(get(engine.filter)).toBe('')
      expect(session.rawHighlightIndex()).toBe(0)
    })
  })

  it('keeps the last reported error for the status line', () => {
    const { session } = setup()

    session.report(new BrowserError('cache', 'Unable to get folder cache for /x'))
    expect(get(session.status)).toBe('Cache error: Unable to get folder cache for /x')

    session.clearStatus()
    expect(get(session.status)).toBeNull()
  })
})

import { get, writable } from 'svelte/store'
import { isBrowserError } from '@/shared/lib/error'
import { silentLogger, type Logger } from '@/shared/lib/log'
import {
  commandFor,
  DEFAULT_SHORTCUTS,
  helpLine,
  type KeyInput,
  type ShortcutBinding,
  type ShortcutCommandId,
} from '@/features/shortcuts/keymap'
import type { BrowserSession } from '../session/createBrowserSession'
import type { ModeMachine } from '../state/modeMachine'
import { createInputBuffer, type InputBuffer } from './inputBuffer'

type Deps = {
  session: BrowserSession
  modes: ModeMachine
  input?: InputBuffer
  shortcuts?: ShortcutBinding[]
  logger?: Logger
}

export const createKeyHandler = (deps: Deps) => {
  const { session, modes, input = createInputBuffer(), shortcuts = DEFAULT_SHORTCUTS, logger = silentLogger } = deps
  const exit = writable(false)

  const clearUnlessFileView = () => {
    if (!modes.isFileView()) input.reset()
  }

  const run = (commandId: ShortcutCommandId) => {
    const context = modes.modeKey()
    switch (commandId) {
      case 'refresh':
        session.refresh()
        return
      case 'history':
        modes.toHistorySearch()
        input.reset()
        session.reset()
        return
      case 'expand':
        session.expand()
        return
      case 'collapse':
        session.collapse()
        return
      case 'edit_search':
        modes.toSearchEdit()
        return
      case 'normal_search':
        modes.toSearch()
        if (context === 'edit:historyFolderView') session.resetIndex()
        return
      case 'move_up':
        session.moveUp()
        return
      case 'move_down':
        session.moveDown()
        return
      case 'to_parent':
        session.toParent()
        return
      case 'submit':
        session.submit()
        if (context === 'edit:search') {
          input.reset()
        } else {
          clearUnlessFileView()
        }
        return
      case 'delete':
        session.deleteHighlighted()
        return
      case 'clear_filter':
        input.reset()
        session.update('')
        return
      case 'close_file':
        session.closeFile()
        return
      case 'exit':
        exit.set(true)
        return
      case 'scroll_down':
      case 'scroll_up':
      case 'scroll_left':
      case 'scroll_right':
      case 'scroll_home':
      case 'scroll_end':
      case 'page_up':
      case 'page_down':
        session.scroll(commandId)
        return
    }
  }

  const edit = (key: KeyInput) => {
    if (input.handleKey(key)) session.update(input.value())
  }

  /**
   * Dispatches one decoded key for the current mode. Failures end up in the
   * session status line; nothing is thrown to the caller.
   */
  const handle = (key: KeyInput) => {
    if (get(exit)) return
    session.clearStatus()
    const context = modes.modeKey()
    const commandId = commandFor(context, key, shortcuts) ?? commandFor('global', key, shortcuts)

    try {
      if (commandId) {
        run(commandId)
      } else if (modes.isEdit()) {
        edit(key)
      }
    } catch (err) {
      if (isBrowserError(err, 'cache')) {
        logger.error(`${context} ${key.key}`, err)
      } else {
        logger.debug(`${context} ${key.key}`, err)
      }
      session.report(err)
    }
  }

  return {
    handle,
    input: { subscribe: input.subscribe },
    exitRequested: { subscribe: exit.subscribe },
    shouldExit: () => get(exit),
    helpLine: () => helpLine(modes.modeKey(), shortcuts),
  }
}

export type KeyHandler = ReturnType<typeof createKeyHandler>

import path from 'node:path'
import { createLogger } from '@/shared/lib/log'
import { loadSettings } from '@/features/settings/loadSettings'
import { DEFAULT_SETTINGS, type BrowserSettings } from '@/features/settings/settingsTypes'
import { DEFAULT_SHORTCUTS, type ShortcutBinding } from '@/features/shortcuts/keymap'
import { createKeyHandler } from './handlers/createKeyHandler'
import type { Highlighter } from './services/highlighter'
import { createBrowserSession } from './session/createBrowserSession'
import { createNavigationEngine } from './state/createNavigationEngine'
import { createModeMachine } from './state/modeMachine'

type Options = {
  /** Environment to read `FOLDTRAIL_*` overrides from; explicit `settings` win over it. */
  env?: Record<string, string | undefined>
  settings?: Partial<BrowserSettings>
  highlighter?: Highlighter
  shortcuts?: ShortcutBinding[]
}

/** Wires one browser instance: modes, engine, session and key handling over shared settings. */
export const createBrowser = (opts: Options = {}) => {
  const invalid: string[] = []
  const base = opts.env
    ? loadSettings(opts.env, (name, value) => invalid.push(`Ignoring invalid ${name}=${JSON.stringify(value)}`))
    : DEFAULT_SETTINGS
  const settings: BrowserSettings = { ...base, ...opts.settings }
  const logger = createLogger('foldtrail', settings.logLevel)
  invalid.forEach((message) => logger.warn(message))

  const modes = createModeMachine()
  const engine = createNavigationEngine(path.resolve(settings.startDir), {
    modes,
    cacheSize: settings.cacheSize,
    showHidden: settings.showHidden,
    logger,
  })
  const session = createBrowserSession({
    engine,
    modes,
    maxFileBytes: settings.maxFileBytes,
    highlighter: opts.highlighter,
    logger,
  })
  const keys = createKeyHandler({
    session,
    modes,
    shortcuts: opts.shortcuts ?? DEFAULT_SHORTCUTS,
    logger,
  })

  return { settings, modes, engine, session, keys }
}

export type Browser = ReturnType<typeof createBrowser>

import { describe, expect, it } from 'vitest'
import { BrowserError, getErrorCode, getErrorMessage, isBrowserError, normalizeError, toBrowserError } from './error'

describe('error helpers', () => {
  it('prefixes messages with the error kind', () => {
    const err = new BrowserError('cache', 'missing /tmp/a', { path: '/tmp/a' })

    expect(err.message).toBe('Cache error: missing /tmp/a')
    expect(err.path).toBe('/tmp/a')
    expect(isBrowserError(err)).toBe(true)
    expect(isBrowserError(err, 'io')).toBe(false)
  })

  it('normalizes plain objects and strings', () => {
    expect(getErrorMessage('boom')).toBe('boom')
    expect(getErrorCode({ code: 'EACCES', message: 'denied' })).toBe('EACCES')
    expect(normalizeError({ details: 42 }).details).toBe(42)
  })

  it('wraps errno errors with their code and keeps the cause', () => {
    const cause = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' })

    const err = toBrowserError(cause, 'path', 'Unable to resolve /x', '/x')

    expect(err.message).toBe('Path error: Unable to resolve /x (ENOENT)')
    expect(err.cause).toBe(cause)
    expect(toBrowserError(err, 'io', 'ignored')).toBe(err)
  })
})

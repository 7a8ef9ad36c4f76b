/**
 * Unit tests for parseChannelEnv() input validation.
 *
 * Goal: Verify correct parsing, warning on malformed values, and silent
 * pass-through when variables are unset.
 */
import { describe, expect, it, vi } from 'vitest'
import { parseChannelEnv, parseInteger } from '../src/env.js'

describe('parseChannelEnv()', () => {
  it('returns no overrides when nothing is set', () => {
    const warn = vi.fn()

    expect(parseChannelEnv({}, warn)).toEqual({})
    expect(warn).not.toHaveBeenCalled()
  })

  it('parses every variable', () => {
    const warn = vi.fn()
    const result = parseChannelEnv(
      {
        TCP_CHANNEL_PORT: '12345',
        TCP_CHANNEL_HOST: ' peer.test ',
        TCP_CHANNEL_ATTEMPTS: '3',
        TCP_CHANNEL_DELAY_MS: '0',
        TCP_CHANNEL_MAX_BYTES: '1024'
      },
      warn
    )

    expect(result).toEqual({ port: 12345, host: 'peer.test', attempts: 3, delayMs: 0, maxBytes: 1024 })
    expect(warn).not.toHaveBeenCalled()
  })

  it('skips empty values silently', () => {
    const warn = vi.fn()

    expect(parseChannelEnv({ TCP_CHANNEL_PORT: '', TCP_CHANNEL_HOST: '  ' }, warn)).toEqual({})
    expect(warn).not.toHaveBeenCalled()
  })

  it('warns when the port is out of range', () => {
    const warn = vi.fn()

    expect(parseChannelEnv({ TCP_CHANNEL_PORT: '0' }, warn)).toEqual({})
    expect(warn).toHaveBeenCalledOnce()
    expect(warn.mock.calls[0][0]).toBe(
      'TCP_CHANNEL_PORT must be an integer between 1 and 65535, got "0"; using the default'
    )
  })

  it('warns when attempts is not a number', () => {
    const warn = vi.fn()

    expect(parseChannelEnv({ TCP_CHANNEL_ATTEMPTS: 'many' }, warn)).toEqual({})
    expect(warn.mock.calls[0][0]).toMatch(/^TCP_CHANNEL_ATTEMPTS must be a positive integer/)
  })

  it('warns when the delay is negative', () => {
    const warn = vi.fn()

    expect(parseChannelEnv({ TCP_CHANNEL_DELAY_MS: '-5' }, warn)).toEqual({})
    expect(warn.mock.calls[0][0]).toMatch(/^TCP_CHANNEL_DELAY_MS must be a non-negative integer/)
  })

  it('keeps valid variables next to malformed ones', () => {
    const warn = vi.fn()
    const result = parseChannelEnv({ TCP_CHANNEL_PORT: '9000', TCP_CHANNEL_MAX_BYTES: '0' }, warn)

    expect(result).toEqual({ port: 9000 })
    expect(warn).toHaveBeenCalledOnce()
  })
})

describe('parseInteger()', () => {
  it.each([
    ['42', 42],
    [' 7 ', 7],
    ['-3', -3],
    ['1e3', undefined],
    ['4.5', undefined],
    ['0x10', undefined],
    ['', undefined],
    ['99999999999999999999', undefined]
  ])('parses %j as %s', (raw, expected) => {
    expect(parseInteger(raw)).toBe(expected)
  })
})

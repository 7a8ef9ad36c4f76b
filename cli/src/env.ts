/**
 * Parse channel defaults from environment variables.
 *
 * Kept apart from the CLI entrypoint so it can be tested without
 * triggering process side-effects.
 *
 * @module
 */
import { isValidPort } from '@tcp-channel/channel'

/**
 * Defaults a CLI run takes from the environment. Absent fields keep the
 * library defaults.
 */
export type ChannelEnv = {
  port?: number
  host?: string
  attempts?: number
  delayMs?: number
  maxBytes?: number
}

export type EnvSource = Readonly<Record<string, string | undefined>>

/**
 * Parse an integer written in plain decimal digits, or undefined.
 */
export function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim()
  if (!/^-?\d+$/.test(trimmed)) return undefined
  const value = Number.parseInt(trimmed, 10)
  return Number.isSafeInteger(value) ? value : undefined
}

/**
 * Read TCP_CHANNEL_PORT, TCP_CHANNEL_HOST, TCP_CHANNEL_ATTEMPTS,
 * TCP_CHANNEL_DELAY_MS and TCP_CHANNEL_MAX_BYTES.
 *
 * Unset or empty variables are skipped silently. Calls `onWarning` and skips
 * the variable when it is set but malformed.
 */
export function parseChannelEnv(env: EnvSource, onWarning: (msg: string) => void): ChannelEnv {
  const result: ChannelEnv = {}

  const integer = (
    name: string,
    accept: (value: number) => boolean,
    expected: string
  ): number | undefined => {
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') return undefined
    const value = parseInteger(raw)
    if (value === undefined || !accept(value)) {
      onWarning(`${name} must be ${expected}, got "${raw}"; using the default`)
      return undefined
    }
    return value
  }

  const port = integer('TCP_CHANNEL_PORT', isValidPort, 'an integer between 1 and 65535')
  if (port !== undefined) result.port = port

  const host = env.TCP_CHANNEL_HOST?.trim()
  if (host) result.host = host

  const attempts = integer('TCP_CHANNEL_ATTEMPTS', (v) => v >= 1, 'a positive integer')
  if (attempts !== undefined) result.attempts = attempts

  const delayMs = integer('TCP_CHANNEL_DELAY_MS', (v) => v >= 0, 'a non-negative integer')
  if (delayMs !== undefined) result.delayMs = delayMs

  const maxBytes = integer('TCP_CHANNEL_MAX_BYTES', (v) => v >= 1, 'a positive integer')
  if (maxBytes !== undefined) result.maxBytes = maxBytes

  return result
}

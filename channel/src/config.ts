/**
 * Channel defaults and the validation rules that bound them.
 *
 * Per CONTRACT_CHANNEL.md:
 * - Ports are integers in [1, 65535]
 * - A channel constructed with an out-of-range port falls back to DEFAULT_PORT
 *   and reports a warning (never fatal)
 * - A single read is bounded by MAX_BUFFER bytes
 *
 * @module
 */

/** Host a send targets when none is given. */
export const DEFAULT_HOST = 'localhost'

/** Address a receive binds to: IPv4 any. */
export const LISTEN_HOST = '0.0.0.0'

/** Port used when a channel is constructed without one, or with an invalid one. */
export const DEFAULT_PORT = 10_000

/** Maximum number of bytes a single receive returns. */
export const MAX_BUFFER = 65_536

/** Default number of resolve/connect/write attempts per send. */
export const DEFAULT_ATTEMPTS = 10

/** Default wait between two failed send attempts, in milliseconds. */
export const DEFAULT_DELAY_MS = 1_000

export const MIN_PORT = 1
export const MAX_PORT = 65_535

/**
 * Per-call retry policy for send. Not persisted on the channel.
 */
export type RetryPolicy = {
  /** Number of attempts, a positive integer */
  readonly attempts: number
  /** Wait between failed attempts in milliseconds, >= 0 */
  readonly delayMs: number
}

/**
 * True if `port` is an integer transport port in [1, 65535].
 */
export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT
}

/**
 * Resolve the listening port a channel is constructed with.
 * Calls `onWarning` and returns DEFAULT_PORT when `port` is out of range.
 */
export function resolveListeningPort(port: number, onWarning: (msg: string) => void): number {
  if (isValidPort(port)) {
    return port
  }
  onWarning(
    `Port must be in the range ${MIN_PORT}-${MAX_PORT}, got ${port}. Using default ${DEFAULT_PORT}.`
  )
  return DEFAULT_PORT
}

/**
 * Validate a retry policy.
 *
 * @throws RangeError if attempts is not a positive integer or delayMs is
 *   negative or not finite
 */
export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.attempts) || policy.attempts < 1) {
    throw new RangeError(`attempts must be a positive integer, got ${policy.attempts}`)
  }
  if (!Number.isFinite(policy.delayMs) || policy.delayMs < 0) {
    throw new RangeError(`delayMs must be a finite number >= 0, got ${policy.delayMs}`)
  }
}

/**
 * Validate a receive buffer capacity. Capacities above MAX_BUFFER are clamped.
 *
 * @throws RangeError if maxBytes is not a positive integer
 */
export function resolveMaxBytes(maxBytes: number): number {
  if (!Number.isInteger(maxBytes) || maxBytes < 1) {
    throw new RangeError(`maxBytes must be a positive integer, got ${maxBytes}`)
  }
  return Math.min(maxBytes, MAX_BUFFER)
}

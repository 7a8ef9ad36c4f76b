/**
 * Outcomes of channel operations, discriminated by `status`.
 */
import type { PayloadDecodeError, SendFailedError, TransportError } from '../errors.js'

/**
 * Result of a send.
 *
 * - `sent`: one attempt connected and flushed the whole payload
 * - `skipped`: the encoded message was empty; no network I/O happened
 * - `failed`: every attempt failed; the caller decides whether that is fatal
 */
export type SendResult =
  | { readonly status: 'sent'; readonly attempts: number; readonly bytes: number }
  | { readonly status: 'skipped' }
  | { readonly status: 'failed'; readonly attempts: number; readonly error: SendFailedError }

/**
 * What a transport read from the one accepted connection.
 */
export type ReadOutcome =
  | { readonly status: 'received'; readonly bytes: Uint8Array }
  | { readonly status: 'closed' }
  | { readonly status: 'error'; readonly error: TransportError; readonly partial: Uint8Array }

/**
 * Result of a receive.
 *
 * - `received`: at least one byte arrived and decoded into `message`
 * - `closed`: the peer closed cleanly before sending a byte
 * - `error`: listen/accept/read failed, or the bytes did not decode;
 *   `partial` holds whatever was copied before the failure
 */
export type ReceiveResult<T> =
  | { readonly status: 'received'; readonly message: T; readonly bytes: Uint8Array }
  | { readonly status: 'closed' }
  | {
      readonly status: 'error'
      readonly error: TransportError | PayloadDecodeError
      readonly partial: Uint8Array
    }

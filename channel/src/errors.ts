/**
 * Error types that cross the channel boundary.
 *
 * None of these is thrown by send or receive for a transport failure: they
 * travel inside the `failed` and `error` results so callers can branch on them.
 *
 * @module
 */

/**
 * Network step that failed.
 * Send steps: resolve, connect, write. Receive steps: listen, accept, read.
 */
export type TransportPhase = 'resolve' | 'connect' | 'write' | 'listen' | 'accept' | 'read'

/**
 * Normalise an unknown thrown value into a message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Error raised by a transport, tagged with the step that failed.
 */
export class TransportError extends Error {
  constructor(
    public readonly phase: TransportPhase,
    message: string,
    cause?: unknown
  ) {
    super(message)
    this.name = 'TransportError'
    if (cause !== undefined) {
      this.cause = cause
    }
  }
}

/**
 * One failed resolve/connect/write attempt of a send.
 */
export class SendAttemptError extends Error {
  /** Failing step, when the transport reported one */
  public readonly phase: TransportPhase | undefined

  constructor(
    public readonly attempt: number,
    cause: unknown
  ) {
    const phase = cause instanceof TransportError ? cause.phase : undefined
    super(`${phase ?? 'send'} failed: ${errorMessage(cause)}`)
    this.name = 'SendAttemptError'
    this.phase = phase
    this.cause = cause
  }
}

/**
 * Every attempt of a send failed.
 */
export class SendFailedError extends Error {
  /** Errors in attempt order; never empty */
  public readonly errors: readonly SendAttemptError[]

  constructor(
    public readonly host: string,
    public readonly port: number,
    errors: readonly SendAttemptError[]
  ) {
    const last = errors[errors.length - 1]
    super(
      `Send to ${host}:${port} failed after ${errors.length} attempt(s): ${last ? last.message : 'no attempt made'}`
    )
    this.name = 'SendFailedError'
    this.errors = errors
    this.cause = last
  }

  /** Number of attempts made */
  get attempts(): number {
    return this.errors.length
  }

  /** Error of the final attempt */
  get lastError(): SendAttemptError | undefined {
    return this.errors[this.errors.length - 1]
  }
}

/**
 * Received bytes could not be decoded by the channel's payload codec.
 */
export class PayloadDecodeError extends Error {
  constructor(
    public readonly codec: string,
    public readonly byteLength: number,
    cause: unknown
  ) {
    super(`Could not decode ${byteLength} byte(s) as ${codec}: ${errorMessage(cause)}`)
    this.name = 'PayloadDecodeError'
    this.cause = cause
  }
}

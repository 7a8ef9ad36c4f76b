/**
 * Channel: push one payload to a remote host:port with bounded retry, and
 * accept one inbound connection to read one payload.
 *
 * Per CONTRACT_CHANNEL.md:
 * - A channel holds only its listening port (and an optional history log);
 *   every call opens and releases its own sockets
 * - send: up to `attempts` fresh resolve -> connect -> write cycles with a fixed
 *   delay between failures; an empty message is skipped without network I/O
 * - receive: listen -> accept one -> read once, bounded by MAX_BUFFER
 * - Transport failures come back as tagged results, never as process exits
 *
 * State machines (per call, nothing retained between calls):
 * - send: idle -> resolving -> connecting -> writing -> sent | failed;
 *   failed with attempts left loops back to resolving after the delay
 * - receive: idle -> listening -> accepted -> reading -> received | closed | error
 *
 * @module
 */
import { setTimeout as sleep } from 'node:timers/promises'
import { bytesCodec, type PayloadCodec } from './codec.js'
import {
  DEFAULT_ATTEMPTS,
  DEFAULT_DELAY_MS,
  DEFAULT_HOST,
  DEFAULT_PORT,
  isValidPort,
  LISTEN_HOST,
  MAX_BUFFER,
  resolveListeningPort,
  resolveMaxBytes,
  validateRetryPolicy
} from './config.js'
import { PayloadDecodeError, SendAttemptError, SendFailedError } from './errors.js'
import { HistoryLog } from './history.js'
import { type ChannelLogger, stderrLogger } from './logger.js'
import { bytesToText, textToBytes } from './message.js'
import { type ChannelTransport, TcpTransport } from './transport.js'
import type { ReceiveResult, SendResult } from './types/result.js'

/**
 * Channel settings other than the codec.
 */
export interface ChannelSettings {
  /** Port receive listens on when called without one. Default: DEFAULT_PORT */
  readonly port?: number
  /** Diagnostics sink. Default: stderrLogger */
  readonly logger?: ChannelLogger
  /** Keep a HistoryLog of successful sends and receives. Default: false */
  readonly history?: boolean
  /** Network implementation. Default: TcpTransport */
  readonly transport?: ChannelTransport
}

export interface SendOptions {
  /** Destination host. Default: DEFAULT_HOST */
  readonly host?: string
  /** Attempts before giving up, >= 1. Default: DEFAULT_ATTEMPTS */
  readonly attempts?: number
  /** Wait between failed attempts in ms. Default: DEFAULT_DELAY_MS */
  readonly delayMs?: number
  /** Cancels the in-flight attempt and the back-off; send then rejects */
  readonly signal?: AbortSignal
}

export interface ReceiveOptions {
  /** Bind address. Default: LISTEN_HOST */
  readonly host?: string
  /** Read buffer capacity, clamped to MAX_BUFFER. Default: MAX_BUFFER */
  readonly maxBytes?: number
  /** Stops waiting for a peer; receive then rejects. There is no other timeout */
  readonly signal?: AbortSignal
  /** Called once the endpoint is bound, with the bound port */
  readonly onListening?: (port: number) => void
}

export class Channel<T = Uint8Array> {
  /** Port receive listens on when called without a valid one; always in [1, 65535] */
  readonly listeningPort: number

  private readonly codec: PayloadCodec<T>
  private readonly logger: ChannelLogger
  private readonly transport: ChannelTransport
  private readonly log: HistoryLog<T> | null

  /**
   * @param codec - Converts messages to and from wire bytes
   * @param settings - Port, logger, history and transport
   *
   * @remarks
   * An out-of-range port is replaced by DEFAULT_PORT with a warning on the logger.
   */
  constructor(codec: PayloadCodec<T>, settings: ChannelSettings = {}) {
    this.codec = codec
    this.logger = settings.logger ?? stderrLogger
    this.transport = settings.transport ?? new TcpTransport()
    this.listeningPort = resolveListeningPort(settings.port ?? DEFAULT_PORT, (msg) =>
      this.logger.warn(`Channel(): ${msg}`)
    )
    this.log = settings.history ? new HistoryLog<T>() : null
  }

  /** History of successful sends and receives, or null when not enabled. */
  get history(): HistoryLog<T> | null {
    return this.log
  }

  /**
   * Send a message to `host:port`.
   *
   * @throws RangeError if the retry policy is invalid (before any network I/O)
   * @throws the abort reason if `options.signal` aborts
   */
  send(message: T, port: number, options: SendOptions = {}): Promise<SendResult> {
    return this.deliver(this.codec.encode(message), port, options, () => {
      this.log?.append('sent', message)
    })
  }

  /**
   * Send the byte-for-byte view of `text`, bypassing the codec.
   * Not recorded in the history log, whose entries are codec messages.
   */
  sendText(text: string, port: number, options: SendOptions = {}): Promise<SendResult> {
    return this.deliver(textToBytes(text), port, options, () => {})
  }

  /**
   * Accept one connection and read one message.
   *
   * @param port - Port to listen on; 0 or any out-of-range value means `listeningPort`
   * @throws RangeError if `options.maxBytes` is not a positive integer
   * @throws the abort reason if `options.signal` aborts
   */
  async receive(port = 0, options: ReceiveOptions = {}): Promise<ReceiveResult<T>> {
    const listenPort = isValidPort(port) ? port : this.listeningPort
    const host = options.host ?? LISTEN_HOST
    const maxBytes = resolveMaxBytes(options.maxBytes ?? MAX_BUFFER)

    const outcome = await this.transport.acceptOnce(listenPort, {
      host,
      maxBytes,
      signal: options.signal,
      onListening: (bound) => {
        this.logger.debug(`receive: listening on ${host}:${bound}`)
        options.onListening?.(bound)
      }
    })

    switch (outcome.status) {
      case 'closed':
        this.logger.debug(`receive: peer closed the connection on port ${listenPort} without sending`)
        return outcome
      case 'error':
        this.logger.error(`receive: ${outcome.error.message}`)
        return outcome
      case 'received': {
        let message: T
        try {
          message = this.codec.decode(outcome.bytes)
        } catch (err) {
          const error = new PayloadDecodeError(this.codec.name, outcome.bytes.length, err)
          this.logger.error(`receive: ${error.message}`)
          return { status: 'error', error, partial: outcome.bytes }
        }
        this.log?.append('received', message)
        this.logger.debug(`receive: ${outcome.bytes.length} byte(s) on port ${listenPort}`)
        return { status: 'received', message, bytes: outcome.bytes }
      }
      default: {
        const _exhaustive: never = outcome
        return _exhaustive
      }
    }
  }

  /**
   * Best-effort receive: the bytes that arrived, an empty sequence when the
   * peer closed without sending, or the partial bytes when an error occurred.
   * Errors are logged, not returned.
   */
  async receiveBytes(port = 0, options: ReceiveOptions = {}): Promise<Uint8Array> {
    const result = await this.receive(port, options)
    switch (result.status) {
      case 'received':
        return result.bytes
      case 'closed':
        return new Uint8Array(0)
      case 'error':
        return result.partial
      default: {
        const _exhaustive: never = result
        return _exhaustive
      }
    }
  }

  /**
   * receiveBytes viewed as text, one character per byte.
   */
  async receiveText(port = 0, options: ReceiveOptions = {}): Promise<string> {
    return bytesToText(await this.receiveBytes(port, options))
  }

  /**
   * Bounded retry loop shared by send and sendText.
   */
  private async deliver(
    payload: Uint8Array,
    port: number,
    options: SendOptions,
    onSent: () => void
  ): Promise<SendResult> {
    const host = options.host ?? DEFAULT_HOST
    const attempts = options.attempts ?? DEFAULT_ATTEMPTS
    const delayMs = options.delayMs ?? DEFAULT_DELAY_MS
    const { signal } = options
    validateRetryPolicy({ attempts, delayMs })

    if (payload.length === 0) {
      this.logger.debug('send: empty message, nothing to send')
      return { status: 'skipped' }
    }

    const errors: SendAttemptError[] = []

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.transport.writeOnce(host, port, payload, { signal })
      } catch (err) {
        if (signal?.aborted) throw err

        const failure = new SendAttemptError(attempt, err)
        errors.push(failure)
        this.logger.warn(`send: attempt ${attempt} of ${attempts} failed: ${failure.message}`)

        if (attempt < attempts) {
          await sleep(delayMs, undefined, { signal })
        }
        continue
      }

      onSent()
      this.logger.debug(
        `send: ${payload.length} byte(s) delivered to ${host}:${port} on attempt ${attempt}`
      )
      return { status: 'sent', attempts: attempt, bytes: payload.length }
    }

    const error = new SendFailedError(host, port, errors)
    this.logger.error(`send: maximum attempts (${attempts}) reached for ${host}:${port}`)
    return { status: 'failed', attempts, error }
  }
}

/**
 * Create a channel.
 *
 * Without a codec, messages are raw byte sequences (`Uint8Array`).
 *
 * @example
 * ```ts
 * const channel = createChannel({ port: 12345 })
 * const pending = channel.receive()
 * await channel.send(textToBytes('ping'), 12345)
 * ```
 */
export function createChannel(settings?: ChannelSettings): Channel<Uint8Array>
export function createChannel<T>(
  settings: ChannelSettings & { readonly codec: PayloadCodec<T> }
): Channel<T>
export function createChannel<T>(
  settings: ChannelSettings & { readonly codec?: PayloadCodec<T> } = {}
): Channel<T> | Channel<Uint8Array> {
  const { codec, ...rest } = settings
  return codec ? new Channel(codec, rest) : new Channel(bytesCodec, rest)
}

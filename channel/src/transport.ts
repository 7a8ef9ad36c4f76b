/**
 * TcpTransport: the one-shot TCP operations a channel is built on.
 *
 * Per CONTRACT_CHANNEL.md:
 * - writeOnce: fresh name resolution, a fresh connection, one write of the
 *   whole payload, then close. No connection is reused across calls.
 * - acceptOnce: bind, accept exactly one peer, perform one read into a fixed
 *   buffer of at most MAX_BUFFER bytes, close. No accept loop, no second read.
 * - Neither operation has an implicit timeout; only an AbortSignal ends them early.
 * - Every socket and listening endpoint is released before the returned promise settles.
 *
 * @module
 */
import type { LookupAddress } from 'node:dns'
import { lookup } from 'node:dns/promises'
import net from 'node:net'
import { LISTEN_HOST, MAX_BUFFER } from './config.js'
import { errorMessage, TransportError, type TransportPhase } from './errors.js'
import type { ReadOutcome } from './types/result.js'

export interface WriteOnceOptions {
  /** Cancels resolution, connection and write; the call rejects with the abort reason */
  readonly signal?: AbortSignal
}

export interface AcceptOnceOptions {
  /** Bind address. Default: LISTEN_HOST (IPv4 any) */
  readonly host?: string
  /** Read buffer capacity, clamped to MAX_BUFFER. Default: MAX_BUFFER */
  readonly maxBytes?: number
  /** Stops listening; the call rejects with the abort reason */
  readonly signal?: AbortSignal
  /** Called once the endpoint is bound, with the bound port */
  readonly onListening?: (port: number) => void
}

/**
 * The transport seam a Channel drives.
 *
 * writeOnce rejects with a TransportError when a step fails. acceptOnce never
 * rejects for a transport failure: it resolves with an `error` outcome, and
 * rejects only when aborted.
 */
export interface ChannelTransport {
  writeOnce(host: string, port: number, payload: Uint8Array, options?: WriteOnceOptions): Promise<void>
  acceptOnce(port: number, options?: AcceptOnceOptions): Promise<ReadOutcome>
}

/**
 * Resolve every address of `host`. Fresh lookup on each call.
 */
async function resolveAddresses(host: string): Promise<string[]> {
  let records: LookupAddress[]
  try {
    records = await lookup(host, { all: true })
  } catch (err) {
    throw new TransportError('resolve', `could not resolve ${host}: ${errorMessage(err)}`, err)
  }
  if (records.length === 0) {
    throw new TransportError('resolve', `no addresses found for ${host}`)
  }
  return records.map((record) => record.address)
}

/**
 * Open a connection to one address.
 * Resolves only from a single code path to avoid double-settlement.
 */
function connectTo(address: string, port: number, signal?: AbortSignal): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }

    const socket = net.createConnection({ host: address, port })
    let settled = false

    const settle = (fn: () => void): void => {
      if (settled) return
      settled = true
      cleanup()
      fn()
    }

    const onConnect = (): void => settle(() => resolve(socket))
    const onError = (err: Error): void =>
      settle(() => {
        socket.destroy()
        reject(err)
      })
    const onAbort = (): void =>
      settle(() => {
        socket.destroy()
        reject(signal?.reason)
      })

    const cleanup = (): void => {
      socket.off('connect', onConnect)
      socket.off('error', onError)
      signal?.removeEventListener('abort', onAbort)
    }

    socket.on('connect', onConnect)
    socket.on('error', onError)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Try each resolved address in order; the first that accepts wins.
 */
async function connectFirst(
  addresses: readonly string[],
  port: number,
  signal?: AbortSignal
): Promise<net.Socket> {
  let lastError: unknown
  for (const address of addresses) {
    try {
      return await connectTo(address, port, signal)
    } catch (err) {
      if (signal?.aborted) throw err
      lastError = err
    }
  }
  throw new TransportError(
    'connect',
    `could not connect to port ${port} on ${addresses.join(', ')}: ${errorMessage(lastError)}`,
    lastError
  )
}

/**
 * Write the whole payload in one call, half-close, and wait until it is flushed.
 * The socket is destroyed on every path.
 */
function writeAndClose(socket: net.Socket, payload: Uint8Array, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false

    const settle = (fn: () => void): void => {
      if (settled) return
      settled = true
      cleanup()
      socket.destroy()
      fn()
    }

    const onFinish = (): void => settle(() => resolve())
    const onError = (err: Error): void =>
      settle(() => reject(new TransportError('write', `write failed: ${err.message}`, err)))
    const onClose = (): void =>
      settle(() =>
        reject(new TransportError('write', 'connection closed before the payload was flushed'))
      )
    const onAbort = (): void => settle(() => reject(signal?.reason))

    const cleanup = (): void => {
      socket.off('finish', onFinish)
      socket.off('error', onError)
      socket.off('close', onClose)
      signal?.removeEventListener('abort', onAbort)
    }

    if (signal?.aborted) {
      onAbort()
      return
    }

    // Attach listeners before end() to catch synchronous errors
    socket.on('finish', onFinish)
    socket.on('error', onError)
    socket.on('close', onClose)
    signal?.addEventListener('abort', onAbort, { once: true })

    socket.end(payload)
  })
}

/**
 * Default transport over node:net.
 */
export class TcpTransport implements ChannelTransport {
  /**
   * Resolve `host`, connect to `port`, write `payload` once and close.
   *
   * @throws TransportError tagged `resolve`, `connect` or `write`
   * @throws the abort reason if `signal` aborts
   */
  async writeOnce(
    host: string,
    port: number,
    payload: Uint8Array,
    options: WriteOnceOptions = {}
  ): Promise<void> {
    const { signal } = options
    signal?.throwIfAborted()

    const addresses = await resolveAddresses(host)
    signal?.throwIfAborted()

    const socket = await connectFirst(addresses, port, signal)
    await writeAndClose(socket, payload, signal)
  }

  /**
   * Listen on `port`, accept one connection and read what it sends.
   *
   * One read: the first chunk the socket delivers completes the call, whether
   * or not the peer keeps its end open. Bytes past the buffer capacity, and
   * anything sent after that chunk, are discarded. End of stream before any
   * byte is a `closed` outcome.
   *
   * @throws the abort reason if `signal` aborts; transport failures resolve
   *   with an `error` outcome instead
   */
  acceptOnce(port: number, options: AcceptOnceOptions = {}): Promise<ReadOutcome> {
    const host = options.host ?? LISTEN_HOST
    const capacity = Math.min(options.maxBytes ?? MAX_BUFFER, MAX_BUFFER)
    const { signal, onListening } = options

    return new Promise<ReadOutcome>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason)
        return
      }

      const server = net.createServer()
      server.maxConnections = 1

      const buffer = Buffer.alloc(capacity)
      let length = 0
      let peer: net.Socket | null = null
      let settled = false

      const copied = (): Uint8Array => new Uint8Array(buffer.subarray(0, length))

      // Runs `fn` once the accepted socket and the listening endpoint are closed
      const settle = (fn: () => void): void => {
        if (settled) return
        settled = true
        signal?.removeEventListener('abort', onAbort)
        peer?.destroy()
        if (server.listening) {
          server.close(() => fn())
        } else {
          fn()
        }
      }

      const complete = (): void => {
        const outcome: ReadOutcome =
          length === 0 ? { status: 'closed' } : { status: 'received', bytes: copied() }
        settle(() => resolve(outcome))
      }

      const fail = (phase: TransportPhase, err: Error): void => {
        const error = new TransportError(phase, `${phase} failed: ${err.message}`, err)
        const partial = copied()
        settle(() => resolve({ status: 'error', error, partial }))
      }

      const onAbort = (): void => settle(() => reject(signal?.reason))

      server.on('connection', (socket: net.Socket) => {
        if (peer !== null || settled) {
          socket.destroy()
          return
        }
        peer = socket

        socket.on('data', (chunk: Buffer) => {
          if (settled) return
          length = chunk.copy(buffer, 0, 0, Math.min(chunk.length, capacity))
          complete()
        })
        socket.on('end', complete)
        socket.on('close', complete)
        socket.on('error', (err: Error) => fail('read', err))
      })

      server.on('error', (err: Error) => fail(server.listening ? 'accept' : 'listen', err))
      signal?.addEventListener('abort', onAbort, { once: true })

      server.listen(port, host, () => {
        // Aborted while the bind was in flight
        if (settled) {
          server.close()
          return
        }
        const address = server.address()
        onListening?.(typeof address === 'object' && address !== null ? address.port : port)
      })
    })
  }
}

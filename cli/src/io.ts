/**
 * Standard stream plumbing for the CLI: the message a send reads from stdin,
 * and the payload a receive writes to stdout.
 *
 * @module
 */
import type { Readable, Writable } from 'node:stream'

/**
 * stdout was gone before the received payload could be written.
 */
export class OutputClosedError extends Error {
  constructor(public readonly state: 'destroyed' | 'ended') {
    super(`output stream is ${state}`)
    this.name = 'OutputClosedError'
  }
}

/**
 * Read a stream to its end as raw bytes.
 */
export async function readAll(stream: Readable): Promise<Uint8Array> {
  const chunks: Buffer[] = []

  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : Buffer.from(chunk))
  }

  return new Uint8Array(Buffer.concat(chunks))
}

/**
 * Write the whole payload and resolve once the stream has flushed it.
 * A receive writes at most MAX_BUFFER bytes, once, so the write callback
 * is the only completion signal needed; a stream error rejects instead.
 */
export function writeOutput(stream: Writable, payload: Uint8Array): Promise<void> {
  if (stream.destroyed) return Promise.reject(new OutputClosedError('destroyed'))
  if (stream.writableEnded) return Promise.reject(new OutputClosedError('ended'))

  return new Promise((resolve, reject) => {
    // A failed write also emits 'error' after the callback; onError stays
    // attached on that path so the event is consumed, not thrown
    const onError = (err: Error): void => reject(err)
    stream.once('error', onError)
    stream.write(payload, (err) => {
      if (err) {
        reject(err)
        return
      }
      stream.off('error', onError)
      resolve()
    })
  })
}

/**
 * Payload codecs: how a channel turns its message type into wire bytes.
 *
 * The wire carries exactly the encoded bytes, with no length prefix or type tag.
 * A message whose encoding is empty is never sent.
 *
 * @module
 */
import { decode as msgpackDecode, encode as msgpackEncode } from '@msgpack/msgpack'
import { bytesToText, textToBytes } from './message.js'

/**
 * Converts between a message type and the bytes written to the socket.
 */
export interface PayloadCodec<T> {
  /** Name used in diagnostics */
  readonly name: string
  encode(message: T): Uint8Array
  /** @throws if the bytes are not a valid encoding */
  decode(bytes: Uint8Array): T
}

/** Identity codec: messages are raw byte sequences. */
export const bytesCodec: PayloadCodec<Uint8Array> = {
  name: 'bytes',
  encode: (message) => message,
  decode: (bytes) => bytes
}

/** Messages are strings viewed byte-for-byte (latin1). */
export const textCodec: PayloadCodec<string> = {
  name: 'text',
  encode: textToBytes,
  decode: bytesToText
}

/**
 * Structured messages encoded with msgpack.
 *
 * With a type guard, decoded values that fail the guard are rejected; without
 * one, messages are `unknown`. A msgpack encoding is never empty, so every
 * message on a msgpack channel is sent (including `""` and `null`).
 */
export function msgpackCodec(): PayloadCodec<unknown>
export function msgpackCodec<T>(guard: (value: unknown) => value is T): PayloadCodec<T>
export function msgpackCodec<T>(
  guard?: (value: unknown) => value is T
): PayloadCodec<T> | PayloadCodec<unknown> {
  if (!guard) {
    const untyped: PayloadCodec<unknown> = {
      name: 'msgpack',
      encode: (message) => msgpackEncode(message),
      decode: (bytes) => msgpackDecode(bytes)
    }
    return untyped
  }
  const guarded: PayloadCodec<T> = {
    name: 'msgpack',
    encode: (message) => msgpackEncode(message),
    decode: (bytes) => {
      const value = msgpackDecode(bytes)
      if (!guard(value)) {
        throw new TypeError('decoded msgpack value does not match the expected message shape')
      }
      return value
    }
  }
  return guarded
}

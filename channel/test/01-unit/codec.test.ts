import { encode as msgpackEncode } from '@msgpack/msgpack'
import { describe, expect, it } from 'vitest'
import { bytesCodec, msgpackCodec, textCodec } from '../../src/codec.js'

type Ping = { kind: 'ping'; seq: number }

function isPing(value: unknown): value is Ping {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'ping' &&
    'seq' in value &&
    typeof value.seq === 'number'
  )
}

describe('bytesCodec', () => {
  it('passes bytes through unchanged', () => {
    const bytes = new Uint8Array([1, 2, 3])

    expect(bytesCodec.encode(bytes)).toBe(bytes)
    expect(bytesCodec.decode(bytes)).toBe(bytes)
  })
})

describe('textCodec', () => {
  it('encodes text byte-for-byte', () => {
    expect(Array.from(textCodec.encode('hi'))).toEqual([0x68, 0x69])
  })

  it('decodes bytes byte-for-byte', () => {
    expect(textCodec.decode(new Uint8Array([0x68, 0x69]))).toBe('hi')
  })

  it('encodes the empty string to zero bytes', () => {
    expect(textCodec.encode('').length).toBe(0)
  })
})

describe('msgpackCodec()', () => {
  it('encodes with msgpack', () => {
    const codec = msgpackCodec(isPing)

    expect(Array.from(codec.encode({ kind: 'ping', seq: 1 }))).toEqual(
      Array.from(msgpackEncode({ kind: 'ping', seq: 1 }))
    )
  })

  it('decodes a value that passes the guard', () => {
    const codec = msgpackCodec(isPing)

    expect(codec.decode(msgpackEncode({ kind: 'ping', seq: 7 }))).toEqual({ kind: 'ping', seq: 7 })
  })

  it('rejects a decoded value that fails the guard', () => {
    const codec = msgpackCodec(isPing)

    expect(() => codec.decode(msgpackEncode({ kind: 'pong', seq: 7 }))).toThrow(
      'decoded msgpack value does not match the expected message shape'
    )
  })

  it('rejects truncated input', () => {
    const codec = msgpackCodec()
    const encoded = msgpackEncode({ kind: 'ping', seq: 7 })

    expect(() => codec.decode(encoded.subarray(0, encoded.length - 2))).toThrow()
  })

  it('never produces an empty encoding, even for an empty string', () => {
    const codec = msgpackCodec()

    expect(Array.from(codec.encode(''))).toEqual([0xa0])
  })
})

/**
 * Text view of a byte-sequence message.
 *
 * Each byte maps to the character with the same code unit (latin1), so the
 * conversion is a byte-for-byte reinterpretation, not a text encoding.
 * Characters above U+00FF do not survive `textToBytes`: only their low byte is kept.
 */

/**
 * View a message as text, one character per byte.
 */
export function bytesToText(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')
}

/**
 * Build a message from text, one byte per character.
 */
export function textToBytes(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'latin1'))
}

import { CHARCODE_CLASSES } from './char-codes'

/**
 * Maps every byte to the UTF-16 code unit of the same value, so byte runs
 * can be matched with ordinary regular expressions.
 */
export const toBinaryString = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    'latin1',
  )

export const fromBinaryString = (text: string): Uint8Array =>
  new Uint8Array(Buffer.from(text, 'latin1'))

export const concatBytes = (left: Uint8Array, right: Uint8Array): Uint8Array => {
  if (left.length === 0) return right
  if (right.length === 0) return left
  const joined = new Uint8Array(left.length + right.length)
  joined.set(left, 0)
  joined.set(right, left.length)
  return joined
}

export const hexByte = (value: number): string =>
  value.toString(16).padStart(2, '0')

/** Length of `text` in code points rather than UTF-16 units. */
export const charLength = (text: string): number => {
  let length = 0
  for (const _char of text) {
    length += 1
  }
  return length
}

/**
 * Printable ASCII stays as is, whitespace becomes `·` and everything else
 * becomes `▯`.
 */
export const toSafeChar = (byte: number): string => {
  if (CHARCODE_CLASSES.whitespace.has(byte)) return '·'
  if (CHARCODE_CLASSES.printable.has(byte)) return String.fromCharCode(byte)
  return '▯'
}

/**
 * Short debug rendering: `len 3 [1b 5b 41]`, elided after `limit` bytes.
 */
export const describeBytes = (bytes: Uint8Array, limit = 5): string => {
  const head = Array.from(bytes.subarray(0, limit), hexByte).join(' ')
  const ellipsis = bytes.length > limit ? ' ..' : ''
  return `len ${bytes.length} [${head}${ellipsis}]`
}

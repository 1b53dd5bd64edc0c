import { hexByte, toSafeChar } from '../internal/bytes'
import type { Segment } from './segment'

/**
 * How style markers appear in a printer's output: dropped, applied as live
 * SGR sequences, or shown in the escaped diagnostic form.
 */
export type StyleRendering = 'none' | 'live' | 'escaped'

/**
 * Pure `Segment -> text` visitor. `column` is the byte position of the
 * segment within the slice being printed.
 */
export interface SegmentPrinter {
  readonly name: string
  readonly styles: StyleRendering
  print(segment: Segment, column: number): string
}

export const BYTE_GROUP_SIZE = 4

/**
 * Hex cell for every byte, ` xx`, with one extra space between groups of
 * {@link BYTE_GROUP_SIZE} bytes.
 */
export const formatHexCells = (bytes: Uint8Array, column: number): string => {
  let result = ''
  bytes.forEach((byte, index) => {
    const position = column + index
    if (position > 0 && position % BYTE_GROUP_SIZE === 0) {
      result += ' '
    }
    result += ` ${hexByte(byte)}`
  })
  return result
}

export const rawHexPrinter: SegmentPrinter = {
  name: 'raw-hex',
  styles: 'live',
  print: (segment, column) => formatHexCells(segment.raw, column),
}

export const processedPrinter: SegmentPrinter = {
  name: 'processed',
  styles: 'live',
  print: (segment) => segment.processed,
}

export const debugHexPrinter: SegmentPrinter = {
  name: 'debug-hex',
  styles: 'none',
  print: (segment, column) => formatHexCells(segment.raw, column),
}

export const debugSafePrinter: SegmentPrinter = {
  name: 'debug-safe',
  styles: 'none',
  print: (segment) => Array.from(segment.raw, toSafeChar).join(''),
}

export const debugStylesPrinter: SegmentPrinter = {
  name: 'debug-styles',
  styles: 'escaped',
  print: (segment) => Array.from(segment.raw, toSafeChar).join(''),
}

import { SegmentSplitError } from '../errors'
import { charLength, hexByte } from '../internal/bytes'
import type { Style } from '../style/style'

/**
 * A classified run of raw bytes together with the text that stands in for
 * it on screen and the style that text opens with.
 *
 * A segment is consistent when its processed text has one character per raw
 * byte. Only consistent segments can be split; detail annotations and
 * text-mode labels are deliberately inconsistent.
 */
export class Segment {
  readonly style: Style
  readonly typeLabel: string
  private rawBytes: Uint8Array
  private processedText: string

  constructor(
    style: Style,
    typeLabel: string,
    raw: Uint8Array,
    processed: string,
  ) {
    this.style = style
    this.typeLabel = typeLabel
    this.rawBytes = raw
    this.processedText = processed
  }

  get raw(): Uint8Array {
    return this.rawBytes
  }

  get processed(): string {
    return this.processedText
  }

  get byteLength(): number {
    return this.rawBytes.length
  }

  get isNewline(): boolean {
    return this.processedText.includes('\n')
  }

  get isConsistent(): boolean {
    return this.rawBytes.length === charLength(this.processedText)
  }

  /**
   * Cuts off the first `byteCount` bytes into a new segment and keeps the
   * rest in place.
   */
  split(byteCount: number): Segment {
    if (!this.isConsistent) {
      throw new SegmentSplitError(
        `Cannot split inconsistent segment ${this.toString()}: processed text ` +
          'is not aligned with raw bytes',
      )
    }
    if (byteCount <= 0 || byteCount >= this.rawBytes.length) {
      throw new SegmentSplitError(
        `Split offset ${byteCount} is outside of ${this.toString()}`,
      )
    }

    const chars = Array.from(this.processedText)
    const left = new Segment(
      this.style,
      this.typeLabel,
      this.rawBytes.subarray(0, byteCount),
      chars.slice(0, byteCount).join(''),
    )

    this.rawBytes = this.rawBytes.subarray(byteCount)
    this.processedText = chars.slice(byteCount).join('')
    return left
  }

  equals(other: Segment): boolean {
    return (
      this.style.equals(other.style) &&
      this.typeLabel === other.typeLabel &&
      this.processedText === other.processedText &&
      this.rawBytes.length === other.rawBytes.length &&
      this.rawBytes.every((byte, index) => other.rawBytes[index] === byte)
    )
  }

  toString(): string {
    const hex = Array.from(this.rawBytes, hexByte).join(' ')
    return `Segment<${this.typeLabel}>[${hex}]->[${this.processedText}]`
  }
}

import { BufferRebaseError } from '../errors'
import { concatBytes } from '../internal/bytes'

/**
 * Bytes read but not yet classified. The parser hands back whatever it could
 * not match yet, which must be a suffix of what it was given.
 */
export class ParserBuffer {
  private data: Uint8Array = new Uint8Array(0)
  private consumed = 0
  private finished = false

  append(chunk: Uint8Array, final: boolean): void {
    this.data = concatBytes(this.data, chunk)
    this.finished = this.finished || final
  }

  get current(): Uint8Array {
    return this.data
  }

  /** No more input follows the buffered bytes. */
  get closed(): boolean {
    return this.finished
  }

  /** Stream offset of the first buffered byte. */
  get offset(): number {
    return this.consumed
  }

  get length(): number {
    return this.data.length
  }

  retainSuffix(remainder: Uint8Array): void {
    const start = this.data.length - remainder.length
    const isSuffix =
      start >= 0 && remainder.every((byte, index) => this.data[start + index] === byte)
    if (!isSuffix) {
      throw new BufferRebaseError(
        `Remainder of ${remainder.length} byte(s) is not a suffix of the ` +
          `${this.data.length} buffered byte(s)`,
      )
    }
    this.consumed += start
    this.data = this.data.subarray(start)
  }
}

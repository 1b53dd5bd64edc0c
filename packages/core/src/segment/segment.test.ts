import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { SegmentSplitError } from '../errors'
import { STYLES } from '../style/style'
import { Segment } from './segment'

const bytes = (text: string): Uint8Array => new Uint8Array(Buffer.from(text, 'latin1'))

describe('Segment', () => {
  it('splits off the requested number of bytes', () => {
    const segment = new Segment(STYLES.RED, 'P', bytes('abcd'), 'abcd')
    const left = segment.split(1)

    expect(left.processed).toBe('a')
    expect(Array.from(left.raw)).toEqual([0x61])
    expect(segment.processed).toBe('bcd')
    expect(segment.byteLength).toBe(3)
    expect(left.style).toBe(STYLES.RED)
  })

  it('splits processed text by code points', () => {
    const segment = new Segment(STYLES.RED, 'C', bytes('\u0001\u0002'), 'ⱯⱯ')
    expect(segment.split(1).processed).toBe('Ɐ')
    expect(segment.processed).toBe('Ɐ')
  })

  it('refuses to split inconsistent segments', () => {
    const segment = new Segment(STYLES.HI_BLUE, 'U', bytes('Ã©'), 'é')
    expect(segment.isConsistent).toBe(false)
    expect(() => segment.split(1)).toThrow(SegmentSplitError)
  })

  it('refuses split offsets outside of the segment', () => {
    const segment = new Segment(STYLES.RED, 'P', bytes('ab'), 'ab')
    expect(() => segment.split(0)).toThrow(SegmentSplitError)
    expect(() => segment.split(2)).toThrow(SegmentSplitError)
  })

  it('detects newlines in processed text', () => {
    expect(new Segment(STYLES.HI_CYAN, 'S', bytes('\n'), '↵\n').isNewline).toBe(true)
    expect(new Segment(STYLES.HI_CYAN, 'S', bytes('\n'), '↵').isNewline).toBe(false)
  })

  it('keeps bytes and text intact across any split', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 2, maxLength: 40 }).filter((text) => /^[\x21-\x7e]+$/.test(text)),
        fc.nat(),
        (text, seed) => {
          const cut = 1 + (seed % (text.length - 1))
          const segment = new Segment(STYLES.RED, 'P', bytes(text), text)
          const left = segment.split(cut)

          expect(left.processed + segment.processed).toBe(text)
          expect(left.byteLength + segment.byteLength).toBe(text.length)
          expect(left.isConsistent && segment.isConsistent).toBe(true)
        },
      ),
    )
  })
})

import { describe, expect, it } from 'vitest'
import {
  escapeStyles,
  indexed,
  paint,
  STYLES,
  Style,
  stripStyles,
} from './style'

describe('Style', () => {
  it('assembles into a single SGR sequence', () => {
    expect(Style.of(1, 31).assemble()).toBe('\u001b[1;31m')
    expect(Style.NOOP.assemble()).toBe('')
  })

  it('closes each attribute with its own off code', () => {
    expect(Style.of(1, 31, 48, 5, 16).closer().key).toBe('22;39;49')
    expect(Style.of(2, 1).closer().key).toBe('22')
    expect(indexed(102).closer().key).toBe('39')
  })

  it('treats resets and empty styles as no-ops', () => {
    expect(Style.of(0).isNoop).toBe(true)
    expect(Style.NOOP.isNoop).toBe(true)
    expect(Style.of(0).closer()).toBe(Style.NOOP)
    expect(STYLES.RED.isNoop).toBe(false)
  })

  it('merges by concatenating parameters', () => {
    expect(STYLES.RED.merge(STYLES.BOLD).key).toBe('31;1')
    expect(STYLES.RED.merge(Style.NOOP)).toBe(STYLES.RED)
    expect(STYLES.RED.equals(Style.of(31))).toBe(true)
  })
})

describe('style helpers', () => {
  it('paints text with the style and its closer', () => {
    expect(paint(STYLES.RED, 'x')).toBe('\u001b[31mx\u001b[39m')
  })

  it('strips and escapes SGR sequences', () => {
    const styled = '\u001b[31mA\u001b[39m'
    expect(stripStyles(styled)).toBe('A')
    expect(escapeStyles(styled)).toBe('[ǝ31]A[ǝ39]')
  })
})

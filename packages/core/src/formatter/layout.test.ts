import { describe, expect, it } from 'vitest'
import {
  computeColumns,
  formatLineNumberPrefix,
  formatOffset,
  formatOffsetPrefix,
  hexColumnWidth,
} from './layout'

describe('formatOffset', () => {
  it('pads hex offsets to an even digit count taken from the decimal length', () => {
    expect(formatOffset(0, false)).toBe('0x00')
    expect(formatOffset(4, false)).toBe('0x04')
    expect(formatOffset(16, false)).toBe('0x10')
    expect(formatOffset(100, false)).toBe('0x0064')
    expect(formatOffset(255, false)).toBe('0x00ff')
  })

  it('prints decimal offsets as they are', () => {
    expect(formatOffset(100, true)).toBe('100')
  })
})

describe('prefixes', () => {
  it('right-aligns offsets and appends the separator', () => {
    expect(formatOffsetPrefix(4, false)).toBe(
      '\u001b[32m    0x04\u001b[39m\u001b[36m│\u001b[39m',
    )
  })

  it('pads line numbers to two columns', () => {
    expect(formatLineNumberPrefix(3, { debug: false, noLineNumbers: false })).toBe(
      '\u001b[32m 3\u001b[39m\u001b[36m│\u001b[39m',
    )
    expect(formatLineNumberPrefix(3, { debug: false, noLineNumbers: true })).toBe('')
    expect(formatLineNumberPrefix(3, { debug: true, noLineNumbers: true })).toBe(
      '\u001b[32m       3\u001b[39m\u001b[36m│\u001b[39m',
    )
  })
})

describe('computeColumns', () => {
  it('fits whole groups of four bytes into the terminal', () => {
    expect(computeColumns(80, 9)).toBe(16)
    expect(computeColumns(120, 9)).toBe(24)
  })

  it('never goes below one group', () => {
    expect(computeColumns(20, 9)).toBe(4)
  })
})

describe('hexColumnWidth', () => {
  it('counts cells and group gaps', () => {
    expect(hexColumnWidth(0)).toBe(0)
    expect(hexColumnWidth(4)).toBe(12)
    expect(hexColumnWidth(5)).toBe(16)
    expect(hexColumnWidth(8)).toBe(25)
  })
})

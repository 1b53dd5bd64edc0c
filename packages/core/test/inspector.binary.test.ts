import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import { SegmentSplitError } from '../src/errors'
import { createInspector } from '../src/inspector'
import { MemoryOutputSink } from '../src/io/output'
import { resolveSettings } from '../src/settings'
import { stripStyles } from '../src/style/style'
import { toOverride } from '../src/template/override'
import { TEMPLATE_DEFINITIONS } from '../src/template/registry'
import type { TemplateDefinition } from '../src/template/template'
import { ReadMode, type SettingsOverrides } from '../src/types'

const bytes = (text: string): Uint8Array => new Uint8Array(Buffer.from(text, 'latin1'))

const inspectBinary = (input: Uint8Array, overrides: SettingsOverrides = {}) => {
  const output = new MemoryOutputSink()
  const inspector = createInspector(
    resolveSettings({ readMode: ReadMode.Binary, ...overrides }),
    { output },
  )
  inspector.inspectBytes(input)
  return { output, inspector }
}

describe('binary mode', () => {
  it('pads the last row and ends with the final offset', () => {
    const { output, inspector } = inspectBinary(bytes('abcdef'), { columns: 4 })

    expect(stripStyles(output.text).split('\n')).toEqual([
      '    0x00│ 61 62 63 64 │abcd',
      '    0x04│ 65 66       │ef',
      '    0x06│',
      '',
    ])
    expect(inspector.offset).toBe(6)
  })

  it('colors hex cells and rendered bytes alike', () => {
    const { output } = inspectBinary(bytes('abcdef'), { columns: 4 })

    expect(output.lines[0]).toBe(
      '\u001b[32m    0x00\u001b[39m\u001b[36m│\u001b[39m' +
        '\u001b[38;5;102m 61 62 63 64\u001b[39m' +
        ' \u001b[36m│\u001b[39m' +
        '\u001b[38;5;102mabcd\u001b[39m',
    )
    expect(output.lines[2]).toBe('\u001b[92m    0x06\u001b[39m\u001b[36m│\u001b[39m')
  })

  it('prints decimal offsets', () => {
    const { output } = inspectBinary(bytes('abcdef'), { columns: 4, decimalOffsets: true })
    expect(stripStyles(output.text).split('\n').map((line) => line.slice(0, 9))).toEqual([
      '       0│',
      '       4│',
      '       6│',
      '',
    ])
  })

  it('aborts instead of cutting a row through a misaligned segment', () => {
    // Two characters per byte leave printable segments unsplittable.
    const definitions = TEMPLATE_DEFINITIONS.map(
      (definition): TemplateDefinition =>
        definition.id === 'printable'
          ? { ...definition, kind: 'generic', label: toOverride('ab') }
          : definition,
    )
    const output = new MemoryOutputSink()
    const inspector = createInspector(
      resolveSettings({ readMode: ReadMode.Binary, columns: 4 }),
      { output, definitions },
    )

    expect(() => inspector.write(bytes('abcdef'), true)).toThrow(SegmentSplitError)
    expect(output.text).toBe('')
  })

  it('drops offsets and the final row without offsets', () => {
    const { output } = inspectBinary(bytes('abcdef'), { columns: 4, noOffsets: true })
    expect(stripStyles(output.text)).toBe(' 61 62 63 64  abcd\n 65 66        ef\n')
  })

  it('gives every byte one character', () => {
    const { output } = inspectBinary(bytes('\u0001\u001b[2JÃ©\n'), {
      columns: 8,
      noOffsets: true,
    })
    expect(stripStyles(output.text)).toBe(' 01 1b 5b 32  4a c3 a9 0a  ⱯϽ[2J▯▯↵\n')
  })

  it('decodes UTF-8 on request', () => {
    const { output } = inspectBinary(bytes('Ã©'), { columns: 4, noOffsets: true, decode: true })
    expect(stripStyles(output.text)).toBe(' c3 a9        _é\n')
  })

  it('derives the row width from the terminal width', () => {
    const { output } = inspectBinary(new Uint8Array(20).fill(0x41), { terminalWidth: 80 })
    const group = ' 41 41 41 41'

    expect(stripStyles(output.text).split('\n')).toEqual([
      `    0x00│${[group, group, group, group].join(' ')} │${'A'.repeat(16)}`,
      `    0x10│${group}${' '.repeat(39)} │AAAA`,
      '    0x14│',
      '',
    ])
  })

  it('emits exactly the input length across random chunkings', () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ maxLength: 120 }),
        fc.integer({ min: 1, max: 9 }),
        (input, chunkSize) => {
          const output = new MemoryOutputSink()
          const inspector = createInspector(
            resolveSettings({ readMode: ReadMode.Binary, columns: 8 }),
            { output },
          )
          for (let start = 0; start < input.length; start += chunkSize) {
            inspector.write(input.subarray(start, start + chunkSize))
          }
          inspector.write(new Uint8Array(0), true)
          expect(inspector.offset).toBe(input.length)
        },
      ),
      { numRuns: 200 },
    )
  })
})

import { CharClass, DisplayMode, ReadMode } from '@bytesight/core'
import { describe, expect, it } from 'vitest'
import { ArgumentError, parseArgs } from './args'

describe('parseArgs', () => {
  it('defaults to inspecting stdin', () => {
    expect(parseArgs([])).toEqual({
      command: 'inspect',
      file: undefined,
      settings: { displayModes: {} },
    })
  })

  it('reads binary mode options and the input file', () => {
    const options = parseArgs(['-b', '-w', '8', '--decode', 'dump.bin'])
    expect(options.file).toBe('dump.bin')
    expect(options.settings).toEqual({
      readMode: ReadMode.Binary,
      columns: 8,
      decode: true,
      displayModes: {},
    })
  })

  it('expands bundled short flags', () => {
    expect(parseArgs(['-USp']).settings.displayModes).toEqual({
      [CharClass.Printable]: DisplayMode.Focused,
      [CharClass.Utf8]: DisplayMode.Ignored,
      [CharClass.Whitespace]: DisplayMode.Ignored,
    })
  })

  it('counts repeated debug flags', () => {
    expect(parseArgs(['-dd']).settings.debug).toBe(2)
    expect(parseArgs(['-d', '--debug', '-d']).settings.debug).toBe(3)
  })

  it('accepts values after = and inside short bundles', () => {
    const { settings } = parseArgs(['--max-bytes=10', '-L5', '-m', '0'])
    expect(settings.maxBytes).toBe(10)
    expect(settings.maxLines).toBe(5)
    expect(settings.markerDetails).toBe(0)
  })

  it('selects commands', () => {
    expect(parseArgs(['-l']).command).toBe('legend')
    expect(parseArgs(['--version']).command).toBe('version')
    expect(parseArgs(['-h']).command).toBe('help')
  })

  it('treats - as stdin and -- as the end of options', () => {
    expect(parseArgs(['-']).file).toBe('-')
    expect(parseArgs(['--', '-odd']).file).toBe('-odd')
  })

  it.each([
    [['--bogus'], 'Unrecognized option: --bogus'],
    [['-q'], 'Unrecognized option: -q'],
    [['-w'], 'Option -w requires a value'],
    [['--columns', 'x'], 'Option --columns expects a non-negative integer, got "x"'],
    [['-m3'], '--marker must be 0, 1 or 2, got 3'],
    [['--text=1'], 'Option --text does not take a value'],
    [['-t', '-b'], '--text and --binary cannot be combined'],
    [['-s', '-S'], 'Category "space" cannot be both focused and ignored'],
    [['--decimal-offsets', '--no-offsets'], '--decimal-offsets and --no-offsets cannot be combined'],
    [['a', 'b'], 'Unexpected argument "b": only one input file is accepted'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(ArgumentError)
    expect(() => parseArgs(argv)).toThrow(message)
  })
})

import {
  BytesightError,
  CharClass,
  DisplayMode,
  type Mutable,
  ReadMode,
  type SettingsOverrides,
} from '@bytesight/core'

export type CliCommand = 'inspect' | 'legend' | 'version' | 'help'

export interface CliOptions {
  readonly command: CliCommand
  /** Input path; `undefined` and `-` read stdin. */
  readonly file: string | undefined
  readonly settings: SettingsOverrides
}

export class ArgumentError extends BytesightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ArgumentError'
  }
}

interface Draft {
  command: CliCommand
  file: string | undefined
  readModes: Set<ReadMode>
  focused: Set<CharClass>
  ignored: Set<CharClass>
  settings: Mutable<Omit<SettingsOverrides, 'displayModes' | 'readMode'>>
}

interface FlagOption {
  readonly kind: 'flag'
  readonly short?: string | undefined
  readonly long: string
  apply(draft: Draft): void
}

interface ValueOption {
  readonly kind: 'value'
  readonly short?: string | undefined
  readonly long: string
  apply(draft: Draft, value: number): void
}

type OptionSpec = FlagOption | ValueOption

const flag = (
  short: string | undefined,
  long: string,
  apply: (draft: Draft) => void,
): FlagOption => ({ kind: 'flag', short, long, apply })

const value = (
  short: string | undefined,
  long: string,
  apply: (draft: Draft, value: number) => void,
): ValueOption => ({ kind: 'value', short, long, apply })

// Short letter and long name of each category's focus / ignore switch.
const CATEGORY_SWITCHES: ReadonlyArray<readonly [string, string, CharClass]> = [
  ['s', 'space', CharClass.Whitespace],
  ['c', 'control', CharClass.Control],
  ['p', 'printable', CharClass.Printable],
  ['e', 'esc', CharClass.Escape],
  ['u', 'utf8', CharClass.Utf8],
  ['i', 'binary', CharClass.Binary],
]

export const OPTIONS: ReadonlyArray<OptionSpec> = [
  flag('t', 'text', (draft) => draft.readModes.add(ReadMode.Text)),
  flag('b', 'binary', (draft) => draft.readModes.add(ReadMode.Binary)),
  flag('l', 'legend', (draft) => {
    draft.command = 'legend'
  }),
  flag('v', 'version', (draft) => {
    draft.command = 'version'
  }),
  flag('h', 'help', (draft) => {
    draft.command = 'help'
  }),
  ...CATEGORY_SWITCHES.flatMap(([letter, name, charClass]) => [
    flag(letter, `focus-${name}`, (draft) => draft.focused.add(charClass)),
    flag(letter.toUpperCase(), `ignore-${name}`, (draft) => draft.ignored.add(charClass)),
  ]),
  value('L', 'max-lines', (draft, lines) => {
    draft.settings.maxLines = lines
  }),
  value('B', 'max-bytes', (draft, bytes) => {
    draft.settings.maxBytes = bytes
  }),
  value('f', 'buffer', (draft, size) => {
    draft.settings.chunkSize = size
  }),
  flag('d', 'debug', (draft) => {
    draft.settings.debug = (draft.settings.debug ?? 0) + 1
  }),
  flag(undefined, 'no-color-markers', (draft) => {
    draft.settings.noColorMarkers = true
  }),
  value('m', 'marker', (draft, level) => {
    if (level > 2) {
      throw new ArgumentError(`--marker must be 0, 1 or 2, got ${level}`)
    }
    draft.settings.markerDetails = level
  }),
  flag(undefined, 'no-separators', (draft) => {
    draft.settings.noSeparators = true
  }),
  flag(undefined, 'no-line-numbers', (draft) => {
    draft.settings.noLineNumbers = true
  }),
  value('w', 'columns', (draft, columns) => {
    draft.settings.columns = columns
  }),
  flag('D', 'decode', (draft) => {
    draft.settings.decode = true
  }),
  flag(undefined, 'decimal-offsets', (draft) => {
    draft.settings.decimalOffsets = true
  }),
  flag(undefined, 'no-offsets', (draft) => {
    draft.settings.noOffsets = true
  }),
]

const byShort = new Map<string, OptionSpec>()
const byLong = new Map<string, OptionSpec>()
for (const option of OPTIONS) {
  byLong.set(option.long, option)
  if (option.short !== undefined) {
    byShort.set(option.short, option)
  }
}

const parseCount = (name: string, raw: string | undefined): number => {
  if (raw === undefined || raw === '') {
    throw new ArgumentError(`Option ${name} requires a value`)
  }
  if (!/^\d+$/.test(raw)) {
    throw new ArgumentError(`Option ${name} expects a non-negative integer, got "${raw}"`)
  }
  return Number.parseInt(raw, 10)
}

const finish = (draft: Draft): CliOptions => {
  if (draft.readModes.size > 1) {
    throw new ArgumentError('--text and --binary cannot be combined')
  }
  if (draft.settings.decimalOffsets && draft.settings.noOffsets) {
    throw new ArgumentError('--decimal-offsets and --no-offsets cannot be combined')
  }

  const displayModes: Partial<Record<CharClass, DisplayMode>> = {}
  for (const charClass of draft.focused) {
    if (draft.ignored.has(charClass)) {
      throw new ArgumentError(`Category "${charClass}" cannot be both focused and ignored`)
    }
    displayModes[charClass] = DisplayMode.Focused
  }
  for (const charClass of draft.ignored) {
    displayModes[charClass] = DisplayMode.Ignored
  }

  const [readMode] = draft.readModes
  return {
    command: draft.command,
    file: draft.file,
    settings: {
      ...draft.settings,
      displayModes,
      ...(readMode === undefined ? {} : { readMode }),
    },
  }
}

/**
 * Parses command line arguments (without the node and script entries).
 * Short flags can be bundled (`-USP`); values follow as the next argument,
 * after `=` for long options, or as the rest of a short bundle (`-m2`).
 */
export const parseArgs = (argv: ReadonlyArray<string>): CliOptions => {
  const draft: Draft = {
    command: 'inspect',
    file: undefined,
    readModes: new Set(),
    focused: new Set(),
    ignored: new Set(),
    settings: {},
  }

  const setFile = (path: string) => {
    if (draft.file !== undefined) {
      throw new ArgumentError(`Unexpected argument "${path}": only one input file is accepted`)
    }
    draft.file = path
  }

  let index = 0
  const next = (): string | undefined => {
    index += 1
    return argv[index]
  }

  for (; index < argv.length; index += 1) {
    const arg = argv[index]
    if (arg === undefined) break

    if (arg === '--') {
      for (const rest of argv.slice(index + 1)) setFile(rest)
      break
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=')
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq)
      const option = byLong.get(name)
      if (!option) {
        throw new ArgumentError(`Unrecognized option: --${name}`)
      }
      if (option.kind === 'flag') {
        if (eq !== -1) {
          throw new ArgumentError(`Option --${name} does not take a value`)
        }
        option.apply(draft)
      } else {
        option.apply(draft, parseCount(`--${name}`, eq === -1 ? next() : arg.slice(eq + 1)))
      }
      continue
    }

    if (arg.startsWith('-') && arg !== '-') {
      const letters = arg.slice(1)
      for (let position = 0; position < letters.length; position += 1) {
        const letter = letters.charAt(position)
        const option = byShort.get(letter)
        if (!option) {
          throw new ArgumentError(`Unrecognized option: -${letter}`)
        }
        if (option.kind === 'flag') {
          option.apply(draft)
          continue
        }
        const rest = letters.slice(position + 1)
        option.apply(draft, parseCount(`-${letter}`, rest === '' ? next() : rest))
        break
      }
      continue
    }

    setFile(arg)
  }

  return finish(draft)
}

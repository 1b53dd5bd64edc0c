// Shared enums and configuration shapes for the inspection pipeline.

/**
 * Byte categories. Every byte value belongs to exactly one category once the
 * parser has grouped it into a run.
 */
export enum CharClass {
  Control = 'control',
  Escape = 'esc',
  Whitespace = 'space',
  Utf8 = 'utf8',
  Binary = 'binary',
  Printable = 'printable',
}

export enum DisplayMode {
  Default = 'default',
  Focused = 'focused',
  Ignored = 'ignored',
}

export enum ReadMode {
  Text = 'text',
  Binary = 'binary',
}

/**
 * Annotation level for control characters and escape sequences.
 * `BinaryStrict` is forced in binary read mode, where every processed
 * character must line up with exactly one raw byte.
 */
export enum MarkerDetails {
  None = 0,
  Brief = 1,
  Full = 2,
  BinaryStrict = 3,
}

/**
 * Keys accepted by a partial override table. Display and read mode values
 * never collide, so both axes share one key space.
 */
export type ModeKey = DisplayMode | ReadMode

export type TemplateId =
  | 'control'
  | 'control-null'
  | 'control-backspace'
  | 'control-escape'
  | 'control-delete'
  | 'whitespace-tab'
  | 'whitespace-newline'
  | 'whitespace-vtab'
  | 'whitespace-formfeed'
  | 'whitespace-cr'
  | 'whitespace-space'
  | 'escape-sgr-reset'
  | 'escape-sgr'
  | 'escape-csi'
  | 'escape-nf'
  | 'escape-fp'
  | 'escape-fe'
  | 'escape-fs'
  | 'utf8'
  | 'binary'
  | 'printable'

export type Mutable<T> = { -readonly [K in keyof T]: T[K] }

export interface Settings {
  readonly readMode: ReadMode
  readonly displayModes: Readonly<Record<CharClass, DisplayMode>>
  /** 0 is none, 1 is brief, 2 is full. Ignored in binary read mode. */
  readonly markerDetails: number
  /** Decode valid UTF-8 sequences in binary mode as well. */
  readonly decode: boolean
  /** Binary row width in bytes; `undefined` derives it from `terminalWidth`. */
  readonly columns: number | undefined
  readonly decimalOffsets: boolean
  readonly noOffsets: boolean
  readonly noLineNumbers: boolean
  readonly noSeparators: boolean
  readonly noColorMarkers: boolean
  readonly maxBytes: number | undefined
  readonly maxLines: number | undefined
  /** Read chunk size; `undefined` picks a default based on `debug`. */
  readonly chunkSize: number | undefined
  /** Debug trace verbosity, 0 to 4. */
  readonly debug: number
  readonly terminalWidth: number
}

export type SettingsOverrides = Partial<
  Omit<Settings, 'displayModes'> & {
    readonly displayModes: Partial<Record<CharClass, DisplayMode>>
  }
>

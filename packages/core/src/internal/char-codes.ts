const range = (start: number, end: number): number[] =>
  Array.from({ length: end - start + 1 }, (_value, index) => start + index)

export const ASCII_CODES = {
  NUL: 0x00,
  BACKSPACE: 0x08,
  TAB: 0x09,
  LINE_FEED: 0x0a,
  VERTICAL_TAB: 0x0b,
  FORM_FEED: 0x0c,
  CARRIAGE_RETURN: 0x0d,
  ESCAPE: 0x1b,
  SPACE: 0x20,
  LEFT_BRACKET: 0x5b,
  LOWERCASE_M: 0x6d,
  DELETE: 0x7f,
} as const

export const CHARCODE_CLASSES = {
  control: new Set([...range(0x00, 0x08), ...range(0x0e, 0x1f), ...range(0x7f, 0xff)]),
  whitespace: new Set([...range(0x09, 0x0d), ASCII_CODES.SPACE]),
  printable: new Set(range(0x21, 0x7e)),
  binary: new Set(range(0x80, 0xff)),
} as const

// SGR (Select Graphic Rendition) parameter codes, ECMA-48 §8.3.117.

export const SGR = {
  RESET: 0,
  BOLD: 1,
  DIM: 2,
  ITALIC: 3,
  UNDERLINED: 4,
  BLINK_SLOW: 5,
  BLINK_FAST: 6,
  INVERSED: 7,
  HIDDEN: 8,
  CROSSLINED: 9,
  DOUBLE_UNDERLINED: 21,
  BOLD_DIM_OFF: 22,
  ITALIC_OFF: 23,
  UNDERLINED_OFF: 24,
  BLINK_OFF: 25,
  INVERSED_OFF: 27,
  HIDDEN_OFF: 28,
  CROSSLINED_OFF: 29,
  COLOR_EXTENDED: 38,
  COLOR_OFF: 39,
  BG_COLOR_EXTENDED: 48,
  BG_COLOR_OFF: 49,
  OVERLINED: 53,
  OVERLINED_OFF: 55,
  EXTENDED_MODE_256: 5,
  EXTENDED_MODE_RGB: 2,
} as const

export const COLOR_NAMES = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
] as const

export type ColorName = (typeof COLOR_NAMES)[number]

export const FG_RANGE = { START: 30, END: 37 } as const
export const BG_RANGE = { START: 40, END: 47 } as const
export const HI_FG_RANGE = { START: 90, END: 97 } as const
export const HI_BG_RANGE = { START: 100, END: 107 } as const

const inRange = (code: number, range: { START: number; END: number }) =>
  code >= range.START && code <= range.END

export const isForegroundColor = (code: number): boolean =>
  inRange(code, FG_RANGE) ||
  inRange(code, HI_FG_RANGE) ||
  code === SGR.COLOR_EXTENDED ||
  code === SGR.COLOR_OFF

export const isBackgroundColor = (code: number): boolean =>
  inRange(code, BG_RANGE) ||
  inRange(code, HI_BG_RANGE) ||
  code === SGR.BG_COLOR_EXTENDED ||
  code === SGR.BG_COLOR_OFF

/**
 * Number of sub-parameters following an extended color introducer (38 or 48)
 * at `index`, or 0 when the form is incomplete.
 */
export const extendedColorArity = (
  params: ReadonlyArray<number>,
  index: number,
): number => {
  const mode = params[index + 1]
  if (mode === SGR.EXTENDED_MODE_256 && params.length - index - 1 >= 2) {
    return 2
  }
  if (mode === SGR.EXTENDED_MODE_RGB && params.length - index - 1 >= 4) {
    return 4
  }
  return 0
}

const CLOSING_CODES: ReadonlyMap<number, number> = new Map([
  [SGR.BOLD, SGR.BOLD_DIM_OFF],
  [SGR.DIM, SGR.BOLD_DIM_OFF],
  [SGR.ITALIC, SGR.ITALIC_OFF],
  [SGR.UNDERLINED, SGR.UNDERLINED_OFF],
  [SGR.DOUBLE_UNDERLINED, SGR.UNDERLINED_OFF],
  [SGR.BLINK_SLOW, SGR.BLINK_OFF],
  [SGR.BLINK_FAST, SGR.BLINK_OFF],
  [SGR.INVERSED, SGR.INVERSED_OFF],
  [SGR.HIDDEN, SGR.HIDDEN_OFF],
  [SGR.CROSSLINED, SGR.CROSSLINED_OFF],
  [SGR.OVERLINED, SGR.OVERLINED_OFF],
])

export const closingCodeFor = (code: number): number | null => {
  if (isForegroundColor(code)) return SGR.COLOR_OFF
  if (isBackgroundColor(code)) return SGR.BG_COLOR_OFF
  return CLOSING_CODES.get(code) ?? null
}

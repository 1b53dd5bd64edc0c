import {
  closingCodeFor,
  extendedColorArity,
  SGR,
} from './sgr-codes'

const CSI = '\u001b['
const SGR_FINAL = 'm'

/**
 * Immutable SGR style: an ordered list of parameter codes that assembles
 * into one `ESC [ ... m` sequence.
 */
export class Style {
  static readonly NOOP = new Style([])

  readonly params: ReadonlyArray<number>

  constructor(params: ReadonlyArray<number>) {
    this.params = Object.freeze([...params])
  }

  static of(...params: number[]): Style {
    return new Style(params)
  }

  /** Hash used for active-style bookkeeping. */
  get key(): string {
    return this.params.join(';')
  }

  /** Empty styles and plain resets never need bracketing. */
  get isNoop(): boolean {
    return this.params.every((code) => code === SGR.RESET)
  }

  assemble(): string {
    if (this.params.length === 0) {
      return ''
    }
    return `${CSI}${this.key}${SGR_FINAL}`
  }

  /**
   * Style that cancels every attribute this one turns on, leaving whatever
   * was set before it untouched where SGR allows that.
   */
  closer(): Style {
    const closing: number[] = []
    const push = (code: number | null) => {
      if (code !== null && !closing.includes(code)) {
        closing.push(code)
      }
    }

    for (let index = 0; index < this.params.length; index += 1) {
      const code = this.params[index]
      if (code === undefined) break
      if (code === SGR.COLOR_EXTENDED || code === SGR.BG_COLOR_EXTENDED) {
        index += extendedColorArity(this.params, index)
      }
      push(closingCodeFor(code))
    }

    return closing.length === 0 ? Style.NOOP : new Style(closing)
  }

  merge(other: Style): Style {
    if (other.params.length === 0) return this
    if (this.params.length === 0) return other
    return new Style([...this.params, ...other.params])
  }

  equals(other: Style): boolean {
    return this.key === other.key
  }

  toString(): string {
    return `Style[${this.key}]`
  }
}

export const indexed = (code: number): Style =>
  Style.of(SGR.COLOR_EXTENDED, SGR.EXTENDED_MODE_256, code)

export const bgIndexed = (code: number): Style =>
  Style.of(SGR.BG_COLOR_EXTENDED, SGR.EXTENDED_MODE_256, code)

export const STYLES = {
  RESET: Style.of(SGR.RESET),
  BOLD: Style.of(SGR.BOLD),
  DIM: Style.of(SGR.DIM),
  UNDERLINED: Style.of(SGR.UNDERLINED),
  BLINK: Style.of(SGR.BLINK_SLOW),
  INVERSED: Style.of(SGR.INVERSED),

  BLACK: Style.of(30),
  RED: Style.of(31),
  GREEN: Style.of(32),
  YELLOW: Style.of(33),
  BLUE: Style.of(34),
  MAGENTA: Style.of(35),
  CYAN: Style.of(36),
  WHITE: Style.of(37),
  GRAY: Style.of(90),
  HI_RED: Style.of(91),
  HI_GREEN: Style.of(92),
  HI_YELLOW: Style.of(93),
  HI_BLUE: Style.of(94),
  HI_MAGENTA: Style.of(95),
  HI_CYAN: Style.of(96),
  HI_WHITE: Style.of(97),

  BG_BLACK: Style.of(40),
  BG_RED: Style.of(41),
  BG_CYAN: Style.of(46),
  BG_WHITE: Style.of(47),
} as const

const SGR_PATTERN = /\u001b\[([0-9;:]*)m/g

/** Removes every SGR sequence from `text`. */
export const stripStyles = (text: string): string =>
  text.replace(SGR_PATTERN, '')

/**
 * Diagnostic rendering of SGR sequences: `ESC[31m` becomes `[ǝ31]`, so the
 * style stream can be inspected without applying it.
 */
export const escapeStyles = (text: string): string =>
  text.replace(SGR_PATTERN, (_match, params: string) => `[ǝ${params}]`)

/** Wraps `text` in `style` and its closer. */
export const paint = (style: Style, text: string): string =>
  `${style.assemble()}${text}${style.closer().assemble()}`

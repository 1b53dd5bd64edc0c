import { hexByte, toBinaryString } from '../internal/bytes'
import {
  COLOR_NAMES,
  extendedColorArity,
  isBackgroundColor,
  isForegroundColor,
  SGR,
} from '../style/sgr-codes'
import { Style } from '../style/style'
import { type EscapeDetails, substituteEscape } from './escape'
import { DETAILS_STYLE, type ResolvedTemplate, type Substitute } from './template'

const ATTRIBUTE_NAMES: ReadonlyMap<number, string> = new Map([
  [SGR.BOLD, 'B'],
  [SGR.DIM, 'D'],
  [SGR.ITALIC, 'I'],
  [SGR.UNDERLINED, 'U'],
  [SGR.BLINK_SLOW, 'K'],
  [SGR.INVERSED, 'R'],
  [SGR.HIDDEN, 'H'],
  [SGR.CROSSLINED, 'X'],
  [SGR.OVERLINED, 'O'],
  [SGR.BOLD_DIM_OFF, '-BD'],
  [SGR.ITALIC_OFF, '-I'],
  [SGR.UNDERLINED_OFF, '-U'],
  [SGR.BLINK_OFF, '-K'],
  [SGR.INVERSED_OFF, '-R'],
  [SGR.HIDDEN_OFF, '-H'],
  [SGR.CROSSLINED_OFF, '-X'],
  [SGR.COLOR_OFF, '-fg'],
  [SGR.BG_COLOR_OFF, '-bg'],
  [SGR.OVERLINED_OFF, '-O'],
])

const COLOR_PREFIXES: ReadonlyArray<readonly [number, string]> = [
  [30, ''],
  [40, 'bg-'],
  [90, 'hi-'],
  [100, 'bg-hi-'],
]

/** Reserved for the markers themselves: bold, inverse and overline. */
const MARKER_FORMAT_ATTRIBUTES: ReadonlySet<number> = new Set([
  SGR.DIM,
  SGR.ITALIC,
  SGR.UNDERLINED,
  SGR.CROSSLINED,
])

/** One `;`-separated parameter: its code and any `:`-joined sub-parameters. */
export interface SgrParam {
  readonly code: number
  readonly subParams: ReadonlyArray<number>
}

const toCodes = (parts: ReadonlyArray<string>): number[] =>
  parts
    .filter((part) => part !== '')
    .map((part) => Number.parseInt(part, 10))
    .filter((code) => !Number.isNaN(code))

/** SGR parameters of a parameter string; empty and malformed ones drop out. */
export const parseSgrParams = (params: string): SgrParam[] =>
  params.split(';').flatMap((group) => {
    const [head = '', ...rest] = group.split(':')
    const code = Number.parseInt(head, 10)
    return Number.isNaN(code) ? [] : [{ code, subParams: toCodes(rest) }]
  })

/** `38`/`48` followed by its mode and color arguments, in `;` form. */
interface ExtendedColor {
  readonly codes: ReadonlyArray<number>
  /** Parameters consumed after the introducer. */
  readonly span: number
}

const isExtendedColor = (code: number): boolean =>
  code === SGR.COLOR_EXTENDED || code === SGR.BG_COLOR_EXTENDED

/**
 * Reads a complete extended color at `index`, written either as `38;5;n`
 * across parameters or as `38:5:n` within one. The colon form may carry a
 * color space id before the RGB triple (`38:2::r:g:b`).
 */
const extendedColorAt = (
  params: ReadonlyArray<SgrParam>,
  index: number,
): ExtendedColor | null => {
  const param = params[index]
  if (param === undefined || !isExtendedColor(param.code)) return null

  if (param.subParams.length > 0) {
    const [mode, ...args] = param.subParams
    if (mode === SGR.EXTENDED_MODE_256 && args.length >= 1) {
      return { codes: [param.code, mode, ...args.slice(0, 1)], span: 0 }
    }
    if (mode === SGR.EXTENDED_MODE_RGB && args.length >= 3) {
      return { codes: [param.code, mode, ...args.slice(-3)], span: 0 }
    }
    return null
  }

  const codes = params.map((entry) => entry.code)
  const arity = extendedColorArity(codes, index)
  return arity === 0 ? null : { codes: codes.slice(index, index + 1 + arity), span: arity }
}

const nameOf = (code: number): string => {
  const attribute = ATTRIBUTE_NAMES.get(code)
  if (attribute !== undefined) return attribute
  for (const [base, prefix] of COLOR_PREFIXES) {
    const name = COLOR_NAMES[code - base]
    if (name !== undefined) return `${prefix}${name}`
  }
  return String(code)
}

const briefColor = ([code, mode, ...args]: ReadonlyArray<number>): string => {
  const prefix = code === SGR.COLOR_EXTENDED ? 'f' : 'b'
  return mode === SGR.EXTENDED_MODE_256
    ? `${prefix}5:${args.join('')}`
    : `${prefix}2:#${args.map(hexByte).join('')}`
}

/**
 * Condensed rendering: `1;31;48;5;16` becomes `B,red,b5:16`. Sub-parameters
 * stay attached to their code, so `4:3` reads `U:3`.
 */
export const formatSgrBrief = (params: string): string => {
  const parsed = parseSgrParams(params)
  const names: string[] = []
  for (let index = 0; index < parsed.length; index += 1) {
    const param = parsed[index]
    if (param === undefined) break
    const color = extendedColorAt(parsed, index)
    if (color) {
      names.push(briefColor(color.codes))
      index += color.span
      continue
    }
    names.push([nameOf(param.code), ...param.subParams].join(':'))
  }
  return names.join(',')
}

/**
 * The codes of `params` that can color an annotation: every color (extended
 * forms only when complete) plus dim, italic, underline and crossed.
 * Sub-parameters other than extended colors are dropped.
 */
export const markerFormatCodes = (params: string): number[] => {
  const parsed = parseSgrParams(params)
  const allowed: number[] = []
  for (let index = 0; index < parsed.length; index += 1) {
    const param = parsed[index]
    if (param === undefined) break
    const { code } = param
    if (isExtendedColor(code)) {
      const color = extendedColorAt(parsed, index)
      if (color) {
        allowed.push(...color.codes)
        index += color.span
      }
      continue
    }
    if (
      MARKER_FORMAT_ATTRIBUTES.has(code) ||
      isForegroundColor(code) ||
      isBackgroundColor(code)
    ) {
      allowed.push(code)
    }
  }
  return allowed
}

export const BRIEF_CACHE_LIMIT = 4096

export interface BriefCache {
  readonly size: number
  brief(params: string): string
}

/** Memoized `formatSgrBrief`, emptied whenever it reaches `limit` entries. */
export const createBriefCache = (limit = BRIEF_CACHE_LIMIT): BriefCache => {
  const entries = new Map<string, string>()
  return {
    get size() {
      return entries.size
    },
    brief(params) {
      let brief = entries.get(params)
      if (brief === undefined) {
        if (entries.size >= limit) {
          entries.clear()
        }
        brief = formatSgrBrief(params)
        entries.set(params, brief)
      }
      return brief
    },
  }
}

/**
 * SGR sequences annotate themselves in the style they set. Brief forms are
 * cached per parameter string, up to `BRIEF_CACHE_LIMIT` at a time.
 */
export const substituteSgr = (template: ResolvedTemplate): Substitute => {
  const { noColorMarkers } = template.context
  const briefCache = createBriefCache()

  const details: EscapeDetails = {
    brief: (params) => briefCache.brief(toBinaryString(params)),
    style(params) {
      if (noColorMarkers) {
        return DETAILS_STYLE
      }
      return DETAILS_STYLE.merge(new Style(markerFormatCodes(toBinaryString(params))))
    },
  }

  return substituteEscape(template, details)
}

import { Segment } from '../segment/segment'
import { indexed, STYLES, type Style } from '../style/style'
import {
  CharClass,
  DisplayMode,
  type MarkerDetails,
  type ReadMode,
  type TemplateId,
} from '../types'
import type { PartialOverride } from './override'

export const TYPE_LABELS: Readonly<Record<CharClass, string>> = {
  [CharClass.Control]: 'C',
  [CharClass.Escape]: 'E',
  [CharClass.Whitespace]: 'S',
  [CharClass.Utf8]: 'U',
  [CharClass.Binary]: 'B',
  [CharClass.Printable]: 'P',
}
export const DETAILS_TYPE_LABEL = '*'
export const SEPARATOR_TYPE_LABEL = '|'

export const IGNORED_LABEL = '×'
export const IGNORED_STYLE: Style = STYLES.GRAY.merge(STYLES.DIM)
export const DETAILS_STYLE: Style = STYLES.BG_BLACK.merge(STYLES.UNDERLINED)
export const ESCAPE_LABEL_STYLE: Style = STYLES.BOLD

export const SEPARATOR_LEFT = '⢸'
export const SEPARATOR_RIGHT = '⡇'
export const SEPARATOR_STYLE: Style = indexed(255)

/**
 * Rendering strategy of a template. Each kind is a small substitution
 * function selected from a lookup table at registry construction.
 */
export type TemplateKind =
  | 'generic'
  | 'control'
  | 'escape'
  | 'sgr'
  | 'utf8'
  | 'newline'
  | 'printable'

/** Static description of one byte category's rendering rule. */
export interface TemplateDefinition {
  readonly id: TemplateId
  readonly charClass: CharClass
  readonly kind: TemplateKind
  readonly style: PartialOverride<Style>
  readonly label: PartialOverride<string>
  readonly description: string
}

/** The settings a template needs, resolved once for its category. */
export interface TemplateContext {
  readonly displayMode: DisplayMode
  readonly readMode: ReadMode
  readonly markerDetails: MarkerDetails
  readonly decode: boolean
  readonly noSeparators: boolean
  readonly noColorMarkers: boolean
}

/** A definition with its style and label resolved against a context. */
export interface ResolvedTemplate {
  readonly definition: TemplateDefinition
  readonly context: TemplateContext
  readonly typeLabel: string
  /** Style for the current display and read mode. */
  readonly style: Style
  /** Category default style, used as the base of detail annotations. */
  readonly baseStyle: Style
  readonly label: string
}

export type Substitute = (raw: Uint8Array, params?: Uint8Array) => Segment[]

export interface Template {
  readonly id: TemplateId
  readonly charClass: CharClass
  readonly typeLabel: string
  readonly style: Style
  readonly label: string
  readonly description: string
  substitute: Substitute
}

export const isIgnored = (template: ResolvedTemplate): boolean =>
  template.context.displayMode === DisplayMode.Ignored

export const createPrimarySegment = (
  template: ResolvedTemplate,
  raw: Uint8Array,
  processed: string,
  style: Style = template.style,
): Segment => new Segment(style, template.typeLabel, raw, processed)

export const createDetailsSegment = (
  style: Style,
  raw: Uint8Array,
  processed: string,
): Segment => new Segment(style, DETAILS_TYPE_LABEL, raw, processed)

/** One label per byte. */
export const processLabels = (template: ResolvedTemplate, raw: Uint8Array): string =>
  template.label.repeat(raw.length)

export const wrapInSeparators = (segments: Segment[]): Segment[] => [
  new Segment(SEPARATOR_STYLE, SEPARATOR_TYPE_LABEL, new Uint8Array(0), SEPARATOR_LEFT),
  ...segments,
  new Segment(SEPARATOR_STYLE, SEPARATOR_TYPE_LABEL, new Uint8Array(0), SEPARATOR_RIGHT),
]

export const substituteGeneric = (template: ResolvedTemplate): Substitute => (raw) => [
  createPrimarySegment(template, raw, processLabels(template, raw)),
]

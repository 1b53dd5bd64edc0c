import { UnknownClassificationError } from '../errors'
import { displayModeFor, effectiveMarkerDetails } from '../settings'
import { bgIndexed, indexed, STYLES, type Style } from '../style/style'
import {
  CharClass,
  DisplayMode,
  ReadMode,
  type Settings,
  type TemplateId,
} from '../types'
import { substituteControl } from './control'
import { substituteEscape } from './escape'
import { PartialOverride, toOverride } from './override'
import { substituteSgr } from './sgr'
import {
  IGNORED_LABEL,
  IGNORED_STYLE,
  type ResolvedTemplate,
  type Substitute,
  substituteGeneric,
  type Template,
  type TemplateContext,
  type TemplateDefinition,
  type TemplateKind,
  TYPE_LABELS,
} from './template'
import { substituteNewline, substitutePrintable, substituteUtf8 } from './text'

const SUBSTITUTES: Readonly<Record<TemplateKind, (template: ResolvedTemplate) => Substitute>> = {
  generic: substituteGeneric,
  control: substituteControl,
  escape: (template) => substituteEscape(template),
  sgr: substituteSgr,
  utf8: substituteUtf8,
  newline: substituteNewline,
  printable: substitutePrintable,
}

const define = (
  id: TemplateId,
  charClass: CharClass,
  kind: TemplateKind,
  style: Style | PartialOverride<Style>,
  label: string | PartialOverride<string>,
  description: string,
): TemplateDefinition => ({
  id,
  charClass,
  kind,
  style: toOverride(style),
  label: toOverride(label),
  description,
})

const WHITESPACE_STYLE = new PartialOverride(STYLES.HI_CYAN, {
  [DisplayMode.Focused]: STYLES.BG_CYAN.merge(STYLES.BLACK),
})

/** Every byte category, in legend order. */
export const TEMPLATE_DEFINITIONS: ReadonlyArray<TemplateDefinition> = [
  define('control', CharClass.Control, 'control', STYLES.RED, 'Ɐ', '01-07, 0e-1a, 1c-1f'),
  define('control-null', CharClass.Control, 'generic', STYLES.HI_RED, 'Ø', '00'),
  define('control-backspace', CharClass.Control, 'generic', STYLES.RED, '←', '08'),
  define('control-escape', CharClass.Control, 'generic', STYLES.HI_YELLOW, '∌', '1b (not a sequence)'),
  define('control-delete', CharClass.Control, 'generic', STYLES.RED, '→', '7f'),

  define(
    'whitespace-tab',
    CharClass.Whitespace,
    'generic',
    WHITESPACE_STYLE,
    new PartialOverride('⇥', { [ReadMode.Text]: '⇥\t' }),
    '09',
  ),
  define('whitespace-newline', CharClass.Whitespace, 'newline', WHITESPACE_STYLE, '↵', '0a'),
  define('whitespace-vtab', CharClass.Whitespace, 'generic', WHITESPACE_STYLE, '⤓', '0b'),
  define('whitespace-formfeed', CharClass.Whitespace, 'generic', WHITESPACE_STYLE, '↡', '0c'),
  define('whitespace-cr', CharClass.Whitespace, 'generic', WHITESPACE_STYLE, '⇤', '0d'),
  define(
    'whitespace-space',
    CharClass.Whitespace,
    'generic',
    WHITESPACE_STYLE,
    new PartialOverride('␣', { [DisplayMode.Focused]: '·' }),
    '20',
  ),

  define(
    'escape-sgr-reset',
    CharClass.Escape,
    'escape',
    indexed(255).merge(bgIndexed(16)),
    'θ',
    'ESC [ m, ESC [ 0 m',
  ),
  define('escape-sgr', CharClass.Escape, 'sgr', indexed(210).merge(bgIndexed(16)), 'ǝ', 'ESC [ ... m'),
  define('escape-csi', CharClass.Escape, 'escape', STYLES.HI_GREEN, 'Ͻ', 'ESC [ ... 40-7e'),
  define('escape-nf', CharClass.Escape, 'escape', STYLES.GREEN, 'ꟻ', 'ESC 20-2f ... 30-7e'),
  define('escape-fp', CharClass.Escape, 'escape', STYLES.YELLOW, 'ꟼ', 'ESC 30-3f'),
  define('escape-fe', CharClass.Escape, 'escape', STYLES.YELLOW, 'Ǝ', 'ESC 40-5f'),
  define('escape-fs', CharClass.Escape, 'escape', STYLES.YELLOW, 'Ꙅ', 'ESC 60-7e'),

  define(
    'utf8',
    CharClass.Utf8,
    'utf8',
    STYLES.HI_BLUE,
    new PartialOverride('', { [ReadMode.Binary]: '▯' }),
    'valid multibyte UTF-8',
  ),
  define(
    'binary',
    CharClass.Binary,
    'generic',
    STYLES.MAGENTA,
    new PartialOverride('Ḇ', { [ReadMode.Binary]: '▯' }),
    '80-ff',
  ),
  define(
    'printable',
    CharClass.Printable,
    'printable',
    new PartialOverride(indexed(102), {
      [DisplayMode.Focused]: STYLES.BG_WHITE.merge(STYLES.BLACK),
    }),
    '',
    '21-7e',
  ),
]

const createContext = (settings: Settings, charClass: CharClass): TemplateContext => ({
  displayMode: displayModeFor(settings, charClass),
  readMode: settings.readMode,
  markerDetails: effectiveMarkerDetails(settings),
  decode: settings.decode,
  noSeparators: settings.noSeparators,
  noColorMarkers: settings.noColorMarkers,
})

/**
 * Resolves a definition against `settings`: focused styles default to the
 * inverse of the category style, ignored categories render dimmed `×`.
 */
export const buildTemplate = (
  definition: TemplateDefinition,
  settings: Settings,
): Template => {
  const context = createContext(settings, definition.charClass)
  const styles = definition.style
    .withDefault(DisplayMode.Focused, definition.style.fallback.merge(STYLES.INVERSED))
    .withDefault(DisplayMode.Ignored, IGNORED_STYLE)
  const labels = definition.label.withDefault(DisplayMode.Ignored, IGNORED_LABEL)

  const resolved: ResolvedTemplate = {
    definition,
    context,
    typeLabel: TYPE_LABELS[definition.charClass],
    style: styles.get(context.displayMode, context.readMode),
    baseStyle: styles.fallback,
    label: labels.get(context.displayMode, context.readMode),
  }

  return {
    id: definition.id,
    charClass: definition.charClass,
    typeLabel: resolved.typeLabel,
    style: resolved.style,
    label: resolved.label,
    description: definition.description,
    substitute: SUBSTITUTES[definition.kind](resolved),
  }
}

export interface TemplateRegistry {
  has(id: TemplateId): boolean
  /** @throws UnknownClassificationError when `id` has no template. */
  get(id: TemplateId): Template
  templates(): Template[]
}

export const createTemplateRegistry = (
  settings: Settings,
  definitions: ReadonlyArray<TemplateDefinition> = TEMPLATE_DEFINITIONS,
): TemplateRegistry => {
  const templates = new Map<TemplateId, Template>()
  for (const definition of definitions) {
    templates.set(definition.id, buildTemplate(definition, settings))
  }

  return {
    has: (id) => templates.has(id),
    get(id) {
      const template = templates.get(id)
      if (!template) {
        throw new UnknownClassificationError(`No template registered for "${id}"`)
      }
      return template
    },
    templates: () => [...templates.values()],
  }
}

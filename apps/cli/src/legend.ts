import {
  CharClass,
  createTemplateRegistry,
  paint,
  type Settings,
  STYLES,
  type Template,
} from '@bytesight/core'

const SECTION_TITLES: ReadonlyArray<readonly [CharClass, string]> = [
  [CharClass.Control, 'Control characters'],
  [CharClass.Whitespace, 'Whitespace'],
  [CharClass.Escape, 'Escape sequences'],
  [CharClass.Utf8, 'UTF-8'],
  [CharClass.Binary, 'Binary'],
  [CharClass.Printable, 'Printable'],
]

const SAMPLES: Readonly<Record<CharClass, string>> = {
  [CharClass.Control]: '?',
  [CharClass.Whitespace]: '?',
  [CharClass.Escape]: '?',
  [CharClass.Utf8]: 'ä',
  [CharClass.Binary]: '?',
  [CharClass.Printable]: 'a',
}

const ID_WIDTH = 20

/** The visible marker of `template`: its first label character, or a sample. */
export const markerOf = (template: Template): string => {
  const [first] = Array.from(template.label)
  return first ?? SAMPLES[template.charClass]
}

export const formatLegendEntry = (template: Template): string =>
  `  ${paint(template.style, markerOf(template))}  ${template.typeLabel}  ` +
  `${template.id.padEnd(ID_WIDTH)}${template.description}`

/** One section per category, one line per template, in registry order. */
export const renderLegend = (settings: Settings): string => {
  const templates = createTemplateRegistry(settings).templates()
  const sections = SECTION_TITLES.map(([charClass, title]) => {
    const entries = templates
      .filter((template) => template.charClass === charClass)
      .map(formatLegendEntry)
    return [paint(STYLES.BOLD, title), ...entries].join('\n')
  })
  return `${sections.join('\n\n')}\n`
}

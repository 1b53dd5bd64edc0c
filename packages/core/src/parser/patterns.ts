import type { TemplateId } from '../types'

// Byte-run alternatives, in matching order. Sources are written against
// binary strings (one UTF-16 unit per byte), so no `u` flag.

const SGR_FINAL = 'm'
const SGR_RESET_PARAMS: ReadonlySet<string> = new Set(['', '0'])

export interface CsiParts {
  readonly params: string
  readonly intermediates: string
  readonly final: string
}

type Resolution = TemplateId | ((match: string) => TemplateId)

interface Alternative {
  readonly group: string
  readonly source: string
  readonly resolve: Resolution
}

const CSI_PARTS = /^\x1b\[([\x30-\x3f]*)([\x20-\x2f]*)([\x40-\x7e])$/

export const splitCsi = (match: string): CsiParts | null => {
  const parts = CSI_PARTS.exec(match)
  if (!parts) return null
  return {
    params: parts[1] ?? '',
    intermediates: parts[2] ?? '',
    final: parts[3] ?? '',
  }
}

/** CSI sequences ending in `m` set graphics and get their own templates. */
export const resolveCsi = (match: string): TemplateId => {
  const parts = splitCsi(match)
  if (!parts || parts.final !== SGR_FINAL) {
    return 'escape-csi'
  }
  return SGR_RESET_PARAMS.has(parts.params) ? 'escape-sgr-reset' : 'escape-sgr'
}

export const ALTERNATIVES: ReadonlyArray<Alternative> = [
  {
    group: 'utf8',
    source:
      '[\\xc2-\\xdf][\\x80-\\xbf]' +
      '|\\xe0[\\xa0-\\xbf][\\x80-\\xbf]' +
      '|[\\xe1-\\xec\\xee\\xef][\\x80-\\xbf]{2}' +
      '|\\xed[\\x80-\\x9f][\\x80-\\xbf]' +
      '|\\xf0[\\x90-\\xbf][\\x80-\\xbf]{2}' +
      '|[\\xf1-\\xf3][\\x80-\\xbf]{3}' +
      '|\\xf4[\\x80-\\x8f][\\x80-\\xbf]{2}',
    resolve: 'utf8',
  },
  { group: 'binary', source: '[\\x80-\\xff]+', resolve: 'binary' },
  {
    group: 'csi',
    source: '\\x1b\\x5b[\\x30-\\x3f]*[\\x20-\\x2f]*[\\x40-\\x7e]',
    resolve: resolveCsi,
  },
  { group: 'nf', source: '\\x1b[\\x20-\\x2f]+[\\x30-\\x7e]', resolve: 'escape-nf' },
  { group: 'fp', source: '\\x1b[\\x30-\\x3f]', resolve: 'escape-fp' },
  { group: 'fe', source: '\\x1b[\\x40-\\x5f]', resolve: 'escape-fe' },
  { group: 'fs', source: '\\x1b[\\x60-\\x7e]', resolve: 'escape-fs' },
  { group: 'control', source: '[\\x01-\\x07\\x0e-\\x1a\\x1c-\\x1f]+', resolve: 'control' },
  { group: 'nul', source: '\\x00+', resolve: 'control-null' },
  { group: 'backspace', source: '\\x08+', resolve: 'control-backspace' },
  { group: 'escape', source: '\\x1b', resolve: 'control-escape' },
  { group: 'del', source: '\\x7f+', resolve: 'control-delete' },
  { group: 'tab', source: '\\x09+', resolve: 'whitespace-tab' },
  { group: 'newline', source: '\\x0a', resolve: 'whitespace-newline' },
  { group: 'vtab', source: '\\x0b+', resolve: 'whitespace-vtab' },
  { group: 'formfeed', source: '\\x0c+', resolve: 'whitespace-formfeed' },
  { group: 'cr', source: '\\x0d+', resolve: 'whitespace-cr' },
  { group: 'space', source: '\\x20+', resolve: 'whitespace-space' },
  { group: 'printable', source: '[\\x21-\\x7e]+', resolve: 'printable' },
]

/**
 * Sticky matcher over every alternative. Covers all 256 byte values, so a
 * failed match at any position means the table itself is broken.
 */
export const createClassifier = (): RegExp =>
  new RegExp(
    ALTERNATIVES.map(({ group, source }) => `(?<${group}>${source})`).join('|'),
    'y',
  )

export const resolveMatch = (match: RegExpExecArray): TemplateId | null => {
  const groups = match.groups ?? {}
  for (const alternative of ALTERNATIVES) {
    if (groups[alternative.group] === undefined) continue
    const { resolve } = alternative
    return typeof resolve === 'function' ? resolve(match[0]) : resolve
  }
  return null
}

/**
 * Start of a trailing run that could still grow into a longer alternative
 * once more bytes arrive: an unterminated escape sequence, or any run of high
 * bytes. The binary arm is greedy, so whether a UTF-8 sequence inside such a
 * run decodes depends on where the run starts and ends.
 */
const INCOMPLETE_TAIL = /(?:\x1b(?:\[[\x30-\x3f]*[\x20-\x2f]*|[\x20-\x2f]+)?|[\x80-\xff]+)$/

export const findIncompleteTail = (text: string): number => {
  const tail = INCOMPLETE_TAIL.exec(text)
  return tail ? tail.index : text.length
}

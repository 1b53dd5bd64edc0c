// Substitutions for the categories that carry text rather than markers.

import { charLength, toBinaryString } from '../internal/bytes'
import { STYLES } from '../style/style'
import { ReadMode } from '../types'
import {
  createPrimarySegment,
  isIgnored,
  processLabels,
  type ResolvedTemplate,
  type Substitute,
} from './template'

const BINARY_PADDING = '_'

export const substitutePrintable = (template: ResolvedTemplate): Substitute => {
  const ignored = isIgnored(template)
  return (raw) => [
    createPrimarySegment(
      template,
      raw,
      ignored ? processLabels(template, raw) : toBinaryString(raw),
    ),
  ]
}

/**
 * In text mode the label is followed by a real line break, after a reset so
 * background colors do not bleed into the rest of the terminal line.
 */
export const substituteNewline = (template: ResolvedTemplate): Substitute => {
  const { readMode } = template.context
  let processed = template.label
  if (readMode === ReadMode.Text) {
    processed = isIgnored(template)
      ? `${template.label}\n`
      : `${template.label}${STYLES.RESET.assemble()}\n`
  }
  return (raw) => [createPrimarySegment(template, raw, processed.repeat(raw.length))]
}

/**
 * Decoded in text mode, and in binary mode when decoding is on. Binary rows
 * need one character per byte, so the decoded text is left-padded to the
 * byte count.
 */
export const substituteUtf8 = (template: ResolvedTemplate): Substitute => {
  const { readMode, decode } = template.context
  const decoder = new TextDecoder('utf-8')
  const ignored = isIgnored(template)
  const decoding = readMode === ReadMode.Text || decode

  return (raw) => {
    if (ignored || !decoding) {
      return [createPrimarySegment(template, raw, processLabels(template, raw))]
    }
    let processed = decoder.decode(raw)
    if (readMode === ReadMode.Binary) {
      const length = charLength(processed)
      processed =
        length < raw.length
          ? BINARY_PADDING.repeat(raw.length - length) + processed
          : Array.from(processed).slice(0, raw.length).join('')
    }
    return [createPrimarySegment(template, raw, processed)]
  }
}

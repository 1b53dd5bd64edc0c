import { hexByte } from '../internal/bytes'
import { MarkerDetails } from '../types'
import {
  createDetailsSegment,
  createPrimarySegment,
  DETAILS_STYLE,
  isIgnored,
  type ResolvedTemplate,
  type Substitute,
} from './template'

const CARET_BASE = 0x40

/** Caret notation letter: 0x01 is `A`, 0x1a is `Z`, 0x1f is `_`. */
export const caretLetter = (byte: number): string =>
  String.fromCharCode(CARET_BASE + byte)

/**
 * Without details the whole run is one segment. Otherwise every byte gets
 * its own label followed by a zero-length annotation naming the byte.
 */
export const substituteControl = (template: ResolvedTemplate): Substitute => {
  const { markerDetails } = template.context
  const detailsStyle = template.baseStyle.merge(DETAILS_STYLE)
  const annotate = !isIgnored(template)
  const empty = new Uint8Array(0)

  return (raw) => {
    if (
      markerDetails === MarkerDetails.None ||
      markerDetails === MarkerDetails.BinaryStrict
    ) {
      return [createPrimarySegment(template, raw, template.label.repeat(raw.length))]
    }

    return Array.from(raw).flatMap((byte, index) => {
      const label = createPrimarySegment(
        template,
        raw.subarray(index, index + 1),
        template.label,
      )
      if (!annotate) {
        return [label]
      }
      const details =
        markerDetails === MarkerDetails.Brief ? caretLetter(byte) : hexByte(byte)
      return [label, createDetailsSegment(detailsStyle, empty, details)]
    })
  }
}

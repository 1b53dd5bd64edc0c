import { toBinaryString } from '../internal/bytes'
import { type Style } from '../style/style'
import { MarkerDetails, ReadMode } from '../types'
import {
  createDetailsSegment,
  createPrimarySegment,
  DETAILS_STYLE,
  ESCAPE_LABEL_STYLE,
  isIgnored,
  processLabels,
  type ResolvedTemplate,
  type Substitute,
  wrapInSeparators,
} from './template'

/**
 * How the bytes after the introducer are annotated. `brief` returns the
 * condensed form, `style` the style of the annotation itself.
 */
export interface EscapeDetails {
  brief(params: Uint8Array): string
  style(params: Uint8Array): Style
}

const CSI_INTRODUCER = 0x5b
const isParameterByte = (byte: number): boolean => byte >= 0x30 && byte <= 0x3f

/**
 * Parameter bytes of a control sequence: everything after `ESC [` up to the
 * first intermediate or final byte. Empty for other escape sequences.
 */
export const extractCsiParams = (raw: Uint8Array): Uint8Array => {
  if (raw[1] !== CSI_INTRODUCER) {
    return raw.subarray(0, 0)
  }
  let end = 2
  while (end < raw.length && isParameterByte(raw[end] ?? 0)) {
    end += 1
  }
  return raw.subarray(2, end)
}

const plainDetails = (template: ResolvedTemplate): EscapeDetails => {
  const style = template.baseStyle.merge(DETAILS_STYLE)
  return {
    brief: () => '',
    style: () => style,
  }
}

/**
 * Introducer label (always the single ESC byte) followed by a detail
 * segment over the remaining bytes, optionally wrapped in separators.
 *
 * With details off the sequence collapses into one labelled segment that
 * still owns every raw byte.
 */
export const substituteEscape = (
  template: ResolvedTemplate,
  details: EscapeDetails = plainDetails(template),
): Substitute => {
  const { markerDetails, readMode, noSeparators } = template.context
  const labelStyle = template.style.merge(ESCAPE_LABEL_STYLE)
  const separated =
    readMode === ReadMode.Text &&
    !noSeparators &&
    (markerDetails === MarkerDetails.Brief || markerDetails === MarkerDetails.Full)

  return (raw, params) => {
    if (isIgnored(template)) {
      return [createPrimarySegment(template, raw, processLabels(template, raw))]
    }
    if (markerDetails === MarkerDetails.None) {
      return [createPrimarySegment(template, raw, template.label, labelStyle)]
    }

    const tail = raw.subarray(1)
    const paramBytes = params ?? extractCsiParams(raw)
    const processed =
      markerDetails === MarkerDetails.Brief
        ? details.brief(paramBytes)
        : toBinaryString(tail)
    const segments = [
      createPrimarySegment(template, raw.subarray(0, 1), template.label, labelStyle),
      createDetailsSegment(details.style(paramBytes), tail, processed),
    ]
    return separated ? wrapInSeparators(segments) : segments
  }
}

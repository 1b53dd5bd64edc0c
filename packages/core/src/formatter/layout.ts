import { BYTE_GROUP_SIZE } from '../segment/printer'
import { paint, STYLES, type Style } from '../style/style'

export const PREFIX_WIDTH = 8
export const PREFIX_SEPARATOR = '│'
export const LINE_NUMBER_WIDTH = 2
export const MIN_COLUMNS = BYTE_GROUP_SIZE

// Screen width of one hex group: 4 cells of ` xx`, 3 inner spaces and 2 of
// padding around it.
const GROUP_WIDTH = 3 * BYTE_GROUP_SIZE + (BYTE_GROUP_SIZE - 1) + 2

/**
 * `0x` plus lowercase hex padded to an even digit count derived from the
 * decimal length, so 100 is `0x0064`.
 */
export const formatOffset = (offset: number, decimal: boolean): string => {
  if (decimal) {
    return String(offset)
  }
  const digits = Math.ceil(String(offset).length / 2) * 2
  return `0x${offset.toString(16).padStart(digits, '0')}`
}

export const separator = (): string => paint(STYLES.CYAN, PREFIX_SEPARATOR)

/** Label right-aligned (and cut) to the prefix width, then the separator. */
export const formatPrefix = (label: string, style: Style = STYLES.GREEN): string =>
  paint(style, label.slice(0, PREFIX_WIDTH).padStart(PREFIX_WIDTH)) + separator()

export const formatOffsetPrefix = (
  offset: number,
  decimal: boolean,
  style: Style = STYLES.GREEN,
): string => formatPrefix(formatOffset(offset, decimal), style)

export const formatLineNumberPrefix = (
  lineNumber: number,
  options: { readonly debug: boolean; readonly noLineNumbers: boolean },
): string => {
  if (options.debug) {
    return formatPrefix(String(lineNumber))
  }
  if (options.noLineNumbers) {
    return ''
  }
  return paint(STYLES.GREEN, String(lineNumber).padStart(LINE_NUMBER_WIDTH)) + separator()
}

/** Screen width of the hex column for `byteCount` bytes. */
export const hexColumnWidth = (byteCount: number): number =>
  byteCount <= 0 ? 0 : 3 * byteCount + Math.floor((byteCount - 1) / BYTE_GROUP_SIZE)

/**
 * Bytes per binary row that fit into `terminalWidth`, in whole groups, never
 * fewer than one group.
 */
export const computeColumns = (terminalWidth: number, prefixWidth: number): number => {
  const available = terminalWidth - prefixWidth - 1
  const groups = Math.floor(available / GROUP_WIDTH)
  return Math.max(MIN_COLUMNS, groups * BYTE_GROUP_SIZE)
}

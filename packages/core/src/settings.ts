import { ConfigurationError } from './errors'
import {
  CharClass,
  DisplayMode,
  MarkerDetails,
  type Mutable,
  ReadMode,
  type Settings,
  type SettingsOverrides,
} from './types'

export const READ_CHUNK_SIZE = 4096
export const READ_CHUNK_SIZE_DEBUG = 128
export const DEFAULT_TERMINAL_WIDTH = 80
export const MAX_DEBUG_LEVEL = 4

const defaultDisplayModes = (): Record<CharClass, DisplayMode> => ({
  [CharClass.Control]: DisplayMode.Default,
  [CharClass.Escape]: DisplayMode.Default,
  [CharClass.Whitespace]: DisplayMode.Default,
  [CharClass.Utf8]: DisplayMode.Default,
  [CharClass.Binary]: DisplayMode.Default,
  [CharClass.Printable]: DisplayMode.Default,
})

export const DEFAULT_SETTINGS: Settings = Object.freeze({
  readMode: ReadMode.Text,
  displayModes: Object.freeze(defaultDisplayModes()),
  markerDetails: MarkerDetails.Brief,
  decode: false,
  columns: undefined,
  decimalOffsets: false,
  noOffsets: false,
  noLineNumbers: false,
  noSeparators: false,
  noColorMarkers: false,
  maxBytes: undefined,
  maxLines: undefined,
  chunkSize: undefined,
  debug: 0,
  terminalWidth: DEFAULT_TERMINAL_WIDTH,
})

const requirePositive = (name: string, value: number | undefined): void => {
  if (value === undefined) return
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got ${String(value)}`,
    )
  }
}

/**
 * Merges `overrides` onto {@link DEFAULT_SETTINGS}, validates the result and
 * freezes it. Settings never change after a pipeline is built from them.
 */
export const resolveSettings = (overrides: SettingsOverrides = {}): Settings => {
  const { displayModes, ...rest } = overrides
  const merged: Mutable<Settings> = {
    ...DEFAULT_SETTINGS,
    ...rest,
    displayModes: Object.freeze({
      ...DEFAULT_SETTINGS.displayModes,
      ...(displayModes ?? {}),
    }),
  }

  requirePositive('columns', merged.columns)
  requirePositive('chunkSize', merged.chunkSize)
  requirePositive('maxBytes', merged.maxBytes)
  requirePositive('maxLines', merged.maxLines)
  requirePositive('terminalWidth', merged.terminalWidth)

  if (
    !Number.isInteger(merged.markerDetails) ||
    merged.markerDetails < MarkerDetails.None ||
    merged.markerDetails > MarkerDetails.Full
  ) {
    throw new ConfigurationError(
      `markerDetails must be 0, 1 or 2, got ${String(merged.markerDetails)}`,
    )
  }
  if (!Number.isInteger(merged.debug) || merged.debug < 0) {
    throw new ConfigurationError(
      `debug must be a non-negative integer, got ${String(merged.debug)}`,
    )
  }
  if (merged.decimalOffsets && merged.noOffsets) {
    throw new ConfigurationError(
      'decimalOffsets and noOffsets cannot be combined',
    )
  }

  merged.debug = Math.min(merged.debug, MAX_DEBUG_LEVEL)
  return Object.freeze(merged)
}

export const effectiveMarkerDetails = (settings: Settings): MarkerDetails => {
  if (settings.readMode === ReadMode.Binary) {
    return MarkerDetails.BinaryStrict
  }
  if (settings.markerDetails <= MarkerDetails.None) {
    return MarkerDetails.None
  }
  if (settings.markerDetails === MarkerDetails.Brief) {
    return MarkerDetails.Brief
  }
  return MarkerDetails.Full
}

export const displayModeFor = (
  settings: Settings,
  charClass: CharClass,
): DisplayMode => settings.displayModes[charClass]

export const effectivePrintOffsets = (settings: Settings): boolean =>
  settings.debug > 0 || !settings.noOffsets

export const effectiveChunkSize = (settings: Settings): number => {
  if (settings.chunkSize !== undefined) return settings.chunkSize
  return settings.debug > 0 ? READ_CHUNK_SIZE_DEBUG : READ_CHUNK_SIZE
}

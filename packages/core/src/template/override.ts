import { DisplayMode, type ModeKey, ReadMode } from '../types'

const MODE_KEYS: ReadonlyArray<ModeKey> = [
  ...Object.values(DisplayMode),
  ...Object.values(ReadMode),
]

export type OverrideTable<V> = Partial<Record<ModeKey, V>>

/**
 * A value that is almost always equal to its fallback, with a few
 * display/read mode specific exceptions.
 */
export class PartialOverride<V> {
  readonly fallback: V
  private readonly overrides: ReadonlyMap<ModeKey, V>

  constructor(fallback: V, overrides: OverrideTable<V> = {}) {
    this.fallback = fallback
    const entries = new Map<ModeKey, V>()
    for (const key of MODE_KEYS) {
      const value = overrides[key]
      if (value !== undefined) {
        entries.set(key, value)
      }
    }
    this.overrides = entries
  }

  /**
   * First override found among `keys`, left to right, or the fallback.
   */
  get(...keys: ModeKey[]): V {
    for (const key of keys) {
      const value = this.overrides.get(key)
      if (value !== undefined) {
        return value
      }
    }
    return this.fallback
  }

  has(key: ModeKey): boolean {
    return this.overrides.has(key)
  }

  /** Copy with `key` set, unless it is already overridden. */
  withDefault(key: ModeKey, value: V): PartialOverride<V> {
    if (this.has(key)) {
      return this
    }
    const table: OverrideTable<V> = { [key]: value }
    for (const [existing, existingValue] of this.overrides) {
      table[existing] = existingValue
    }
    return new PartialOverride(this.fallback, table)
  }
}

export const toOverride = <V>(value: V | PartialOverride<V>): PartialOverride<V> =>
  value instanceof PartialOverride ? value : new PartialOverride(value)

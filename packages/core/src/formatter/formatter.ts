import type { OutputSink } from '../io/output'
import { createSilentLogger, type DebugLogger } from '../logger'
import type { ParserBuffer } from '../parser/buffer'
import type { Chain } from '../segment/chain'
import { ReadMode, type Settings } from '../types'
import { BinaryFormatter } from './binary'
import { TextFormatter } from './text'

/**
 * Drains the chain into output rows. Each `format()` call emits every row
 * that is complete; once the parser buffer is closed it also flushes the
 * partial rest.
 */
export interface Formatter {
  format(): void
  /** Bytes emitted so far. */
  readonly offset: number
}

export interface FormatterDependencies {
  readonly buffer: ParserBuffer
  readonly chain: Chain
  readonly output: OutputSink
  readonly logger?: DebugLogger
}

export const createFormatter = (
  settings: Settings,
  dependencies: FormatterDependencies,
): Formatter => {
  const logger = dependencies.logger ?? createSilentLogger('formatter')
  switch (settings.readMode) {
    case ReadMode.Binary:
      return new BinaryFormatter(settings, { ...dependencies, logger: logger.child('binfmt') })
    case ReadMode.Text:
      return new TextFormatter(settings, { ...dependencies, logger: logger.child('txtfmt') })
  }
}

import type { OutputSink } from '../io/output'
import type { DebugLogger } from '../logger'
import type { ParserBuffer } from '../parser/buffer'
import type { Chain } from '../segment/chain'
import {
  debugSafePrinter,
  debugStylesPrinter,
  processedPrinter,
} from '../segment/printer'
import { stripStyles } from '../style/style'
import type { Settings } from '../types'
import type { Formatter } from './formatter'
import { formatLineNumberPrefix } from './layout'

interface TextFormatterDependencies {
  readonly buffer: ParserBuffer
  readonly chain: Chain
  readonly output: OutputSink
  readonly logger: DebugLogger
}

/** Line-oriented output, one processed input line per output line. */
export class TextFormatter implements Formatter {
  private readonly settings: Settings
  private readonly deps: TextFormatterDependencies
  private emitted = 0
  private lineNumber = 1

  constructor(settings: Settings, deps: TextFormatterDependencies) {
    this.settings = settings
    this.deps = deps
  }

  get offset(): number {
    return this.emitted
  }

  format(): void {
    const { buffer, chain, output, logger } = this.deps
    const prefixOptions = {
      debug: this.settings.debug > 0,
      noLineNumbers: this.settings.noLineNumbers,
    }

    for (;;) {
      logger.log(1, 'Requested line')
      const result = chain.detachLine(buffer.closed)
      if (result.status !== 'ready') break

      const { slice } = result
      logger.log(3, () => slice.render(debugStylesPrinter), this.emitted)
      logger.log(2, () => slice.render(debugSafePrinter), this.emitted)

      const line = slice.render(processedPrinter)
      const terminator = stripStyles(line).endsWith('\n') ? '' : '\n'
      output.write(formatLineNumberPrefix(this.lineNumber, prefixOptions) + line + terminator)

      this.emitted += slice.byteLength
      this.lineNumber += 1
    }

    if (buffer.closed) {
      logger.log(1, 'EOF')
    }
  }
}

import type { OutputSink } from '../io/output'
import type { DebugLogger } from '../logger'
import type { ParserBuffer } from '../parser/buffer'
import type { Chain, ChainSlice } from '../segment/chain'
import {
  debugHexPrinter,
  debugSafePrinter,
  debugStylesPrinter,
  processedPrinter,
  rawHexPrinter,
} from '../segment/printer'
import { effectivePrintOffsets } from '../settings'
import { STYLES, stripStyles } from '../style/style'
import type { Settings } from '../types'
import type { Formatter } from './formatter'
import {
  computeColumns,
  formatOffsetPrefix,
  hexColumnWidth,
  separator,
} from './layout'

interface BinaryFormatterDependencies {
  readonly buffer: ParserBuffer
  readonly chain: Chain
  readonly output: OutputSink
  readonly logger: DebugLogger
}

/**
 * Hex dump: fixed-width rows of hex cells followed by the processed
 * rendering of the same bytes.
 */
export class BinaryFormatter implements Formatter {
  private readonly settings: Settings
  private readonly deps: BinaryFormatterDependencies
  private readonly printOffsets: boolean
  private readonly columns: number
  private emitted = 0
  private closed = false

  constructor(settings: Settings, deps: BinaryFormatterDependencies) {
    this.settings = settings
    this.deps = deps
    this.printOffsets = effectivePrintOffsets(settings)
    this.columns = settings.columns ?? computeColumns(settings.terminalWidth, this.prefixWidth())
    this.deps.logger.log(2, `Columns amount set to: ${this.columns}`)
  }

  get offset(): number {
    return this.emitted
  }

  format(): void {
    const { buffer, chain, output, logger } = this.deps
    const force = buffer.closed

    for (;;) {
      logger.log(1, `Requested ${this.columns} byte(s)`)
      const result = chain.detachBytes(this.columns, force)
      if (result.status !== 'ready') break
      if (result.slice.byteLength === 0) continue

      this.writeDebugRows(result.slice)
      output.write(this.formatRow(result.slice))
      this.emitted += result.slice.byteLength
    }

    if (force && !this.closed) {
      this.closed = true
      if (this.printOffsets) {
        output.write(
          `${formatOffsetPrefix(this.emitted, this.settings.decimalOffsets, STYLES.HI_GREEN)}\n`,
        )
      }
    }
  }

  private formatRow(slice: ChainSlice): string {
    const prefix = this.printOffsets
      ? formatOffsetPrefix(this.emitted, this.settings.decimalOffsets)
      : ''
    return (
      prefix +
      slice.render(rawHexPrinter) +
      this.padding(slice.byteLength) +
      ' ' +
      (this.printOffsets ? separator() : ' ') +
      slice.render(processedPrinter) +
      '\n'
    )
  }

  private padding(byteCount: number): string {
    return ' '.repeat(hexColumnWidth(this.columns) - hexColumnWidth(byteCount))
  }

  private writeDebugRows(slice: ChainSlice): void {
    const { logger } = this.deps
    logger.log(3, () => slice.render(debugStylesPrinter), this.emitted)
    logger.log(
      1,
      () =>
        slice.render(debugHexPrinter) +
        this.padding(slice.byteLength) +
        ' │' +
        slice.render(debugSafePrinter),
      this.emitted,
    )
  }

  private prefixWidth(): number {
    if (!this.printOffsets) return 0
    return stripStyles(formatOffsetPrefix(0, this.settings.decimalOffsets)).length
  }
}

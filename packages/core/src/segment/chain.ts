import { InvariantViolation } from '../errors'
import { Deque } from '../internal/deque'
import { createSilentLogger, type DebugLogger } from '../logger'
import { escapeStyles, type Style } from '../style/style'
import type { SegmentPrinter } from './printer'
import type { Segment } from './segment'

/**
 * Chain elements. Style markers are zero-length: `start` and `stop` bracket
 * the segments sharing one opening style, `once` emits a standalone style
 * (usually a closer).
 */
export type ChainElement =
  | { readonly kind: 'segment'; readonly segment: Segment }
  | { readonly kind: 'start'; readonly style: Style }
  | { readonly kind: 'stop'; readonly style: Style }
  | { readonly kind: 'once'; readonly style: Style }

export type DetachResult =
  | { readonly status: 'ready'; readonly slice: ChainSlice }
  | { readonly status: 'suspended' }
  | { readonly status: 'exhausted' }

const SUSPENDED: DetachResult = Object.freeze({ status: 'suspended' })
const EXHAUSTED: DetachResult = Object.freeze({ status: 'exhausted' })

/**
 * Detached part of a chain, re-bracketed so it renders correctly on its own.
 */
export class ChainSlice {
  readonly elements: ReadonlyArray<ChainElement>
  readonly byteLength: number

  constructor(elements: ReadonlyArray<ChainElement>) {
    this.elements = elements
    this.byteLength = elements.reduce(
      (total, element) =>
        element.kind === 'segment' ? total + element.segment.byteLength : total,
      0,
    )
  }

  get segments(): Segment[] {
    return this.elements.flatMap((element) =>
      element.kind === 'segment' ? [element.segment] : [],
    )
  }

  render(printer: SegmentPrinter): string {
    let output = ''
    let column = 0
    for (const element of this.elements) {
      switch (element.kind) {
        case 'segment':
          output += printer.print(element.segment, column)
          column += element.segment.byteLength
          break
        case 'start':
        case 'once':
          output += renderStyle(printer, element.style)
          break
        case 'stop':
          break
      }
    }
    return output
  }
}

const renderStyle = (printer: SegmentPrinter, style: Style): string => {
  switch (printer.styles) {
    case 'none':
      return ''
    case 'live':
      return style.assemble()
    case 'escaped':
      return escapeStyles(style.assemble())
  }
}

/**
 * Ordered buffer of styled segments awaiting output. Owns byte-exact and
 * line-wise extraction and the stack of styles that are open across detach
 * calls.
 */
export class Chain {
  private readonly elements = new Deque<ChainElement>()
  private readonly activeStyles: Style[] = []
  private readonly logger: DebugLogger
  private bufferedBytes = 0

  constructor(logger: DebugLogger = createSilentLogger('chain')) {
    this.logger = logger
  }

  get byteLength(): number {
    return this.bufferedBytes
  }

  get isEmpty(): boolean {
    return this.elements.length === 0
  }

  get openStyles(): ReadonlyArray<Style> {
    return this.activeStyles
  }

  snapshot(): ReadonlyArray<ChainElement> {
    return [...this.elements]
  }

  attach(...segments: Segment[]): void {
    for (const segment of segments) {
      this.bufferedBytes += segment.byteLength
      if (segment.style.isNoop) {
        this.elements.push({ kind: 'segment', segment })
        continue
      }
      this.elements.push(
        { kind: 'start', style: segment.style },
        { kind: 'segment', segment },
        { kind: 'stop', style: segment.style },
        { kind: 'once', style: segment.style.closer() },
      )
    }
  }

  /**
   * Detaches exactly `byteCount` bytes. Without `force` the call suspends
   * until that many bytes are buffered; with it, whatever remains is
   * returned.
   */
  detachBytes(byteCount: number, force: boolean): DetachResult {
    if (this.elements.length === 0) {
      this.logger.log(1, 'Responding with exhausted')
      return EXHAUSTED
    }
    if (this.bufferedBytes < byteCount && !force) {
      this.logger.log(1, 'Responding with suspended')
      this.logger.log(2, () => `Buffer state: ${this.preview()}`)
      return SUSPENDED
    }

    const drain = force && byteCount >= this.bufferedBytes
    return { status: 'ready', slice: this.detach(drain ? Infinity : byteCount) }
  }

  /**
   * Detaches everything up to and including the next newline segment, or
   * everything left when `force` is set.
   */
  detachLine(force: boolean): DetachResult {
    if (this.elements.length === 0) {
      this.logger.log(1, 'Responding with exhausted')
      return EXHAUSTED
    }

    let available = 0
    let hasNewline = false
    for (const element of this.elements) {
      if (element.kind !== 'segment') continue
      available += element.segment.byteLength
      if (element.segment.isNewline) {
        hasNewline = true
        break
      }
    }

    if (hasNewline) {
      return { status: 'ready', slice: this.detach(available) }
    }
    if (force) {
      return { status: 'ready', slice: this.detach(Infinity) }
    }

    this.logger.log(1, 'Responding with suspended')
    this.logger.log(2, () => `Buffer state: ${this.preview()}`)
    return SUSPENDED
  }

  clear(): void {
    this.elements.clear()
    this.activeStyles.length = 0
    this.bufferedBytes = 0
  }

  /**
   * Walks from the front consuming up to `budget` bytes. Start markers are
   * only taken while budget remains, so a style opening exactly at the cut
   * belongs to the next slice.
   */
  private detach(budget: number): ChainSlice {
    const output: ChainElement[] = this.activeStyles.map((style) => ({
      kind: 'once',
      style,
    }))
    let remaining = budget

    for (let element = this.elements.peek(); element; element = this.elements.peek()) {
      if (element.kind === 'segment') {
        if (remaining === 0) break
        const segment = element.segment
        if (segment.byteLength > remaining) {
          output.push({ kind: 'segment', segment: segment.split(remaining) })
          this.bufferedBytes -= remaining
          remaining = 0
          break
        }
        output.push(element)
        this.bufferedBytes -= segment.byteLength
        remaining -= segment.byteLength
      } else if (element.kind === 'start') {
        if (remaining === 0) break
        output.push(element)
        this.activeStyles.push(element.style)
      } else if (element.kind === 'stop') {
        this.closeStyle(element.style)
      } else {
        output.push(element)
      }
      this.elements.shift()
    }

    for (const style of this.activeStyles) {
      output.push({ kind: 'once', style: style.closer() })
    }

    const slice = new ChainSlice(output)
    this.logger.log(2, () => `Detached ${slice.byteLength} data byte(s)`)
    this.logger.log(2, () => `Buffer state: ${this.preview()}`)
    return slice
  }

  private closeStyle(style: Style): void {
    const index = this.activeStyles.findIndex((active) => active.equals(style))
    if (index === -1) {
      throw new InvariantViolation(
        `Stop marker for ${style.toString()} reached without a matching start`,
      )
    }
    this.activeStyles.splice(index, 1)
  }

  /** Debug summary: data length, marker count and open styles. */
  preview(): string {
    let markers = 0
    for (const element of this.elements) {
      if (element.kind !== 'segment') markers += 1
    }
    const open = this.activeStyles.map((style) => style.key).join(' ')
    return `len ${this.bufferedBytes}+${markers} markers, open [${open}]`
  }
}

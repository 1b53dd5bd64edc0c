import { ParserInconsistencyError } from '../errors'
import { describeBytes, fromBinaryString, toBinaryString } from '../internal/bytes'
import { createSilentLogger, type DebugLogger } from '../logger'
import type { Chain } from '../segment/chain'
import type { TemplateRegistry } from '../template/registry'
import type { ParserBuffer } from './buffer'
import {
  createClassifier,
  findIncompleteTail,
  resolveMatch,
  splitCsi,
} from './patterns'

/**
 * Classifies buffered bytes into runs and attaches the segments their
 * templates produce to the chain, in input order.
 */
export class Parser {
  private readonly classifier = createClassifier()
  private readonly buffer: ParserBuffer
  private readonly chain: Chain
  private readonly registry: TemplateRegistry
  private readonly logger: DebugLogger

  constructor(
    buffer: ParserBuffer,
    chain: Chain,
    registry: TemplateRegistry,
    logger: DebugLogger = createSilentLogger('parser'),
  ) {
    this.buffer = buffer
    this.chain = chain
    this.registry = registry
    this.logger = logger
  }

  /**
   * Consumes as much of the buffer as can be classified. Until the buffer is
   * closed, a trailing sequence that may still be extended by the next chunk
   * stays buffered.
   */
  parse(): void {
    const raw = this.buffer.current
    const base = this.buffer.offset
    const end = this.buffer.closed ? raw.length : findIncompleteTail(toBinaryString(raw))
    const text = toBinaryString(raw.subarray(0, end))
    let position = 0

    this.logger.log(2, () => `Parsing ${describeBytes(raw)}, deferring ${raw.length - end}`)

    while (position < text.length) {
      this.classifier.lastIndex = position
      const match = this.classifier.exec(text)
      if (!match || match[0].length === 0) {
        throw new ParserInconsistencyError(
          `No byte class matches ${describeBytes(raw.subarray(position))}`,
          base + position,
        )
      }

      const id = resolveMatch(match)
      if (id === null) {
        throw new ParserInconsistencyError(
          `Match "${match[0]}" resolved to no alternative`,
          base + position,
        )
      }

      const bytes = raw.subarray(position, position + match[0].length)
      const csi = match.groups?.['csi'] === undefined ? null : splitCsi(match[0])
      const template = this.registry.get(id)
      const segments = template.substitute(
        bytes,
        csi ? fromBinaryString(csi.params) : undefined,
      )
      this.chain.attach(...segments)

      this.logger.log(
        3,
        () =>
          `${id} ${describeBytes(bytes)} -> ` +
          segments.map((segment) => segment.toString()).join(' '),
        base + position,
      )
      position += bytes.length
    }

    this.buffer.retainSuffix(raw.subarray(end))
  }
}

import { createFormatter, type Formatter } from './formatter/formatter'
import { createStdoutSink, type OutputSink } from './io/output'
import { readChunks, type ReadSummary } from './io/reader'
import { createSilentLogger, type DebugLogger } from './logger'
import { ParserBuffer } from './parser/buffer'
import { Parser } from './parser/parser'
import { Chain } from './segment/chain'
import { effectiveChunkSize } from './settings'
import { createTemplateRegistry, type TemplateRegistry } from './template/registry'
import type { TemplateDefinition } from './template/template'
import type { Settings } from './types'

export interface InspectorOptions {
  readonly output?: OutputSink
  readonly logger?: DebugLogger
  /** Replaces the built-in category table. */
  readonly definitions?: ReadonlyArray<TemplateDefinition>
}

export interface Inspector {
  readonly registry: TemplateRegistry
  /** Appends `chunk`, classifies what can be classified and prints complete rows. */
  write(chunk: Uint8Array, final?: boolean): void
  inspectStream(source: AsyncIterable<Uint8Array | string>): Promise<ReadSummary>
  /** Renders `bytes` as one complete input. */
  inspectBytes(bytes: Uint8Array): void
  /** Bytes written to the output so far. */
  readonly offset: number
}

/**
 * Wires one inspection pipeline: buffer, parser, chain and the formatter for
 * the configured read mode. A pipeline handles a single input stream.
 */
export const createInspector = (
  settings: Settings,
  options: InspectorOptions = {},
): Inspector => {
  const logger = options.logger ?? createSilentLogger('inspect')
  const output = options.output ?? createStdoutSink()
  const buffer = new ParserBuffer()
  const chain = new Chain(logger.child('chain'))
  const registry = createTemplateRegistry(settings, options.definitions)
  const parser = new Parser(buffer, chain, registry, logger.child('parser'))
  const formatter: Formatter = createFormatter(settings, {
    buffer,
    chain,
    output,
    logger,
  })

  const write = (chunk: Uint8Array, final = false): void => {
    buffer.append(chunk, final)
    parser.parse()
    formatter.format()
  }

  return {
    registry,
    write,
    inspectStream: (source) =>
      readChunks(
        source,
        {
          chunkSize: effectiveChunkSize(settings),
          maxBytes: settings.maxBytes,
          maxLines: settings.maxLines,
        },
        (chunk, _offset, final) => write(chunk, final),
        logger.child('reader'),
      ),
    inspectBytes: (bytes) => write(bytes, true),
    get offset() {
      return formatter.offset
    },
  }
}

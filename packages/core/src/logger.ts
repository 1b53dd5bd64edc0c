import { formatOffset } from './formatter/layout'

export type DebugLevel = 1 | 2 | 3 | 4

export interface DiagnosticRecord {
  readonly level: DebugLevel
  readonly channel: string
  readonly message: string
  readonly offset?: number
}

export interface DiagnosticsSink {
  onRecord(record: DiagnosticRecord): void
}

const CHANNEL_WIDTH = 8
const SEPARATOR = '│'

export interface TextStream {
  write(text: string): unknown
}

/**
 * Default sink: one line per record on stderr, prefixed with the channel
 * name or, when the record carries one, the byte offset.
 */
export const createStderrDiagnosticsSink = (
  options: { readonly decimalOffsets?: boolean; readonly stream?: TextStream } = {},
): DiagnosticsSink => ({
  onRecord(record) {
    const stream = options.stream ?? process.stderr
    const label =
      record.offset === undefined
        ? record.channel
        : formatOffset(record.offset, options.decimalOffsets ?? false)
    stream.write(
      `${label.padStart(CHANNEL_WIDTH).slice(-CHANNEL_WIDTH)}${SEPARATOR}${record.message}\n`,
    )
  },
})

/**
 * Collects records in memory. Used by tests and by callers that want to
 * inspect the trace after a run.
 */
export class MemoryDiagnosticsSink implements DiagnosticsSink {
  readonly records: DiagnosticRecord[] = []

  onRecord(record: DiagnosticRecord): void {
    this.records.push(record)
  }
}

/**
 * Leveled debug trace for one pipeline component. Records above the
 * configured verbosity are dropped before their message is built.
 */
export class DebugLogger {
  readonly channel: string
  private readonly verbosity: number
  private readonly sink: DiagnosticsSink

  constructor(channel: string, verbosity: number, sink: DiagnosticsSink) {
    this.channel = channel
    this.verbosity = verbosity
    this.sink = sink
  }

  enabled(level: DebugLevel): boolean {
    return this.verbosity >= level
  }

  log(level: DebugLevel, message: string | (() => string), offset?: number): void {
    if (this.verbosity < level) {
      return
    }
    this.sink.onRecord({
      level,
      channel: this.channel,
      message: typeof message === 'function' ? message() : message,
      ...(offset === undefined ? {} : { offset }),
    })
  }

  child(channel: string): DebugLogger {
    return new DebugLogger(channel, this.verbosity, this.sink)
  }
}

export const createSilentLogger = (channel = 'silent'): DebugLogger =>
  new DebugLogger(channel, 0, { onRecord: () => {} })

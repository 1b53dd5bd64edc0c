/**
 * Base error class for inspection pipeline faults.
 */
export class BytesightError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'BytesightError'
  }
}

/**
 * Raised when an invariant internal to the pipeline is violated. These
 * indicate implementation defects rather than unusual input, and abort the
 * run instead of emitting misaligned output.
 */
export class InvariantViolation extends BytesightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'InvariantViolation'
  }
}

/**
 * The classification alternation left some bytes unmatched.
 */
export class ParserInconsistencyError extends InvariantViolation {
  readonly offset: number

  constructor(message: string, offset: number, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ParserInconsistencyError'
    this.offset = offset
  }
}

/**
 * The remainder handed back to the parser buffer is not a suffix of it.
 */
export class BufferRebaseError extends InvariantViolation {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'BufferRebaseError'
  }
}

/**
 * A segment whose processed text is not aligned with its raw bytes was asked
 * to split, or the split offset is out of range.
 */
export class SegmentSplitError extends InvariantViolation {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SegmentSplitError'
  }
}

/**
 * A pattern alternative matched, but no template is registered for it.
 */
export class UnknownClassificationError extends InvariantViolation {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'UnknownClassificationError'
  }
}

/**
 * Settings failed validation while being resolved.
 */
export class ConfigurationError extends BytesightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ConfigurationError'
  }
}

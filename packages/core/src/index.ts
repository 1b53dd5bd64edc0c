export * from './types'
export * from './errors'
export * from './settings'
export {
  createSilentLogger,
  createStderrDiagnosticsSink,
  DebugLogger,
  type DebugLevel,
  type DiagnosticRecord,
  type DiagnosticsSink,
  type TextStream,
  MemoryDiagnosticsSink,
} from './logger'
export { Style, STYLES, indexed, bgIndexed, paint, stripStyles, escapeStyles } from './style/style'
export { Segment } from './segment/segment'
export { Chain, ChainSlice, type ChainElement, type DetachResult } from './segment/chain'
export {
  type SegmentPrinter,
  type StyleRendering,
  processedPrinter,
  rawHexPrinter,
} from './segment/printer'
export { ParserBuffer } from './parser/buffer'
export { Parser } from './parser/parser'
export {
  buildTemplate,
  createTemplateRegistry,
  TEMPLATE_DEFINITIONS,
  type TemplateRegistry,
} from './template/registry'
export type { Template, TemplateDefinition } from './template/template'
export { formatSgrBrief } from './template/sgr'
export { createFormatter, type Formatter } from './formatter/formatter'
export { computeColumns, formatOffset } from './formatter/layout'
export { createStdoutSink, MemoryOutputSink, type OutputSink } from './io/output'
export {
  openSource,
  readChunks,
  STDIN_PATH,
  type ChunkHandler,
  type ReadLimits,
  type ReadSummary,
} from './io/reader'
export { createInspector, type Inspector, type InspectorOptions } from './inspector'

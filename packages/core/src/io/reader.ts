import { createReadStream } from 'node:fs'
import type { Readable } from 'node:stream'
import { concatBytes, describeBytes } from '../internal/bytes'
import { ASCII_CODES } from '../internal/char-codes'
import { createSilentLogger, type DebugLogger } from '../logger'

export const STDIN_PATH = '-'

export interface ReadLimits {
  readonly chunkSize: number
  readonly maxBytes?: number | undefined
  readonly maxLines?: number | undefined
}

export type ChunkHandler = (chunk: Uint8Array, offset: number, final: boolean) => void

export interface ReadSummary {
  readonly bytes: number
  readonly chunks: number
  readonly truncated: boolean
}

/** `-` or no path reads stdin. */
export const openSource = (path: string | undefined): Readable =>
  path === undefined || path === STDIN_PATH ? process.stdin : createReadStream(path)

const toBytes = (data: Uint8Array | string): Uint8Array =>
  typeof data === 'string' ? new TextEncoder().encode(data) : data

/**
 * Position of the newline completing line `remaining`, or -1 when `data`
 * has fewer newlines. Also returns how many newlines were seen.
 */
const findLineLimit = (
  data: Uint8Array,
  remaining: number,
): { readonly cut: number; readonly seen: number } => {
  let seen = 0
  for (let index = 0; index < data.length; index += 1) {
    if (data[index] !== ASCII_CODES.LINE_FEED) continue
    seen += 1
    if (seen >= remaining) {
      return { cut: index, seen }
    }
  }
  return { cut: -1, seen }
}

/**
 * Re-slices `source` into `chunkSize` pieces and hands them to `onChunk`
 * with their stream offset. Byte and line limits crop the input where they
 * are reached. The last call always has `final` set, usually with an empty
 * chunk.
 */
export const readChunks = async (
  source: AsyncIterable<Uint8Array | string>,
  limits: ReadLimits,
  onChunk: ChunkHandler,
  logger: DebugLogger = createSilentLogger('reader'),
): Promise<ReadSummary> => {
  const { chunkSize, maxBytes, maxLines } = limits
  let pending: Uint8Array = new Uint8Array(0)
  let accepted = 0
  let offset = 0
  let lines = 0
  let chunks = 0
  let truncated = false

  const emit = (chunk: Uint8Array, final: boolean) => {
    logger.log(1, () => `Read chunk #${chunks}: ${describeBytes(chunk)}`, offset)
    onChunk(chunk, offset, final)
    offset += chunk.length
    chunks += 1
  }

  logger.log(2, `Read buffer: size ${chunkSize}`)

  for await (const data of source) {
    let piece = toBytes(data)

    if (maxLines !== undefined) {
      const { cut, seen } = findLineLimit(piece, maxLines - lines)
      lines += seen
      if (cut !== -1) {
        piece = piece.subarray(0, cut)
        truncated = true
        logger.log(2, `Line limit exceeded: ${maxLines}`, accepted)
      }
    }
    if (maxBytes !== undefined && accepted + piece.length >= maxBytes) {
      truncated = truncated || accepted + piece.length > maxBytes
      piece = piece.subarray(0, maxBytes - accepted)
      if (truncated) {
        logger.log(2, `Byte limit exceeded: ${maxBytes}`, accepted)
      }
    }

    accepted += piece.length
    pending = concatBytes(pending, piece)
    while (pending.length >= chunkSize) {
      emit(pending.subarray(0, chunkSize), false)
      pending = pending.subarray(chunkSize)
    }

    if (truncated || (maxBytes !== undefined && accepted >= maxBytes)) {
      break
    }
  }

  if (pending.length > 0) {
    emit(pending, false)
  }
  logger.log(1, 'Encountered EOF', offset)
  emit(new Uint8Array(0), true)

  return { bytes: accepted, chunks, truncated }
}

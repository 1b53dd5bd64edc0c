import { describe, expect, it } from 'vitest'
import { readChunks } from './reader'

async function* pieces(...values: Array<string | Uint8Array>) {
  for (const value of values) {
    yield value
  }
}

const collect = async (
  source: AsyncIterable<string | Uint8Array>,
  limits: Parameters<typeof readChunks>[1],
) => {
  const calls: Array<[string, number, boolean]> = []
  const summary = await readChunks(source, limits, (chunk, offset, final) => {
    calls.push([new TextDecoder().decode(chunk), offset, final])
  })
  return { calls, summary }
}

describe('readChunks', () => {
  it('re-slices input into chunks of the configured size', async () => {
    const { calls, summary } = await collect(pieces('abcdefg'), { chunkSize: 3 })
    expect(calls).toEqual([
      ['abc', 0, false],
      ['def', 3, false],
      ['g', 6, false],
      ['', 7, true],
    ])
    expect(summary).toEqual({ bytes: 7, chunks: 4, truncated: false })
  })

  it('joins small pieces', async () => {
    const { calls } = await collect(pieces('ab', 'cd', 'e'), { chunkSize: 2 })
    expect(calls).toEqual([
      ['ab', 0, false],
      ['cd', 2, false],
      ['e', 4, false],
      ['', 5, true],
    ])
  })

  it('crops the chunk that crosses the byte limit', async () => {
    const { calls, summary } = await collect(pieces('abcdefgh', 'ij'), {
      chunkSize: 4,
      maxBytes: 5,
    })
    expect(calls).toEqual([
      ['abcd', 0, false],
      ['e', 4, false],
      ['', 5, true],
    ])
    expect(summary.truncated).toBe(true)
  })

  it('stops before the newline that completes the last allowed line', async () => {
    const { calls } = await collect(pieces('a\nb\n'), { chunkSize: 10, maxLines: 1 })
    expect(calls).toEqual([
      ['a', 0, false],
      ['', 1, true],
    ])
  })

  it('counts lines across pieces', async () => {
    const { calls, summary } = await collect(pieces(new TextEncoder().encode('a\nb'), '\nc'), {
      chunkSize: 100,
      maxLines: 2,
    })
    expect(calls).toEqual([
      ['a\nb', 0, false],
      ['', 3, true],
    ])
    expect(summary.truncated).toBe(true)
  })

  it('always ends with a final call', async () => {
    const { calls } = await collect(pieces(), { chunkSize: 4 })
    expect(calls).toEqual([['', 0, true]])
  })
})

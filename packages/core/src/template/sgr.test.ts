import { describe, expect, it } from 'vitest'
import { createBriefCache, formatSgrBrief, markerFormatCodes, parseSgrParams } from './sgr'

describe('formatSgrBrief', () => {
  it('names attributes and colors', () => {
    expect(formatSgrBrief('1;31;48;5;16')).toBe('B,red,b5:16')
    expect(formatSgrBrief('95')).toBe('hi-magenta')
  })

  it('keeps sub-parameters with the code they belong to', () => {
    expect(formatSgrBrief('4:3')).toBe('U:3')
    expect(formatSgrBrief('4:3;1')).toBe('U:3,B')
  })

  it('reads extended colors written with colons', () => {
    expect(formatSgrBrief('38:2::255:128:0')).toBe('f2:#ff8000')
    expect(formatSgrBrief('48:5:16;1')).toBe('b5:16,B')
  })

  it('names off codes', () => {
    expect(formatSgrBrief('22;39;49;103')).toBe('-BD,-fg,-bg,bg-hi-yellow')
  })

  it('shortens true color forms', () => {
    expect(formatSgrBrief('38;2;255;128;0')).toBe('f2:#ff8000')
  })

  it('keeps unknown and incomplete codes verbatim', () => {
    expect(formatSgrBrief('21')).toBe('21')
    expect(formatSgrBrief('38;5')).toBe('38,K')
    expect(formatSgrBrief('38:5')).toBe('38:5')
  })
})

describe('markerFormatCodes', () => {
  it('keeps colors and plain attributes, drops marker attributes', () => {
    expect(markerFormatCodes('1;2;38;5;208;7;44')).toEqual([2, 38, 5, 208, 44])
  })

  it('drops the introducer of an incomplete extended color', () => {
    expect(markerFormatCodes('48;2;1')).toEqual([2])
  })

  it('does not read sub-parameters as codes of their own', () => {
    expect(markerFormatCodes('4:3')).toEqual([4])
    expect(markerFormatCodes('38:5:208;3')).toEqual([38, 5, 208, 3])
  })
})

describe('parseSgrParams', () => {
  it('skips empty and malformed parameters', () => {
    expect(parseSgrParams('1;;x;31')).toEqual([
      { code: 1, subParams: [] },
      { code: 31, subParams: [] },
    ])
  })

  it('collects colon sub-parameters', () => {
    expect(parseSgrParams('4:3;38:2::1:2:3')).toEqual([
      { code: 4, subParams: [3] },
      { code: 38, subParams: [2, 1, 2, 3] },
    ])
  })
})

describe('createBriefCache', () => {
  it('starts over once it holds the limit', () => {
    const cache = createBriefCache(2)
    expect(cache.brief('1')).toBe('B')
    expect(cache.brief('31')).toBe('red')
    expect(cache.brief('1')).toBe('B')
    expect(cache.size).toBe(2)

    expect(cache.brief('3')).toBe('I')
    expect(cache.size).toBe(1)
    expect(cache.brief('1')).toBe('B')
    expect(cache.size).toBe(2)
  })
})

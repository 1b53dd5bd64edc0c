import { describe, expect, it } from 'vitest'
import { createClassifier, findIncompleteTail, resolveCsi, resolveMatch } from './patterns'

const classify = (text: string) => {
  const classifier = createClassifier()
  const match = classifier.exec(text)
  return match ? { id: resolveMatch(match), length: match[0].length } : null
}

describe('classifier', () => {
  it('matches every single byte value', () => {
    for (let byte = 0; byte <= 0xff; byte += 1) {
      const result = classify(String.fromCharCode(byte))
      expect(result?.length, `byte ${byte}`).toBe(1)
    }
  })

  it('groups runs of the same category', () => {
    expect(classify('abc def')).toEqual({ id: 'printable', length: 3 })
    expect(classify('\u0000\u0000\u0001')).toEqual({ id: 'control-null', length: 2 })
    expect(classify('\n\n')).toEqual({ id: 'whitespace-newline', length: 1 })
    expect(classify('\u0001\u0002\u001b')).toEqual({ id: 'control', length: 2 })
  })

  it('prefers UTF-8 sequences over binary runs', () => {
    expect(classify('Ã©ÿ')).toEqual({ id: 'utf8', length: 2 })
    expect(classify('ÿÃ©')).toEqual({ id: 'binary', length: 3 })
    expect(classify('à\u0080\u0080')).toEqual({ id: 'binary', length: 3 })
  })

  it('distinguishes escape sequence shapes by introducer', () => {
    expect(classify('\u001b[1;31m')).toEqual({ id: 'escape-sgr', length: 7 })
    expect(classify('\u001b(B')).toEqual({ id: 'escape-nf', length: 3 })
    expect(classify('\u001b7')).toEqual({ id: 'escape-fp', length: 2 })
    expect(classify('\u001bM')).toEqual({ id: 'escape-fe', length: 2 })
    expect(classify('\u001bc')).toEqual({ id: 'escape-fs', length: 2 })
    expect(classify('\u001b[\u0001')).toEqual({ id: 'escape-fe', length: 2 })
    expect(classify('\u001b\u0001')).toEqual({ id: 'control-escape', length: 1 })
  })
})

describe('resolveCsi', () => {
  it('routes SGR sequences to their templates', () => {
    expect(resolveCsi('\u001b[m')).toBe('escape-sgr-reset')
    expect(resolveCsi('\u001b[0m')).toBe('escape-sgr-reset')
    expect(resolveCsi('\u001b[00m')).toBe('escape-sgr')
    expect(resolveCsi('\u001b[38;5;16m')).toBe('escape-sgr')
    expect(resolveCsi('\u001b[2J')).toBe('escape-csi')
    expect(resolveCsi('\u001b[?25h')).toBe('escape-csi')
  })
})

describe('findIncompleteTail', () => {
  it('finds unterminated escape sequences', () => {
    expect(findIncompleteTail('ab\u001b')).toBe(2)
    expect(findIncompleteTail('ab\u001b[12;')).toBe(2)
    expect(findIncompleteTail('a\u001b(')).toBe(1)
    expect(findIncompleteTail('\u001b[31m')).toBe(5)
  })

  it('finds truncated UTF-8 sequences', () => {
    expect(findIncompleteTail('xâ\u0082')).toBe(1)
    expect(findIncompleteTail('ð\u009f\u0098')).toBe(0)
  })

  it('holds back a trailing run of high bytes even when it ends complete', () => {
    expect(findIncompleteTail('â\u0082¬')).toBe(0)
    expect(findIncompleteTail('aÿÃ©')).toBe(1)
    expect(findIncompleteTail('ÿ\u001b')).toBe(1)
    expect(findIncompleteTail('ÿa')).toBe(2)
  })

  it('returns the full length when nothing is pending', () => {
    expect(findIncompleteTail('abc')).toBe(3)
    expect(findIncompleteTail('')).toBe(0)
  })
})

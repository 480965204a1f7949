import { describe, it, expect } from 'vitest'
import { niceNumber, numberToLetter, thousands } from '../../src/format/numbers.ts'
import { InvalidInputError } from '../../src/utils/errors.ts'

describe('thousands', () => {
  it('adds separators and truncates without decimals', () => {
    expect(thousands(1234567.89)).toBe('1,234,567')
    expect(thousands(999)).toBe('999')
  })

  it('fixes the requested decimals', () => {
    expect(thousands(1234567.891, 2)).toBe('1,234,567.89')
    expect(thousands(5, 2)).toBe('5.00')
  })

  it('accepts numeric strings, with or without separators', () => {
    expect(thousands('12000')).toBe('12,000')
    expect(thousands('12,000')).toBe('12,000')
  })

  it('throws on text that is not a number', () => {
    expect(() => thousands('twelve')).toThrow(InvalidInputError)
    expect(() => thousands('')).toThrow(InvalidInputError)
    expect(() => thousands(1, -1)).toThrow(InvalidInputError)
  })

  it('gives back the number once separators are stripped', () => {
    for (const n of [0, 7, 1000, 65536, 123456789]) {
      expect(Number(thousands(n).replace(/,/g, ''))).toBe(n)
    }
  })
})

describe('niceNumber', () => {
  it('spells out zero to ten', () => {
    expect(niceNumber(0)).toBe('zero')
    expect(niceNumber(3)).toBe('three')
    expect(niceNumber(10, true)).toBe('Ten')
  })

  it('leaves larger numbers as digits', () => {
    expect(niceNumber(11)).toBe('11')
  })
})

describe('numberToLetter', () => {
  it('counts like spreadsheet columns', () => {
    expect(numberToLetter(1)).toBe('A')
    expect(numberToLetter(26)).toBe('Z')
    expect(numberToLetter(27)).toBe('AA')
    expect(numberToLetter(28)).toBe('AB')
  })

  it('is empty for nothing', () => {
    expect(numberToLetter(0)).toBe('')
    expect(numberToLetter(null)).toBe('')
  })
})

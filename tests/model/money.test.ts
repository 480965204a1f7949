import { describe, it, expect } from 'vitest'
import { cents, currency, dollars, parseToCents, perFrequency } from '../../src/model/money.ts'
import { InvalidInputError } from '../../src/utils/errors.ts'

describe('cents / dollars', () => {
  it('rounds to the nearest cent', () => {
    expect(cents(100.1)).toBe(10010)
    expect(cents(-50.5)).toBe(-5050)
    expect(dollars(10010)).toBe(100.1)
  })
})

describe('perFrequency', () => {
  it('turns $500 every two weeks into a monthly figure', () => {
    expect(perFrequency(50000, 26, 12)).toBe(108333)
  })

  it('annualizes', () => {
    expect(perFrequency(50000, 26, 1)).toBe(1300000)
  })

  it('gives 0 for a target frequency of 0', () => {
    expect(perFrequency(50000, 26, 0)).toBe(0)
  })
})

describe('currency', () => {
  it('formats cents as dollars', () => {
    expect(currency(108333)).toBe('$1,083.33')
    expect(currency(108333, { decimals: 0 })).toBe('$1,083')
    expect(currency(0)).toBe('$0.00')
  })

  it('rejects non-finite amounts', () => {
    expect(() => currency(Number.NaN)).toThrow(InvalidInputError)
  })
})

describe('parseToCents', () => {
  it('reads typed money text', () => {
    expect(parseToCents('$1,200.50')).toBe(120050)
    expect(parseToCents('75')).toBe(7500)
    expect(parseToCents('')).toBe(0)
    expect(parseToCents('.')).toBe(0)
  })
})

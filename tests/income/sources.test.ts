import { describe, it, expect } from 'vitest'
import { ownerPredicate, sourcePredicate, toSet } from '../../src/income/sources.ts'

describe('toSet', () => {
  it('accepts a string, a list or a set', () => {
    expect([...toSet('rent')]).toEqual(['rent'])
    expect([...toSet(['rent', 'food'])]).toEqual(['rent', 'food'])
    expect([...toSet(new Set(['rent']))]).toEqual(['rent'])
    expect(toSet(undefined).size).toBe(0)
  })
})

describe('sourcePredicate', () => {
  const all = ['a', 'b', 'c']

  it('keeps everything without filters', () => {
    expect(all.filter(sourcePredicate())).toEqual(all)
  })

  it('keeps only included sources', () => {
    expect(all.filter(sourcePredicate(['a', 'b']))).toEqual(['a', 'b'])
  })

  it('removes excluded sources from the include list first', () => {
    expect(all.filter(sourcePredicate(['a', 'b'], 'b'))).toEqual(['a'])
  })

  it('falls back to the exclude list when nothing is left to include', () => {
    expect(all.filter(sourcePredicate('b', 'b'))).toEqual(['a', 'c'])
    expect(all.filter(sourcePredicate(undefined, ['a', 'c']))).toEqual(['b'])
  })
})

describe('ownerPredicate', () => {
  it('keeps every record without an owner filter', () => {
    expect(ownerPredicate()(undefined)).toBe(true)
  })

  it('requires a matching owner', () => {
    const keep = ownerPredicate(['Pat Doe', 'Sam Doe'])
    expect(keep('Sam Doe')).toBe(true)
    expect(keep('Alex Roe')).toBe(false)
    expect(keep(undefined)).toBe(false)
  })
})

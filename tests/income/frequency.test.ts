import { describe, it, expect } from 'vitest'
import {
  recentYears,
  TIMES_PER_YEAR_FOR_EXPENSES,
  TIMES_PER_YEAR_LIST,
  timesPerYearLabel,
} from '../../src/income/frequency.ts'

describe('timesPerYearLabel', () => {
  it('reads back a listed frequency in lower case', () => {
    expect(timesPerYearLabel(TIMES_PER_YEAR_LIST, 12)).toBe('monthly')
    expect(timesPerYearLabel(TIMES_PER_YEAR_LIST, 26)).toBe('once every two weeks')
    expect(timesPerYearLabel(TIMES_PER_YEAR_FOR_EXPENSES, 260)).toBe('every weekday')
  })

  it('spells out other frequencies', () => {
    expect(timesPerYearLabel(TIMES_PER_YEAR_LIST, 5)).toBe('Five times per year')
    expect(timesPerYearLabel(TIMES_PER_YEAR_LIST, 13)).toBe('13 times per year')
    expect(timesPerYearLabel(TIMES_PER_YEAR_LIST, 3.7)).toBe('Three times per year')
  })

  it('passes through values that are not numbers', () => {
    expect(timesPerYearLabel(TIMES_PER_YEAR_LIST, Number.NaN)).toBe('NaN')
  })
})

describe('recentYears', () => {
  const now = new Date(2023, 5, 1)

  it('counts down from next year', () => {
    expect(recentYears(3, 'descending', 1, now)).toEqual([2024, 2023, 2022, 2021])
  })

  it('can count up', () => {
    expect(recentYears(3, 'ascending', 1, now)).toEqual([2021, 2022, 2023, 2024])
  })

  it('can leave out future years', () => {
    expect(recentYears(2, 'descending', 0, now)).toEqual([2023, 2022])
  })
})

import { describe, it, expect } from 'vitest'
import {
  dateAfterNBusinessDays,
  isBusinessDay,
  nextBusinessDay,
  nonBusinessDays,
  standardHolidays,
} from '../../src/calendar/businessDays.ts'
import { InvalidInputError } from '../../src/utils/errors.ts'

describe('standardHolidays', () => {
  it('lists Massachusetts public holidays by ISO date', () => {
    const holidays = standardHolidays(2022)
    expect(holidays['2022-09-05']).toBeDefined()
    expect(holidays['2022-04-18']).toBeDefined()
  })

  it('hands out a copy that callers can change', () => {
    const holidays = standardHolidays(2022)
    delete holidays['2022-09-05']
    expect(standardHolidays(2022)['2022-09-05']).toBeDefined()
    expect(isBusinessDay('2022-09-05')).toBe(false)
  })

  it('leaves out Evacuation Day', () => {
    expect(Object.values(standardHolidays(2022)).some((name) => name.includes('Evacuation'))).toBe(false)
  })

  it('adds local closures', () => {
    expect(standardHolidays(2022, { addHolidays: { '12-13': 'Court closed' } })['2022-12-13']).toBe('Court closed')
  })

  it('rejects closure keys that are not MM-DD', () => {
    expect(() => standardHolidays(2022, { addHolidays: { '1-3': 'Bad key' } })).toThrow(InvalidInputError)
  })
})

describe('nonBusinessDays', () => {
  it('mixes weekends and holidays in date order', () => {
    expect(Object.keys(nonBusinessDays(2022, { firstN: 3 }))).toEqual(['2022-01-01', '2022-01-02', '2022-01-08'])
  })

  it('names plain weekend days', () => {
    expect(nonBusinessDays(2022)['2022-01-08']).toBe('Saturday')
    expect(nonBusinessDays(2022)['2022-01-09']).toBe('Sunday')
  })

  it('slices the end of the year', () => {
    expect(Object.keys(nonBusinessDays(2022, { lastN: 2 }))).toEqual(['2022-12-26', '2022-12-31'])
  })
})

describe('isBusinessDay', () => {
  it('is false on weekends and holidays', () => {
    expect(isBusinessDay('2022-09-05')).toBe(false)
    expect(isBusinessDay('2022-09-10')).toBe(false)
    expect(isBusinessDay('2022-09-06')).toBe(true)
  })

  it('follows the configured state', () => {
    expect(isBusinessDay('2022-04-18')).toBe(false)
    expect(isBusinessDay('2022-04-18', { subdivision: 'NY' })).toBe(true)
  })
})

describe('nextBusinessDay', () => {
  it('skips a long weekend', () => {
    expect(nextBusinessDay('2022-09-02')).toBe('2022-09-06')
  })

  it('returns the start when no wait is asked for and it is a business day', () => {
    expect(nextBusinessDay('2022-12-12', 0)).toBe('2022-12-12')
  })
})

describe('dateAfterNBusinessDays', () => {
  it('counts business days', () => {
    expect(dateAfterNBusinessDays('2022-12-12', 3)).toBe('2022-12-15')
  })

  it('skips added closures', () => {
    const options = { addHolidays: { '12-13': 'Closed', '12-14': 'Closed' } }
    expect(dateAfterNBusinessDays('2022-12-12', 3, options)).toBe('2022-12-19')
  })

  it('skips observed holidays across the new year', () => {
    expect(dateAfterNBusinessDays('2022-12-24', 5)).toBe('2023-01-03')
  })

  it('can drop a holiday with its observed day', () => {
    expect(dateAfterNBusinessDays('2022-12-24', 5, { removeHolidays: ['Christmas Day'] })).toBe('2022-12-30')
  })

  it('counts backwards for negative numbers', () => {
    expect(dateAfterNBusinessDays('2022-12-15', -3)).toBe('2022-12-12')
  })

  it('returns to a business day after going forward and back', () => {
    for (const n of [1, 5, 15]) {
      const later = dateAfterNBusinessDays('2022-12-12', n)
      expect(dateAfterNBusinessDays(later, -n)).toBe('2022-12-12')
    }
  })

  it('takes US dates and returns ISO ones', () => {
    expect(dateAfterNBusinessDays('12/12/2022', 0)).toBe('2022-12-12')
  })

  it('only takes whole numbers of days', () => {
    expect(() => dateAfterNBusinessDays('2022-12-12', 1.5)).toThrow(InvalidInputError)
  })
})

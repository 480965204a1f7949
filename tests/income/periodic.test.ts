import { describe, it, expect } from 'vitest'
import {
  assetEquity,
  assetTotal,
  employerSummary,
  incomeTotal,
  jobDeductions,
  jobGrossTotal,
  jobNetTotal,
  normalizedHours,
  periodicTotal,
  simpleValueTotal,
  yearMakeModel,
} from '../../src/income/periodic.ts'
import type { Asset, Income, Job } from '../../src/model/types.ts'
import { ValidationError } from '../../src/utils/errors.ts'

function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    source: 'wages',
    employer: { name: 'Acme Corp' },
    value: 200000,
    timesPerYear: 26,
    deduction: 40000,
    ...overrides,
  }
}

describe('periodicTotal', () => {
  it('scales to the target frequency', () => {
    const income: Income = { id: 'i', source: 'SSR', value: 50000, timesPerYear: 26 }
    expect(periodicTotal(income)).toBe(1300000)
    expect(periodicTotal(income, 12)).toBe(108333)
    expect(periodicTotal(income, 0)).toBe(0)
  })
})

describe('incomeTotal', () => {
  const hourly: Income = { id: 'i', source: 'wages', value: 1000, timesPerYear: 52, isHourly: true, hoursPerPeriod: 40 }

  it('multiplies hourly rates by the hours', () => {
    expect(incomeTotal(hourly, 1)).toBe(2080000)
    expect(incomeTotal(hourly, 52)).toBe(40000)
  })

  it('needs hours for an hourly income', () => {
    expect(() => incomeTotal({ ...hourly, hoursPerPeriod: undefined })).toThrow(ValidationError)
    expect(() => incomeTotal({ ...hourly, hoursPerPeriod: undefined })).toThrow(
      'Your hours per period need to be just a single number, without words',
    )
  })
})

describe('jobs', () => {
  it('nets deductions off the gross', () => {
    const job = makeJob()
    expect(jobGrossTotal(job)).toBe(5200000)
    expect(jobDeductions(job)).toBe(1040000)
    expect(jobNetTotal(job)).toBe(4160000)
  })

  it('keeps net equal to gross minus deductions after rounding', () => {
    const job = makeJob()
    expect(jobGrossTotal(job, 12)).toBe(433333)
    expect(jobDeductions(job, 12)).toBe(86667)
    expect(jobNetTotal(job, 12)).toBe(346666)
  })

  it('never multiplies deductions by hours', () => {
    const job = makeJob({ value: 2000, timesPerYear: 52, isHourly: true, hoursPerPeriod: 40, deduction: 10000 })
    expect(jobGrossTotal(job)).toBe(4160000)
    expect(jobDeductions(job)).toBe(520000)
    expect(jobNetTotal(job)).toBe(3640000)
  })

  it('treats a missing deduction as 0', () => {
    expect(jobDeductions(makeJob({ deduction: undefined }))).toBe(0)
  })

  it('normalizes hours', () => {
    expect(normalizedHours({ hoursPerPeriod: 10, timesPerYear: 52 })).toBe(520)
    expect(normalizedHours({ hoursPerPeriod: 10, timesPerYear: 52 }, 0)).toBe(0)
  })

  it('summarizes the employer', () => {
    expect(employerSummary({ name: 'Acme Corp' })).toBe('Acme Corp')
    expect(employerSummary({ name: 'Acme Corp', phone: '555-0100' })).toBe('Acme Corp: 555-0100')
    expect(employerSummary({ name: 'Acme Corp', address: '1 Main St', phone: '555-0100' })).toBe(
      'Acme Corp: 1 Main St, 555-0100',
    )
  })
})

describe('assets', () => {
  const house: Asset = { id: 'a', source: 'real estate', marketValue: 30000000, balance: 12000000 }

  it('earn nothing without an income value', () => {
    expect(assetTotal(house)).toBe(0)
  })

  it('default to a yearly income', () => {
    expect(assetTotal({ ...house, value: 120000 })).toBe(120000)
    expect(assetTotal({ ...house, value: 120000, timesPerYear: 12 }, 1)).toBe(1440000)
  })

  it('subtract what is owed for equity', () => {
    expect(assetEquity(house)).toBe(18000000)
    expect(assetEquity({ ...house, balance: undefined })).toBe(30000000)
  })

  it('describe vehicles', () => {
    const car = { year: 2020, make: 'Toyota', model: 'Camry' }
    expect(yearMakeModel(car)).toBe('2020 / Toyota / Camry')
    expect(yearMakeModel(car, ' ')).toBe('2020 Toyota Camry')
  })
})

describe('simpleValueTotal', () => {
  it('counts expenses against the total', () => {
    expect(simpleValueTotal({ id: 'l', source: 'rent', value: 40000, transactionType: 'expense' })).toBe(-40000)
    expect(simpleValueTotal({ id: 'l', source: 'pay', value: 40000 })).toBe(40000)
  })
})

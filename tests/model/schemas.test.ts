import { describe, it, expect } from 'vitest'
import { financialStatementSchema, incomeSchema, itemizedValueSchema, jobSchema } from '../../src/model/schemas.ts'
import { emptyFinancialStatement } from '../../src/model/types.ts'

describe('financialStatementSchema', () => {
  it('accepts an empty statement', () => {
    expect(financialStatementSchema.safeParse(emptyFinancialStatement()).success).toBe(true)
  })

  it('rejects a statement missing a list', () => {
    const statement = emptyFinancialStatement()
    const partial = { selectedIncomeSources: [], incomes: statement.incomes, jobs: statement.jobs }
    expect(financialStatementSchema.safeParse(partial).success).toBe(false)
  })
})

describe('incomeSchema', () => {
  const base = { id: 'inc-1', source: 'SSR', value: 50000, timesPerYear: 12 }

  it('accepts a plain income', () => {
    expect(incomeSchema.safeParse(base).success).toBe(true)
  })

  it('rejects negative and fractional cents', () => {
    expect(incomeSchema.safeParse({ ...base, value: -1 }).success).toBe(false)
    expect(incomeSchema.safeParse({ ...base, value: 10.5 }).success).toBe(false)
  })

  it('rejects a frequency of 0', () => {
    expect(incomeSchema.safeParse({ ...base, timesPerYear: 0 }).success).toBe(false)
  })

  it('requires hours for hourly income', () => {
    const result = incomeSchema.safeParse({ ...base, isHourly: true })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['hoursPerPeriod'])
      expect(result.error.issues[0].message).toBe('Hourly income needs hours per period')
    }
  })
})

describe('jobSchema', () => {
  it('requires an employer name', () => {
    const job = { id: 'j', source: 'wages', value: 100, timesPerYear: 26, employer: {} }
    expect(jobSchema.safeParse(job).success).toBe(false)
    expect(jobSchema.safeParse({ ...job, employer: { name: 'Acme Corp' } }).success).toBe(true)
  })
})

describe('itemizedValueSchema', () => {
  it('allows a line without a value', () => {
    expect(itemizedValueSchema.safeParse({ source: 'tips' }).success).toBe(true)
    expect(itemizedValueSchema.safeParse({ source: '' }).success).toBe(false)
  })
})

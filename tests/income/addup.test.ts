import { describe, it, expect } from 'vitest'
import { addUp } from '../../src/income/addup.ts'
import { ValidationError } from '../../src/utils/errors.ts'

describe('addUp', () => {
  it('sums a numeric field', () => {
    expect(addUp([{ amount: 5 }, { amount: 7 }], 'amount')).toBe(12)
  })

  it('skips values that are not numbers', () => {
    expect(addUp([{ amount: 5 }, { amount: 'seven' }], 'amount')).toBe(5)
  })

  it('rejects a field that sums to nothing', () => {
    const items = [{ name: 'Pat' }, { name: 'Sam' }]
    expect(() => addUp(items, 'name')).toThrow(ValidationError)
    expect(() => addUp(items, 'name')).toThrow("Make sure your field 'name' is spelled correctly and is numeric.")
  })
})

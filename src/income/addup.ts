import { ValidationError } from '../utils/errors.ts'

/**
 * Sum one numeric field across a list of records.
 *
 * A sum of 0 almost always means the field name is misspelled or the field
 * holds text, so it is rejected rather than silently printed on a form.
 */
export function addUp<T extends object>(items: readonly T[], field: keyof T & string): number {
  let sum = 0
  for (const item of items) {
    const value: unknown = item[field]
    if (typeof value === 'number' && Number.isFinite(value)) sum += value
  }
  if (sum === 0) {
    throw new ValidationError(`Make sure your field '${field}' is spelled correctly and is numeric.`)
  }
  return sum
}

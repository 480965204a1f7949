import { getConfig } from '../config.ts'
import { InvalidInputError } from '../utils/errors.ts'

function toNumber(num: number | string): number {
  if (typeof num === 'string' && num.trim() === '') {
    throw new InvalidInputError('Expected a number, got an empty string', num)
  }
  const parsed = typeof num === 'number' ? num : Number(num.trim().replace(/,/g, ''))
  if (!Number.isFinite(parsed)) {
    throw new InvalidInputError(`Expected a number, got ${JSON.stringify(num)}`, num)
  }
  return parsed
}

/**
 * Format a number with thousands separators.
 *
 * Without `decimals` the number is truncated to a whole number, the way a
 * form asking for whole dollars expects it:
 *
 *   thousands(1234567.89)    → "1,234,567"
 *   thousands(1234567.891, 2) → "1,234,567.89"
 *   thousands("12000")       → "12,000"
 */
export function thousands(num: number | string, decimals?: number): string {
  const value = toNumber(num)
  const { locale } = getConfig()
  if (decimals === undefined) {
    return Math.trunc(value).toLocaleString(locale, { maximumFractionDigits: 0 })
  }
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 20) {
    throw new InvalidInputError('decimals must be an integer from 0 to 20', decimals)
  }
  return value.toLocaleString(locale, {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  })
}

const SMALL_NUMBERS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten']

/** Spell out zero through ten; larger numbers stay as digits. */
export function niceNumber(n: number, capitalize = false): string {
  const text = Number.isInteger(n) && n >= 0 && n <= 10 ? SMALL_NUMBERS[n] : String(n)
  return capitalize ? text.charAt(0).toUpperCase() + text.slice(1) : text
}

/**
 * Capital letter(s) for an ordinal position, spreadsheet-column style:
 * 1 → "A", 26 → "Z", 27 → "AA", 28 → "AB". Zero or less is "".
 */
export function numberToLetter(n: number | null | undefined): string {
  let remaining = n ?? 0
  let letters = ''
  while (remaining > 0) {
    const remainder = (remaining - 1) % 26
    letters = String.fromCharCode(65 + remainder) + letters
    remaining = Math.floor((remaining - 1) / 26)
  }
  return letters
}

import { niceNumber } from '../format/numbers.ts'

export type TimesPerYearOption = readonly [timesPerYear: number, label: string]

export const TIMES_PER_YEAR_LIST: readonly TimesPerYearOption[] = [
  [52, 'Weekly'],
  [26, 'Once every two weeks'],
  [24, 'Twice per month'],
  [12, 'Monthly'],
  [4, 'Once every 3 months'],
  [2, 'Once every 6 months'],
  [1, 'Yearly'],
]

export const TIMES_PER_YEAR_FOR_EXPENSES: readonly TimesPerYearOption[] = [
  [365, 'Daily'],
  [260, 'Every weekday'],
  [104, 'Twice Weekly'],
  [52, 'Weekly'],
  [26, 'Once every two weeks'],
  [24, 'Twice per month'],
  [12, 'Monthly'],
  [4, 'Once every 3 months'],
  [2, 'Once every 6 months'],
  [1, 'Yearly'],
]

/**
 * Describe a frequency in words for reading back to the user.
 *
 *   timesPerYearLabel(TIMES_PER_YEAR_LIST, 12) → "monthly"
 *   timesPerYearLabel(TIMES_PER_YEAR_LIST, 5)  → "Five times per year"
 *
 * Values missing from the list are rounded down to a whole number.
 */
export function timesPerYearLabel(list: readonly TimesPerYearOption[], timesPerYear: number): string {
  if (!Number.isFinite(timesPerYear)) return String(timesPerYear)
  const row = list.find(([n]) => n === timesPerYear)
  if (row) return row[1].toLowerCase()
  return `${niceNumber(Math.trunc(timesPerYear), true)} times per year`
}

/**
 * Years for a "which year" dropdown, most likely first.
 *
 * `past` years back (counting the current one) plus `future` years ahead:
 *   recentYears(3, 'descending', 1)  // in 2023 → [2024, 2023, 2022, 2021]
 */
export function recentYears(
  past = 25,
  order: 'ascending' | 'descending' = 'descending',
  future = 1,
  now: Date = new Date(),
): number[] {
  const year = now.getFullYear()
  const years: number[] = []
  for (let y = year + future; y > year - past; y--) {
    years.push(y)
  }
  return order === 'ascending' ? years.reverse() : years
}

/**
 * Business-day math for court deadlines.
 *
 * Holidays come from `date-holidays` for the configured country and
 * subdivision (state/province). Only public holidays count, together with
 * their observed/substitute days. Interviews can add local closures and
 * drop holidays a court does not observe.
 */

import Holidays from 'date-holidays'
import { getConfig } from '../config.ts'
import { addDays, dayOfWeek, isoDate, parseDate } from './isoDate.ts'
import type { DateInput } from './isoDate.ts'
import { InvalidInputError } from '../utils/errors.ts'
import { logger } from '../utils/logger.ts'

const log = logger.child({ module: 'businessDays' })

export interface HolidayOptions {
  country?: string
  subdivision?: string
  /** Extra closures keyed by "MM-DD", applied to every year. */
  addHolidays?: Record<string, string>
  /**
   * Holiday names to drop. Matched as substrings, so "Christmas Day" also
   * drops "Christmas Day (substitute day)".
   */
  removeHolidays?: string[]
}

export interface NonBusinessDayOptions extends HolidayOptions {
  /** Keep only the first N dates of the year. */
  firstN?: number
  /** Keep only the last N dates of the year (combined with firstN when both are set). */
  lastN?: number
}

/** Holidays a region's calendar still lists but courts no longer close for. */
const OBSOLETE_HOLIDAYS: Record<string, string[]> = {
  'US-MA': ['Evacuation Day'],
}

const MONTH_DAY = /^(\d{2})-(\d{2})$/

function sortByDate(days: Map<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {}
  for (const key of [...days.keys()].sort()) {
    const name = days.get(key)
    if (name !== undefined) sorted[key] = name
  }
  return sorted
}

const holidayCache = new Map<string, Record<string, string>>()

/**
 * Public holidays for one year as a fresh ISO-date → name record, sorted by date.
 * An observed day can fall in the neighbouring year (New Year's Day on a
 * Saturday is observed on Friday, December 31) and is kept.
 */
export function standardHolidays(year: number, options: HolidayOptions = {}): Record<string, string> {
  const config = getConfig()
  const country = options.country ?? config.holidayCountry
  const subdivision = options.subdivision ?? config.holidaySubdivision
  const cacheKey = JSON.stringify([year, country, subdivision, options.addHolidays ?? {}, options.removeHolidays ?? []])
  const cached = holidayCache.get(cacheKey)
  if (cached) return { ...cached }

  const calendar = subdivision ? new Holidays(country, subdivision) : new Holidays(country)
  const removed = [
    ...(OBSOLETE_HOLIDAYS[`${country}-${subdivision}`] ?? []),
    ...(options.removeHolidays ?? []),
  ]

  const days = new Map<string, string>()
  for (const holiday of calendar.getHolidays(year) || []) {
    if (holiday.type !== 'public') continue
    if (removed.some((name) => holiday.name.includes(name))) continue
    const day = holiday.date.slice(0, 10)
    if (!days.has(day)) days.set(day, holiday.name)
  }

  for (const [monthDay, name] of Object.entries(options.addHolidays ?? {})) {
    const match = MONTH_DAY.exec(monthDay)
    if (!match) {
      throw new InvalidInputError(`Added holiday keys must look like "MM-DD", got ${JSON.stringify(monthDay)}`, monthDay)
    }
    days.set(isoDate(`${year}-${monthDay}`), name)
  }

  const result = sortByDate(days)
  holidayCache.set(cacheKey, result)
  log.debug('Loaded holidays', { year, country, subdivision, count: Object.keys(result).length })
  return { ...result }
}

/**
 * Weekends and public holidays of a year as an ISO-date → name record,
 * sorted by date. Weekend days that are also holidays keep the holiday name.
 */
export function nonBusinessDays(year: number, options: NonBusinessDayOptions = {}): Record<string, string> {
  const prefix = String(year)
  const days = new Map(
    Object.entries(standardHolidays(year, options)).filter(([day]) => day.startsWith(prefix)),
  )

  for (let day = `${prefix}-01-01`; day.startsWith(prefix); day = addDays(day, 1)) {
    const weekday = dayOfWeek(day)
    if (weekday === 6 && !days.has(day)) days.set(day, 'Saturday')
    if (weekday === 0 && !days.has(day)) days.set(day, 'Sunday')
  }

  const all = Object.entries(sortByDate(days))
  const firstN = options.firstN ?? 0
  const lastN = options.lastN ?? 0
  let kept = all
  if (firstN > 0 && lastN > 0) {
    kept = [...all.slice(0, firstN), ...all.slice(Math.max(all.length - lastN, firstN))]
  } else if (firstN > 0) {
    kept = all.slice(0, firstN)
  } else if (lastN > 0) {
    kept = all.slice(-lastN)
  }
  return Object.fromEntries(kept)
}

export function isBusinessDay(date: DateInput, options: HolidayOptions = {}): boolean {
  const day = isoDate(date)
  const weekday = dayOfWeek(day)
  if (weekday === 0 || weekday === 6) return false
  const { year } = parseDate(day)
  return !(day in standardHolidays(year, options) || day in standardHolidays(year + 1, options))
}

/**
 * The date `waitDays` calendar days after `start`, pushed forward to the
 * next business day when it lands on a weekend or holiday.
 */
export function nextBusinessDay(start: DateInput, waitDays = 1, options: HolidayOptions = {}): string {
  let day = addDays(start, waitDays)
  while (!isBusinessDay(day, options)) {
    day = addDays(day, 1)
  }
  return day
}

/**
 * Count `n` business days from `start` (exclusive). A negative `n` counts
 * backwards. `n = 0` returns `start` unchanged.
 *
 *   dateAfterNBusinessDays('2022-12-12', 3) → '2022-12-15'
 */
export function dateAfterNBusinessDays(start: DateInput, n: number, options: HolidayOptions = {}): string {
  if (!Number.isInteger(n)) {
    throw new InvalidInputError('Number of business days must be a whole number', n)
  }
  const step = n < 0 ? -1 : 1
  let remaining = Math.abs(n)
  let day = isoDate(start)
  while (remaining > 0) {
    day = addDays(day, step)
    if (isBusinessDay(day, options)) remaining -= 1
  }
  return day
}

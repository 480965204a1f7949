/**
 * Calendar-date helpers. Dates travel as ISO "YYYY-MM-DD" strings; the
 * arithmetic runs in UTC so no time zone can move a date by a day.
 */

import { InvalidInputError } from '../utils/errors.ts'

export interface CalendarDate {
  year: number
  month: number   // 1–12
  day: number
}

export type DateInput = string | Date

const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/

/** Midnight UTC on a calendar day; `Date.UTC` alone reads years 0–99 as 1900–1999. */
function utcDate(year: number, monthIndex: number, day: number): Date {
  const d = new Date(Date.UTC(2000, monthIndex, day))
  d.setUTCFullYear(year, monthIndex, day)
  return d
}

export function daysInMonth(year: number, month: number): number {
  return utcDate(year, month, 0).getUTCDate()
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) && Number.isInteger(month) && Number.isInteger(day) &&
    month >= 1 && month <= 12 &&
    day >= 1 && day <= daysInMonth(year, month)
  )
}

/**
 * Read "YYYY-MM-DD", "M/D/YYYY" or a Date (its local calendar day).
 * Throws InvalidInputError for anything else, including Feb 30.
 */
export function parseDate(input: DateInput): CalendarDate {
  if (input instanceof Date) {
    if (isNaN(input.getTime())) throw new InvalidInputError('Invalid Date', input)
    return { year: input.getFullYear(), month: input.getMonth() + 1, day: input.getDate() }
  }
  const trimmed = input.trim()
  let parts: CalendarDate | null = null
  const iso = ISO_PATTERN.exec(trimmed)
  if (iso) {
    parts = { year: Number(iso[1]), month: Number(iso[2]), day: Number(iso[3]) }
  } else {
    const us = US_PATTERN.exec(trimmed)
    if (us) parts = { year: Number(us[3]), month: Number(us[1]), day: Number(us[2]) }
  }
  if (!parts || !isValidCalendarDate(parts.year, parts.month, parts.day)) {
    throw new InvalidInputError(`${JSON.stringify(input)} is not a valid date`, input)
  }
  return parts
}

const pad2 = (n: number) => String(n).padStart(2, '0')

export function toIsoDate(date: CalendarDate): string {
  return `${String(date.year).padStart(4, '0')}-${pad2(date.month)}-${pad2(date.day)}`
}

export function toUsDate(date: CalendarDate): string {
  return `${pad2(date.month)}/${pad2(date.day)}/${date.year}`
}

/** Normalize any accepted input to "YYYY-MM-DD". */
export function isoDate(input: DateInput): string {
  return toIsoDate(parseDate(input))
}

function toUtc(date: CalendarDate): Date {
  return utcDate(date.year, date.month - 1, date.day)
}

export function addDays(input: DateInput, days: number): string {
  const d = toUtc(parseDate(input))
  d.setUTCDate(d.getUTCDate() + days)
  return toIsoDate({ year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() })
}

/** 0 = Sunday … 6 = Saturday */
export function dayOfWeek(input: DateInput): number {
  return toUtc(parseDate(input)).getUTCDay()
}

export function todayIso(now: Date = new Date()): string {
  return isoDate(now)
}

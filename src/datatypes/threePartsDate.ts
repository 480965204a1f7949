/**
 * Dates typed as three separate parts: a month, a day and a year.
 *
 * The widget composes the parts into "M/D/YYYY"; an empty part leaves an
 * empty slot ("/12/2020"), which lets the messages say exactly what is
 * missing.
 */

import { getConfig } from '../config.ts'
import { isValidCalendarDate, parseDate, toIsoDate, toUsDate, todayIso } from '../calendar/isoDate.ts'
import type { CalendarDate } from '../calendar/isoDate.ts'
import { InvalidInputError, ValidationError } from '../utils/errors.ts'
import { logger } from '../utils/logger.ts'
import type { CustomDataType, DataTypeParams } from './types.ts'

const log = logger.child({ module: 'threePartsDate' })

const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/

/**
 * Names the missing parts of a partly filled "M/D/YYYY" value, or returns
 * `null` when every part is present.
 */
export function checkEmptyParts(item: string, defaultMessage = '{item} is not a valid date'): string | null {
  const parts = item.split('/')
  if (parts.length !== 3) return defaultMessage.replace('{item}', item)
  const [month, day, year] = parts.map((part) => part.trim() === '')
  const emptyCount = [month, day, year].filter(Boolean).length
  if (emptyCount === 0) return null
  if (emptyCount === 3) return 'Enter a month, a day, and a year'
  if (emptyCount === 2) {
    if (!month) return 'Enter a day and a year'
    if (!day) return 'Enter a month and a year'
    return 'Enter a month and a day'
  }
  if (month) return 'Enter a month'
  if (day) return 'Enter a day'
  return 'Enter a year'
}

function longDate(date: CalendarDate): string {
  return new Date(Date.UTC(date.year, date.month - 1, date.day)).toLocaleDateString(getConfig().locale, {
    day: '2-digit',
    month: 'long',
    year: 'numeric',
    timeZone: 'UTC',
  })
}

/** A min/max setting as an ISO date, or undefined when it is missing or unreadable. */
function boundary(value: string | undefined, setting: string): string | undefined {
  if (!value) return undefined
  try {
    return toIsoDate(parseDate(value))
  } catch (err) {
    if (!(err instanceof InvalidInputError)) throw err
    log.warn(`The ${setting} setting isn't a valid date`, { value })
    return undefined
  }
}

interface DateRules {
  invalidMessage: string
  /** Used as the latest date when no `max` is given. */
  implicitMax?: (params: DataTypeParams) => string
  implicitMaxMessage?: (item: string) => string
}

function validateDate(item: string, params: DataTypeParams, rules: DateRules): void {
  if (item === '') return
  const match = DATE_PATTERN.exec(item)
  if (!match) {
    const message = checkEmptyParts(item, rules.invalidMessage) ?? rules.invalidMessage.replace('{item}', item)
    throw new ValidationError(params.defaultMessage ?? message)
  }

  const date = { year: Number(match[3]), month: Number(match[1]), day: Number(match[2]) }
  if (!isValidCalendarDate(date.year, date.month, date.day)) {
    throw new ValidationError(
      params.invalidDayMessage ?? params.defaultMessage ?? rules.invalidMessage.replace('{item}', item),
    )
  }
  const { dateMinYear } = getConfig()
  if (date.year < dateMinYear) {
    throw new ValidationError(
      params.invalidYearMessage ?? params.defaultMessage ?? `The year needs to be ${dateMinYear} or later.`,
    )
  }

  const iso = toIsoDate(date)
  const min = boundary(params.min, 'min')
  if (min !== undefined && iso < min) {
    throw new ValidationError(
      params.minMessage ?? params.defaultMessage ?? `The date needs to be on or after ${longDate(parseDate(min))}.`,
    )
  }
  const max = boundary(params.max, 'max')
  if (max !== undefined) {
    if (iso > max) {
      throw new ValidationError(
        params.maxMessage ?? params.defaultMessage ?? `The date needs to be on or before ${longDate(parseDate(max))}.`,
      )
    }
  } else if (rules.implicitMax && iso > rules.implicitMax(params)) {
    const fallback = rules.implicitMaxMessage ? rules.implicitMaxMessage(item) : rules.invalidMessage.replace('{item}', item)
    throw new ValidationError(params.maxMessage ?? params.defaultMessage ?? fallback)
  }
}

function transformDate(item: string): string | undefined {
  if (!item) return undefined
  return toIsoDate(parseDate(item))
}

function dateDefault(value: string | undefined): string {
  if (!value) return ''
  return toUsDate(parseDate(value))
}

export const ThreePartsDate: CustomDataType<string> = {
  name: 'ThreePartsDate',
  inputClass: 'ThreePartsDate',
  message: 'Answer with a valid date',
  validate(raw, params = {}) {
    validateDate(raw, params, { invalidMessage: '{item} is not a valid date' })
  },
  transform: transformDate,
  defaultFor: dateDefault,
}

/** A ThreePartsDate that cannot be later than today. */
export const BirthDate: CustomDataType<string> = {
  name: 'BirthDate',
  inputClass: 'BirthDate',
  message: 'Answer with a valid date of birth',
  validate(raw, params = {}) {
    validateDate(raw, params, {
      invalidMessage: '{item} is not a valid date of birth',
      implicitMax: (p) => (p.today === undefined ? todayIso() : toIsoDate(parseDate(p.today))),
      implicitMaxMessage: (item) => `Answer with a date of birth (${item} is in the future)`,
    })
  },
  transform: transformDate,
  defaultFor: dateDefault,
}

/**
 * Itemized jobs: pay stubs reported line by line.
 *
 * Each line uses its own frequency when it has one and the job's otherwise.
 * A line is hourly only when both the job and the line are hourly; the
 * job's `hoursPerPeriod` then applies. Subtractive lines are positive
 * numbers that come off the gross.
 */

import type { ItemizedJob, ItemizedValue } from '../model/types.ts'
import { perFrequency } from '../model/money.ts'
import { sourcePredicate } from './sources.ts'
import type { SourceFilter } from './sources.ts'
import { ValidationError } from '../utils/errors.ts'

export interface ItemFilter {
  source?: SourceFilter
  excludeSource?: SourceFilter
}

/** A line's raw per-period value; 0 when the user said they do not have it. */
export function itemizedValueTotal(item: ItemizedValue): number {
  if (item.value === undefined || item.exists === false) return 0
  return item.value
}

/** Sum of the lines' raw values, skipping lines that do not exist. */
export function itemizedValuesTotal(items: readonly ItemizedValue[]): number {
  return items.reduce((sum, item) => sum + itemizedValueTotal(item), 0)
}

/** Drop lines the user said they do not have. */
export function removeNonexistentItems(items: readonly ItemizedValue[]): ItemizedValue[] {
  return items.filter((item) => item.exists !== false)
}

export function itemValuePerFrequency(job: ItemizedJob, item: ItemizedValue, timesPerYear = 1): number {
  if (timesPerYear === 0) return 0
  const frequency = item.timesPerYear || job.timesPerYear
  const value = itemizedValueTotal(item)
  if (job.isHourly && item.isHourly) {
    if (job.hoursPerPeriod === undefined || !Number.isFinite(job.hoursPerPeriod)) {
      throw new ValidationError('Your hours per period need to be just a single number, without words')
    }
    return perFrequency(value * job.hoursPerPeriod, frequency, timesPerYear)
  }
  return perFrequency(value, frequency, timesPerYear)
}

function sumLines(job: ItemizedJob, lines: readonly ItemizedValue[], timesPerYear: number, filter: ItemFilter): number {
  if (timesPerYear === 0) return 0
  const keep = sourcePredicate(filter.source, filter.excludeSource)
  let total = 0
  for (const item of lines) {
    if (keep(item.source)) total += itemValuePerFrequency(job, item, timesPerYear)
  }
  return total
}

/** Money coming in (wages, tips, bonuses). Deduction sources in the filter are ignored. */
export function itemizedGrossTotal(job: ItemizedJob, timesPerYear = 1, filter: ItemFilter = {}): number {
  return sumLines(job, job.toAdd, timesPerYear, filter)
}

/** Money going out (taxes, dues, insurance) as a positive number. */
export function itemizedDeductionTotal(job: ItemizedJob, timesPerYear = 1, filter: ItemFilter = {}): number {
  return sumLines(job, job.toSubtract, timesPerYear, filter)
}

export function itemizedNetTotal(job: ItemizedJob, timesPerYear = 1, filter: ItemFilter = {}): number {
  return itemizedGrossTotal(job, timesPerYear, filter) - itemizedDeductionTotal(job, timesPerYear, filter)
}

/** Hours worked over the target frequency. */
export function itemizedNormalizedHours(job: ItemizedJob, timesPerYear = 1): number {
  if (timesPerYear === 0) return 0
  if (job.hoursPerPeriod === undefined) {
    throw new ValidationError('Your hours per period need to be just a single number, without words')
  }
  return (job.hoursPerPeriod * job.timesPerYear) / timesPerYear
}

/** '[["federal taxes","2500.00"],["wages","15.50"]]' style listing of raw line values. */
export function describeItems(items: readonly ItemizedValue[]): string {
  return JSON.stringify(
    items.map((item) => [item.source, ((item.value ?? 0) / 100).toFixed(2)]),
    null,
    2,
  )
}

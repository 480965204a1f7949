/**
 * Per-record arithmetic: turn one income, job, asset or ledger line into a
 * total for the frequency a form asks about.
 *
 * `timesPerYear` arguments are the target frequency: 1 for a yearly figure,
 * 12 for monthly, 52 for weekly. Results are integer cents.
 */

import type { Asset, Employer, Income, Job, PeriodicAmount, SimpleValue, Vehicle } from '../model/types.ts'
import { perFrequency } from '../model/money.ts'
import { ValidationError } from '../utils/errors.ts'

export function periodicTotal(item: PeriodicAmount, timesPerYear = 1): number {
  return perFrequency(item.value, item.timesPerYear, timesPerYear)
}

function requireHours(hoursPerPeriod: number | undefined): number {
  if (hoursPerPeriod === undefined || !Number.isFinite(hoursPerPeriod)) {
    throw new ValidationError('Your hours per period need to be just a single number, without words')
  }
  return hoursPerPeriod
}

/**
 * An income over the target frequency. Hourly incomes multiply the rate by
 * the hours worked each period:
 *
 *   $10/hour, 40 hours a week → incomeTotal(inc, 1) = 2080000, incomeTotal(inc, 52) = 40000
 */
export function incomeTotal(income: Income, timesPerYear = 1): number {
  if (income.isHourly) {
    const hours = requireHours(income.hoursPerPeriod)
    return perFrequency(income.value * hours, income.timesPerYear, timesPerYear)
  }
  return periodicTotal(income, timesPerYear)
}

// ── Jobs ───────────────────────────────────────────────────────

export function jobGrossTotal(job: Job, timesPerYear = 1): number {
  return incomeTotal(job, timesPerYear)
}

/** Deductions are per pay period, never per hour. */
export function jobDeductions(job: Job, timesPerYear = 1): number {
  return perFrequency(job.deduction ?? 0, job.timesPerYear, timesPerYear)
}

export function jobNetTotal(job: Job, timesPerYear = 1): number {
  return jobGrossTotal(job, timesPerYear) - jobDeductions(job, timesPerYear)
}

/** Hours worked over the target frequency: 10 hours a week → 520 a year. */
export function normalizedHours(
  job: Pick<Job, 'hoursPerPeriod' | 'timesPerYear'>,
  timesPerYear = 1,
): number {
  if (timesPerYear === 0) return 0
  return (requireHours(job.hoursPerPeriod) * job.timesPerYear) / timesPerYear
}

/**
 * "Name: address, phone", leaving out whichever parts are missing.
 *
 *   employerSummary({ name: 'Acme', phone: '555-0100' }) → "Acme: 555-0100"
 */
export function employerSummary(employer: Employer): string {
  const details = [employer.address, employer.phone].filter((part): part is string => !!part)
  if (details.length === 0) return employer.name
  return `${employer.name}: ${details.join(', ')}`
}

// ── Assets ─────────────────────────────────────────────────────

/** Income the asset earns; assets without an income value earn 0. */
export function assetTotal(asset: Asset, timesPerYear = 1): number {
  if (asset.value === undefined) return 0
  return incomeTotal(
    { ...asset, value: asset.value, timesPerYear: asset.timesPerYear ?? 1 },
    timesPerYear,
  )
}

/** Market value minus what is owed on the asset. */
export function assetEquity(asset: Asset): number {
  return asset.balance === undefined ? asset.marketValue : asset.marketValue - asset.balance
}

/** "2020 / Toyota / Camry" */
export function yearMakeModel(vehicle: Pick<Vehicle, 'year' | 'make' | 'model'>, separator = ' / '): string {
  return [vehicle.year, vehicle.make, vehicle.model].map(String).join(separator)
}

// ── Ledger ─────────────────────────────────────────────────────

/** A ledger line's signed value: expenses count against the total. */
export function simpleValueTotal(item: SimpleValue): number {
  return item.transactionType === 'expense' ? -item.value : item.value
}

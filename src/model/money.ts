/**
 * Money helpers. Every amount in a financial statement is stored in
 * integer cents so sums never pick up floating-point noise.
 */

import { getConfig } from '../config.ts'
import { InvalidInputError } from '../utils/errors.ts'

/**
 * Convert a dollar amount to integer cents.
 * Rounds to nearest cent to handle floating-point imprecision.
 *
 *   cents(100.10) → 10010
 *   cents(0)      → 0
 *   cents(-50.5)  → -5050
 */
export function cents(dollars: number): number {
  return Math.round(dollars * 100)
}

/**
 * Convert integer cents back to dollars for display.
 *
 *   dollars(10010)  → 100.10
 *   dollars(-5050)  → -50.50
 */
export function dollars(amountInCents: number): number {
  return amountInCents / 100
}

/**
 * Scale a per-period amount to another frequency and round to the cent.
 *
 *   perFrequency(50000, 26, 12) → 108333   ($500 every two weeks, per month)
 *
 * A target frequency of 0 yields 0.
 */
export function perFrequency(amountInCents: number, timesPerYear: number, targetTimesPerYear: number): number {
  if (targetTimesPerYear === 0) return 0
  return Math.round((amountInCents * timesPerYear) / targetTimesPerYear)
}

export interface CurrencyOptions {
  /** Fraction digits to show. Defaults to 2. */
  decimals?: number
  currency?: string
  locale?: string
}

/**
 * Format cents as currency text in the configured locale.
 *
 *   currency(108333)                 → "$1,083.33"
 *   currency(108333, { decimals: 0 }) → "$1,083"
 */
export function currency(amountInCents: number, options: CurrencyOptions = {}): string {
  if (!Number.isFinite(amountInCents)) {
    throw new InvalidInputError('Amount must be a finite number of cents', amountInCents)
  }
  const config = getConfig()
  const decimals = options.decimals ?? 2
  return dollars(amountInCents).toLocaleString(options.locale ?? config.locale, {
    style: 'currency',
    currency: options.currency ?? config.currency,
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
  })
}

/**
 * Parse user-typed money text ("$1,200.50", "1200") into cents.
 * Blank input is 0.
 */
export function parseToCents(raw: string): number {
  const cleaned = raw.replace(/[^0-9.]/g, '')
  if (cleaned === '' || cleaned === '.') return 0
  const parsed = parseFloat(cleaned)
  if (isNaN(parsed)) return 0
  return cents(parsed)
}

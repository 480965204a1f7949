/**
 * Financial statement records collected by the income, asset and expense
 * interview steps.
 *
 * Conventions:
 *  - Monetary amounts are integer cents.
 *  - `timesPerYear` is how often the amount recurs: 52 weekly, 26 every two
 *    weeks, 12 monthly, 1 yearly. Fractions are allowed (0.5 = every two years).
 *  - `source` is a machine key ("wages", "real estate"); `displayName` is the
 *    text shown back to the user.
 */

// ── Periodic amounts ───────────────────────────────────────────

export interface PeriodicAmount {
  id: string
  source: string
  displayName?: string
  value: number            // cents per period
  timesPerYear: number
  /** Full name of the person the amount belongs to. */
  owner?: string
  /** Set once every question about the record has been answered. */
  complete?: boolean
}

export interface Income extends PeriodicAmount {
  isHourly?: boolean
  /** Hours worked each period. Required when `isHourly`. */
  hoursPerPeriod?: number
  /** Checklist key that created the record ("other" for a write-in source). */
  checklistSource?: string
}

export type Expense = PeriodicAmount

// ── Jobs ───────────────────────────────────────────────────────

export interface Employer {
  name: string
  address?: string
  phone?: string
}

/**
 * A job reported as gross pay plus one deduction figure per period.
 * For hourly jobs `value` is the hourly rate; `deduction` stays per period.
 */
export interface Job extends Income {
  employer: Employer
  deduction?: number       // cents per period
  isSelfEmployed?: boolean
}

/** A line on a pay stub: wages, tips, union dues, taxes. */
export interface ItemizedValue {
  source: string
  displayName?: string
  value?: number           // cents per period (or per hour when hourly)
  /** False means the user said they do not have this line. */
  exists?: boolean
  isHourly?: boolean
  /** Overrides the job's frequency for this line only. */
  timesPerYear?: number
}

/**
 * A job broken into additive lines (`toAdd`) and subtractive lines
 * (`toSubtract`). Subtractive values are stored as positive numbers.
 */
export interface ItemizedJob {
  id: string
  source: string
  owner?: string
  employer: Employer
  timesPerYear: number
  isHourly?: boolean
  hoursPerPeriod?: number
  toAdd: ItemizedValue[]
  toSubtract: ItemizedValue[]
  complete?: boolean
}

// ── Assets ─────────────────────────────────────────────────────

/**
 * Something the person owns. `value`/`timesPerYear` describe income the
 * asset earns (interest, rent) and may be absent.
 */
export interface Asset extends Omit<Income, 'value' | 'timesPerYear'> {
  value?: number
  timesPerYear?: number
  marketValue: number
  /** Account balance, or the loan owed against the asset. */
  balance?: number
}

export interface Vehicle extends Asset {
  year: number | string
  make: string
  model: string
}

// ── Ledger ─────────────────────────────────────────────────────

export type TransactionType = 'income' | 'expense'

/** A single signed ledger line. */
export interface SimpleValue {
  id: string
  source: string
  value: number            // cents, entered as a positive number
  transactionType?: TransactionType
}

// ── Financial statement ────────────────────────────────────────

/** The record lists of a statement, keyed by list name. */
export interface StatementRecordMap {
  incomes: Income
  jobs: Job
  itemizedJobs: ItemizedJob
  assets: Asset
  vehicles: Vehicle
  expenses: Expense
  ledger: SimpleValue
}

export type StatementRecordKind = keyof StatementRecordMap

export type StatementRecordLists = { [K in StatementRecordKind]: StatementRecordMap[K][] }

export interface FinancialStatement extends StatementRecordLists {
  /** Income sources ticked on the checklist screen. */
  selectedIncomeSources: string[]
}

export function emptyFinancialStatement(): FinancialStatement {
  return {
    selectedIncomeSources: [],
    incomes: [],
    jobs: [],
    itemizedJobs: [],
    assets: [],
    vehicles: [],
    expenses: [],
    ledger: [],
  }
}

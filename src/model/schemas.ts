/**
 * Zod runtime validation schemas — mirrors the TypeScript types in types.ts.
 *
 * Used when a saved statement is imported or rehydrated from IndexedDB.
 *
 * Conventions:
 *  - Monetary amounts are in integer cents (non-negative unless noted).
 *  - Frequencies are positive numbers of times per year.
 */

import { z } from 'zod'
import type { FinancialStatement } from './types.ts'

// ── Reusable validators ──────────────────────────────────────────

/** Non-negative integer (cents). */
export const centsNonNeg = z.number().int().min(0, 'Amount must be non-negative')

/** Positive number of occurrences per year. */
export const timesPerYearSchema = z.number().positive('Times per year must be greater than 0')

export const employerSchema = z.object({
  name: z.string(),
  address: z.string().optional(),
  phone: z.string().optional(),
})

// ── Periodic amounts ─────────────────────────────────────────────

const periodicFields = {
  id: z.string().min(1),
  source: z.string(),
  displayName: z.string().optional(),
  owner: z.string().optional(),
  complete: z.boolean().optional(),
}

export const incomeSchema = z
  .object({
    ...periodicFields,
    value: centsNonNeg,
    timesPerYear: timesPerYearSchema,
    isHourly: z.boolean().optional(),
    hoursPerPeriod: z.number().min(0).optional(),
    checklistSource: z.string().optional(),
  })
  .refine((inc) => !inc.isHourly || inc.hoursPerPeriod !== undefined, {
    message: 'Hourly income needs hours per period',
    path: ['hoursPerPeriod'],
  })

export const expenseSchema = z.object({
  ...periodicFields,
  value: centsNonNeg,
  timesPerYear: timesPerYearSchema,
})

export const jobSchema = z
  .object({
    ...periodicFields,
    value: centsNonNeg,
    timesPerYear: timesPerYearSchema,
    isHourly: z.boolean().optional(),
    hoursPerPeriod: z.number().min(0).optional(),
    employer: employerSchema,
    deduction: centsNonNeg.optional(),
    isSelfEmployed: z.boolean().optional(),
  })
  .refine((job) => !job.isHourly || job.hoursPerPeriod !== undefined, {
    message: 'Hourly job needs hours per period',
    path: ['hoursPerPeriod'],
  })

// ── Itemized jobs ────────────────────────────────────────────────

export const itemizedValueSchema = z.object({
  source: z.string().min(1),
  displayName: z.string().optional(),
  value: centsNonNeg.optional(),
  exists: z.boolean().optional(),
  isHourly: z.boolean().optional(),
  timesPerYear: timesPerYearSchema.optional(),
})

export const itemizedJobSchema = z.object({
  id: z.string().min(1),
  source: z.string(),
  owner: z.string().optional(),
  employer: employerSchema,
  timesPerYear: timesPerYearSchema,
  isHourly: z.boolean().optional(),
  hoursPerPeriod: z.number().min(0).optional(),
  toAdd: z.array(itemizedValueSchema),
  toSubtract: z.array(itemizedValueSchema),
  complete: z.boolean().optional(),
})

// ── Assets ───────────────────────────────────────────────────────

const assetFields = {
  ...periodicFields,
  value: centsNonNeg.optional(),
  timesPerYear: timesPerYearSchema.optional(),
  isHourly: z.boolean().optional(),
  hoursPerPeriod: z.number().min(0).optional(),
  marketValue: centsNonNeg,
  balance: centsNonNeg.optional(),
}

export const assetSchema = z.object(assetFields)

export const vehicleSchema = z.object({
  ...assetFields,
  year: z.union([z.number().int(), z.string()]),
  make: z.string(),
  model: z.string(),
})

// ── Ledger ───────────────────────────────────────────────────────

export const simpleValueSchema = z.object({
  id: z.string().min(1),
  source: z.string(),
  value: centsNonNeg,
  transactionType: z.enum(['income', 'expense']).optional(),
})

// ── Statement ────────────────────────────────────────────────────

export const financialStatementSchema = z.object({
  selectedIncomeSources: z.array(z.string()),
  incomes: z.array(incomeSchema),
  jobs: z.array(jobSchema),
  itemizedJobs: z.array(itemizedJobSchema),
  assets: z.array(assetSchema),
  vehicles: z.array(vehicleSchema),
  expenses: z.array(expenseSchema),
  ledger: z.array(simpleValueSchema),
}) satisfies z.ZodType<FinancialStatement>

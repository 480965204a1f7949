/**
 * Totals over lists of records.
 *
 * Every total takes the same filter: `source` and `excludeSource` narrow by
 * the record's source key (see `sourcePredicate`), `owner` keeps only records
 * belonging to the named people, and `timesPerYear` is the target frequency.
 * A target frequency of 0 gives 0.
 */

import type {
  Asset,
  Income,
  ItemizedJob,
  ItemizedValue,
  Job,
  PeriodicAmount,
  SimpleValue,
} from '../model/types.ts'
import { ownerPredicate, sourcePredicate } from './sources.ts'
import type { SourceFilter } from './sources.ts'
import { assetEquity, assetTotal, incomeTotal, jobDeductions, jobGrossTotal, jobNetTotal, periodicTotal, simpleValueTotal } from './periodic.ts'
import { itemizedDeductionTotal, itemizedGrossTotal, itemizedNetTotal } from './itemized.ts'
import type { ItemFilter } from './itemized.ts'
import { termLabel } from './terms.ts'
import type { Terms } from './terms.ts'

export interface ListFilter {
  timesPerYear?: number
  source?: SourceFilter
  excludeSource?: SourceFilter
  owner?: SourceFilter
}

interface Sourced {
  source: string
  owner?: string
}

// ── Generic helpers ────────────────────────────────────────────

/** Distinct source keys in list order. */
export function sources(items: readonly { source: string }[]): Set<string> {
  return new Set(items.map((item) => item.source))
}

/** Distinct owners of the records that pass the source filter. */
export function owners<T extends Sourced>(
  items: readonly T[],
  source?: SourceFilter,
  excludeSource?: SourceFilter,
): Set<string> {
  const result = new Set<string>()
  for (const item of matches(items, source, excludeSource)) {
    if (item.owner) result.add(item.owner)
  }
  return result
}

export function matches<T extends { source: string }>(
  items: readonly T[],
  source?: SourceFilter,
  excludeSource?: SourceFilter,
): T[] {
  const keep = sourcePredicate(source, excludeSource)
  return items.filter((item) => keep(item.source))
}

function filtered<T extends Sourced>(items: readonly T[], filter: ListFilter): T[] {
  const keepOwner = ownerPredicate(filter.owner)
  return matches(items, filter.source, filter.excludeSource).filter((item) => keepOwner(item.owner))
}

/** Sum `totalFn` over the records that pass the filter. */
export function listTotal<T extends Sourced>(
  items: readonly T[],
  filter: ListFilter,
  totalFn: (item: T, timesPerYear: number) => number,
): number {
  const timesPerYear = filter.timesPerYear ?? 1
  if (timesPerYear === 0) return 0
  return filtered(items, filter).reduce((sum, item) => sum + totalFn(item, timesPerYear), 0)
}

// ── Incomes and expenses ───────────────────────────────────────

/**
 * Total of an income list.
 *
 *   incomeListTotal([{ value: 50000, timesPerYear: 26, … }], { timesPerYear: 12 }) → 108333
 */
export function incomeListTotal(items: readonly Income[], filter: ListFilter = {}): number {
  return listTotal(items, filter, incomeTotal)
}

export function expenseListTotal(items: readonly PeriodicAmount[], filter: ListFilter = {}): number {
  return listTotal(items, filter, periodicTotal)
}

// ── Jobs ───────────────────────────────────────────────────────

export function jobListGross(jobs: readonly Job[], filter: ListFilter = {}): number {
  return listTotal(jobs, filter, jobGrossTotal)
}

export function jobListDeductions(jobs: readonly Job[], filter: ListFilter = {}): number {
  return listTotal(jobs, filter, jobDeductions)
}

export function jobListNet(jobs: readonly Job[], filter: ListFilter = {}): number {
  return listTotal(jobs, filter, jobNetTotal)
}

// ── Assets ─────────────────────────────────────────────────────

/** Income earned by the assets that pass the filter. */
export function assetListTotal(assets: readonly Asset[], filter: ListFilter = {}): number {
  return listTotal(assets, filter, assetTotal)
}

export function assetListMarketValue(assets: readonly Asset[], filter: Omit<ListFilter, 'timesPerYear'> = {}): number {
  return listTotal(assets, filter, (asset) => asset.marketValue)
}

export function assetListBalance(assets: readonly Asset[], filter: Omit<ListFilter, 'timesPerYear'> = {}): number {
  return listTotal(assets, filter, (asset) => asset.balance ?? 0)
}

export function assetListEquity(assets: readonly Asset[], filter: Omit<ListFilter, 'timesPerYear'> = {}): number {
  return listTotal(assets, filter, assetEquity)
}

// ── Itemized jobs ──────────────────────────────────────────────

export type ItemizedSourceKind = 'all' | 'incomes' | 'deductions'

/** Source keys of the lines across every job, optionally only one side. */
export function itemizedJobListSources(jobs: readonly ItemizedJob[], which: ItemizedSourceKind = 'all'): Set<string> {
  const result = new Set<string>()
  const add = (items: readonly ItemizedValue[]) => {
    for (const item of items) result.add(item.source)
  }
  for (const job of jobs) {
    if (which !== 'deductions') add(job.toAdd)
    if (which !== 'incomes') add(job.toSubtract)
  }
  return result
}

interface ItemizedListFilter extends ItemFilter {
  timesPerYear?: number
  owner?: SourceFilter
}

function sumItemized(
  jobs: readonly ItemizedJob[],
  filter: ItemizedListFilter,
  totalFn: (job: ItemizedJob, timesPerYear: number, itemFilter: ItemFilter) => number,
): number {
  const timesPerYear = filter.timesPerYear ?? 1
  if (timesPerYear === 0) return 0
  const keepOwner = ownerPredicate(filter.owner)
  const itemFilter = { source: filter.source, excludeSource: filter.excludeSource }
  return jobs
    .filter((job) => keepOwner(job.owner))
    .reduce((sum, job) => sum + totalFn(job, timesPerYear, itemFilter), 0)
}

/** `source` and `excludeSource` filter the pay stub lines, not the jobs. */
export function itemizedJobListGross(jobs: readonly ItemizedJob[], filter: ItemizedListFilter = {}): number {
  return sumItemized(jobs, filter, itemizedGrossTotal)
}

export function itemizedJobListDeductions(jobs: readonly ItemizedJob[], filter: ItemizedListFilter = {}): number {
  return sumItemized(jobs, filter, itemizedDeductionTotal)
}

export function itemizedJobListNet(jobs: readonly ItemizedJob[], filter: ItemizedListFilter = {}): number {
  return sumItemized(jobs, filter, itemizedNetTotal)
}

// ── Ledger ─────────────────────────────────────────────────────

/** Signed sum of the ledger lines; expense lines subtract. */
export function ledgerTotal(
  items: readonly SimpleValue[],
  source?: SourceFilter,
  excludeSource?: SourceFilter,
): number {
  return matches(items, source, excludeSource).reduce((sum, item) => sum + simpleValueTotal(item), 0)
}

export const ledgerSources = sources

// ── Checklists ─────────────────────────────────────────────────

/**
 * Turn the sources ticked on a checklist into blank income records, each
 * remembering the key that created it. "other" becomes a record with an
 * empty source so the user can name it. Keys missing from `terms` keep the
 * key as their label.
 */
export function moveChecksToList(
  selected: readonly string[],
  terms: Terms,
  makeId: () => string,
): Income[] {
  return selected.map((source) =>
    source === 'other'
      ? { id: makeId(), source: '', value: 0, timesPerYear: 12, checklistSource: source }
      : { id: makeId(), source, displayName: termLabel(terms, source), value: 0, timesPerYear: 12, checklistSource: source },
  )
}

import type { ComponentType } from 'react'
import type { FinancialStatement } from '../model/types.ts'
import { NON_WAGE_INCOME_TERMS } from '../income/terms.ts'
import { WelcomePage } from '../ui/pages/WelcomePage.tsx'
import { IncomeSourcesPage } from '../ui/pages/IncomeSourcesPage.tsx'
import { JobsPage } from '../ui/pages/JobsPage.tsx'
import { ItemizedJobsPage } from '../ui/pages/ItemizedJobsPage.tsx'
import { IncomesPage } from '../ui/pages/IncomesPage.tsx'
import { AssetsPage } from '../ui/pages/AssetsPage.tsx'
import { ExpensesPage } from '../ui/pages/ExpensesPage.tsx'
import { SummaryPage } from '../ui/pages/SummaryPage.tsx'

export type InterviewSection =
  | 'getting-started'
  | 'income'
  | 'assets-expenses'
  | 'review'

export interface InterviewStep {
  id: string
  label: string
  path: string
  section: InterviewSection
  isVisible: (st: FinancialStatement) => boolean
  isComplete: (st: FinancialStatement) => boolean
  /** Records entered on the step, for steps that collect a list. */
  count?: (st: FinancialStatement) => number
  component: ComponentType
}

export function hasWages(st: FinancialStatement): boolean {
  return st.selectedIncomeSources.includes('wages')
}

export function hasNonWageIncome(st: FinancialStatement): boolean {
  return st.selectedIncomeSources.some((source) => source in NON_WAGE_INCOME_TERMS)
}

/** A list with nothing unanswered. An empty list counts as done. */
function allComplete(records: readonly { complete?: boolean }[]): boolean {
  return records.every((r) => r.complete === true)
}

export const STEPS: InterviewStep[] = [
  // ── Getting Started ───────────────────────────────────────────
  {
    id: 'welcome',
    label: 'Welcome',
    path: '/',
    section: 'getting-started',
    isVisible: () => true,
    isComplete: () => true,
    component: WelcomePage,
  },
  {
    id: 'income-sources',
    label: 'Income Sources',
    path: '/interview/income-sources',
    section: 'getting-started',
    isVisible: () => true,
    isComplete: (st) => st.selectedIncomeSources.length > 0,
    component: IncomeSourcesPage,
  },

  // ── Income ────────────────────────────────────────────────────
  {
    id: 'jobs',
    label: 'Jobs',
    path: '/interview/jobs',
    section: 'income',
    isVisible: hasWages,
    isComplete: (st) => st.jobs.length > 0 && allComplete(st.jobs),
    count: (st) => st.jobs.length,
    component: JobsPage,
  },
  {
    id: 'itemized-jobs',
    label: 'Pay Stubs',
    path: '/interview/itemized-jobs',
    section: 'income',
    isVisible: hasWages,
    isComplete: (st) => allComplete(st.itemizedJobs),
    count: (st) => st.itemizedJobs.length,
    component: ItemizedJobsPage,
  },
  {
    id: 'incomes',
    label: 'Other Income',
    path: '/interview/incomes',
    section: 'income',
    isVisible: hasNonWageIncome,
    isComplete: (st) => st.incomes.length > 0 && allComplete(st.incomes),
    count: (st) => st.incomes.length,
    component: IncomesPage,
  },

  // ── Assets & Expenses ─────────────────────────────────────────
  {
    id: 'assets',
    label: 'Assets',
    path: '/interview/assets',
    section: 'assets-expenses',
    isVisible: () => true,
    isComplete: (st) => allComplete(st.assets) && allComplete(st.vehicles),
    count: (st) => st.assets.length + st.vehicles.length,
    component: AssetsPage,
  },
  {
    id: 'expenses',
    label: 'Expenses',
    path: '/interview/expenses',
    section: 'assets-expenses',
    isVisible: () => true,
    isComplete: (st) => allComplete(st.expenses),
    count: (st) => st.expenses.length,
    component: ExpensesPage,
  },

  // ── Review ────────────────────────────────────────────────────
  {
    id: 'summary',
    label: 'Summary',
    path: '/interview/summary',
    section: 'review',
    isVisible: () => true,
    isComplete: () => false,
    component: SummaryPage,
  },
]

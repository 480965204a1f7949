import terms from './terms.json'

/** Ordered source key → label lookups for checklists and dropdowns. */
export type Terms = Readonly<Record<string, string>>

export const ASSET_TERMS: Terms = terms.asset
export const ACCOUNT_TERMS: Terms = terms.account
export const INCOME_TERMS: Terms = terms.income
export const NON_WAGE_INCOME_TERMS: Terms = terms.nonWageIncome
export const EXPENSE_TERMS: Terms = terms.expense
/** Lines that add to an itemized job's pay. */
export const PAY_LINE_TERMS: Terms = terms.payLine
/** Lines that come off an itemized job's pay. */
export const PAY_DEDUCTION_TERMS: Terms = terms.payDeduction

/** Wages first, then every other income source. */
export const ALL_INCOME_TERMS: Terms = { ...INCOME_TERMS, ...NON_WAGE_INCOME_TERMS }

/** Accounts first, then the remaining asset kinds. */
export const ALL_ASSET_TERMS: Terms = { ...ACCOUNT_TERMS, ...ASSET_TERMS }

/** The label for a source key, falling back to the key itself. */
export function termLabel(termList: Terms, source: string): string {
  return termList[source] ?? source
}

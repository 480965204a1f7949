import { useState } from 'react'
import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import type { FinancialStatement } from '../../model/types.ts'
import { currency } from '../../model/money.ts'
import { serializeStatement } from '../../model/serialize.ts'
import {
  assetListEquity,
  assetListMarketValue,
  assetListTotal,
  expenseListTotal,
  incomeListTotal,
  itemizedJobListGross,
  itemizedJobListNet,
  jobListGross,
  jobListNet,
} from '../../income/lists.ts'
import { ValidationError } from '../../utils/errors.ts'
import { CopyButton } from '../components/CopyButton.tsx'
import { Button } from '../components/Button.tsx'
import { totalText } from '../components/FormFields.tsx'
import { InterviewNav } from './InterviewNav.tsx'

interface SummaryRow {
  id: string
  label: string
  /** Total at the given number of times per year. */
  total: (st: FinancialStatement, timesPerYear: number) => number
}

const ROWS: SummaryRow[] = [
  {
    id: 'gross',
    label: 'Gross pay from jobs',
    total: (st, f) => jobListGross(st.jobs, { timesPerYear: f }) + itemizedJobListGross(st.itemizedJobs, { timesPerYear: f }),
  },
  {
    id: 'take-home',
    label: 'Take-home pay from jobs',
    total: (st, f) => jobListNet(st.jobs, { timesPerYear: f }) + itemizedJobListNet(st.itemizedJobs, { timesPerYear: f }),
  },
  { id: 'other-income', label: 'Other income', total: (st, f) => incomeListTotal(st.incomes, { timesPerYear: f }) },
  { id: 'asset-income', label: 'Income from assets', total: (st, f) => assetListTotal([...st.assets, ...st.vehicles], { timesPerYear: f }) },
  { id: 'expenses', label: 'Expenses', total: (st, f) => expenseListTotal(st.expenses, { timesPerYear: f }) },
]

/** Take-home pay plus other income and asset income, minus expenses. */
export function netAvailable(st: FinancialStatement, timesPerYear: number): number {
  const [, takeHome, other, assetIncome, expenses] = ROWS.map((row) => row.total(st, timesPerYear))
  return takeHome + other + assetIncome - expenses
}

export function SummaryPage() {
  const statement = useStatementStore((s) => s.statement)
  const importStatement = useStatementStore((s) => s.importStatement)
  const interview = useInterview()
  const [importText, setImportText] = useState('')
  const [importError, setImportError] = useState<string | null>(null)

  const everything = [...statement.assets, ...statement.vehicles]

  const handleImport = () => {
    try {
      importStatement(importText)
      setImportText('')
      setImportError(null)
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      setImportError(err.message)
    }
  }

  return (
    <div data-testid="page-summary" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">Summary</h1>

      <table className="mt-6 w-full text-sm">
        <thead>
          <tr className="text-left text-gray-500">
            <th className="py-2 font-medium" />
            <th className="py-2 font-medium text-right">Monthly</th>
            <th className="py-2 font-medium text-right">Yearly</th>
          </tr>
        </thead>
        <tbody>
          {ROWS.map((row) => (
            <tr key={row.id} className="border-t border-gray-100">
              <td className="py-2 text-gray-700">{row.label}</td>
              <td className="py-2 text-right tabular-nums" data-testid={`summary-${row.id}-monthly`}>
                {totalText(() => row.total(statement, 12))}
              </td>
              <td className="py-2 text-right tabular-nums" data-testid={`summary-${row.id}-yearly`}>
                {totalText(() => row.total(statement, 1))}
              </td>
            </tr>
          ))}
          <tr className="border-t-2 border-gray-300 font-semibold">
            <td className="py-2 text-gray-900">Left over</td>
            <td className="py-2 text-right tabular-nums" data-testid="summary-net-monthly">
              {totalText(() => netAvailable(statement, 12))}
            </td>
            <td className="py-2 text-right tabular-nums" data-testid="summary-net-yearly">
              {totalText(() => netAvailable(statement, 1))}
            </td>
          </tr>
        </tbody>
      </table>

      <div className="mt-6 flex flex-col gap-1 text-sm">
        <div className="flex justify-between">
          <span className="text-gray-600">Value of everything you own</span>
          <span className="font-medium" data-testid="summary-market-value">{currency(assetListMarketValue(everything))}</span>
        </div>
        <div className="flex justify-between">
          <span className="text-gray-600">Equity</span>
          <span className="font-medium">{currency(assetListEquity(everything))}</span>
        </div>
      </div>

      <section className="mt-8 flex flex-col gap-3">
        <h2 className="text-sm font-semibold text-gray-800">Save or load your answers</h2>
        <CopyButton
          text={serializeStatement(statement)}
          textBefore="Copy this text to keep a copy of your answers."
          block
        />
        <label className="flex flex-col gap-1 text-sm text-gray-700">
          Paste saved answers
          <textarea
            className="border border-gray-300 rounded-md px-3 py-2 text-sm"
            rows={4}
            value={importText}
            onChange={(e) => setImportText(e.target.value)}
          />
        </label>
        {importError && <p role="alert" className="text-xs text-red-600">{importError}</p>}
        <Button variant="outline" size="sm" className="self-start" disabled={!importText.trim()} onClick={handleImport}>
          Load answers
        </Button>
      </section>

      <InterviewNav interview={interview} />
    </div>
  )
}

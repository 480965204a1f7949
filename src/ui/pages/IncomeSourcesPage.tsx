import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import { INCOME_TERMS, NON_WAGE_INCOME_TERMS } from '../../income/terms.ts'
import type { Terms } from '../../income/terms.ts'
import { InterviewNav } from './InterviewNav.tsx'

export function IncomeSourcesPage() {
  const selected = useStatementStore((s) => s.statement.selectedIncomeSources)
  const setSelected = useStatementStore((s) => s.setSelectedIncomeSources)
  const moveChecksToIncomes = useStatementStore((s) => s.moveChecksToIncomes)
  const interview = useInterview()

  const toggle = (source: string) => {
    if (selected.includes(source)) {
      setSelected(selected.filter((s) => s !== source))
    } else {
      setSelected([...selected, source])
    }
  }

  const renderTerms = (terms: Terms) =>
    Object.entries(terms).map(([source, text]) => (
      <label key={source} className="flex items-start gap-3 cursor-pointer py-2">
        <input
          type="checkbox"
          className="mt-0.5 h-4 w-4 rounded border-gray-300 text-brand focus:ring-brand"
          checked={selected.includes(source)}
          onChange={() => toggle(source)}
        />
        <span className="text-sm font-medium text-gray-900">{text}</span>
      </label>
    ))

  return (
    <div data-testid="page-income-sources" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">Where does your money come from?</h1>
      <p className="mt-1 text-sm text-gray-600">
        Check every kind of income you get now. You can come back and change this.
      </p>

      <div className="mt-6 flex flex-col gap-1">
        {renderTerms(INCOME_TERMS)}
      </div>

      <div className="mt-6">
        <div className="flex items-center gap-2 mb-2">
          <div className="flex-1 border-t border-gray-200" />
          <span className="text-xs font-medium text-gray-400 uppercase tracking-wide">Other income</span>
          <div className="flex-1 border-t border-gray-200" />
        </div>
        <div className="flex flex-col gap-1">
          {renderTerms(NON_WAGE_INCOME_TERMS)}
        </div>
      </div>

      <InterviewNav
        interview={{
          ...interview,
          goNext: () => {
            moveChecksToIncomes()
            interview.goNext()
          },
        }}
      />
    </div>
  )
}

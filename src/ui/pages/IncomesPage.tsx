import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import type { Income } from '../../model/types.ts'
import { NON_WAGE_INCOME_TERMS, termLabel } from '../../income/terms.ts'
import { TIMES_PER_YEAR_LIST } from '../../income/frequency.ts'
import { incomeListTotal } from '../../income/lists.ts'
import { RepeatableSection } from '../components/RepeatableSection.tsx'
import { CurrencyInput } from '../components/CurrencyInput.tsx'
import { Button } from '../components/Button.tsx'
import { FrequencySelect, TermSelect, TextField, TotalLine, totalText } from '../components/FormFields.tsx'
import { InterviewNav } from './InterviewNav.tsx'

function emptyIncome(): Income {
  return { id: crypto.randomUUID(), source: '', value: 0, timesPerYear: 12 }
}

export function IncomesPage() {
  const incomes = useStatementStore((s) => s.statement.incomes)
  const addRecord = useStatementStore((s) => s.addRecord)
  const updateRecord = useStatementStore((s) => s.updateRecord)
  const removeRecord = useStatementStore((s) => s.removeRecord)
  const markComplete = useStatementStore((s) => s.markComplete)
  const interview = useInterview()

  const update = (id: string, updates: Partial<Income>) => updateRecord('incomes', id, { ...updates, complete: false })

  return (
    <div data-testid="page-incomes" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">Other income</h1>
      <p className="mt-1 text-sm text-gray-600">
        Tell us how much you get from each source and how often.
      </p>

      <div className="mt-6">
        <RepeatableSection
          label="Income"
          items={incomes}
          addLabel="Add income"
          emptyMessage="No income added yet."
          onAdd={() => addRecord('incomes', emptyIncome())}
          onRemove={(id) => removeRecord('incomes', id)}
          renderItem={(income) => (
            <div className="flex flex-col gap-3">
              <TermSelect
                label="Kind of income"
                terms={NON_WAGE_INCOME_TERMS}
                value={income.source}
                onChange={(source) => update(income.id, { source, displayName: termLabel(NON_WAGE_INCOME_TERMS, source) })}
              />
              {(income.source === '' || income.source === 'other') && (
                <TextField
                  label="What is it?"
                  value={income.displayName ?? ''}
                  onChange={(displayName) => update(income.id, { displayName })}
                />
              )}
              <CurrencyInput
                label="Amount"
                value={income.value}
                onChange={(value) => update(income.id, { value })}
              />
              <FrequencySelect
                options={TIMES_PER_YEAR_LIST}
                value={income.timesPerYear}
                onChange={(timesPerYear) => update(income.id, { timesPerYear })}
              />
              <TextField
                label="Whose income is it?"
                value={income.owner ?? ''}
                onChange={(owner) => update(income.id, { owner })}
              />
              {!income.complete && (
                <Button size="sm" className="self-start" onClick={() => markComplete('incomes', income.id)}>
                  Done
                </Button>
              )}
            </div>
          )}
          footer={
            incomes.length > 0 && (
              <TotalLine
                label="Total per month"
                amount={totalText(() => incomeListTotal(incomes, { timesPerYear: 12 }))}
                testId="incomes-monthly"
              />
            )
          }
        />
      </div>

      <InterviewNav interview={interview} />
    </div>
  )
}

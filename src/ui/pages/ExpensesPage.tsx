import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import type { Expense } from '../../model/types.ts'
import { EXPENSE_TERMS, termLabel } from '../../income/terms.ts'
import { TIMES_PER_YEAR_FOR_EXPENSES } from '../../income/frequency.ts'
import { expenseListTotal } from '../../income/lists.ts'
import { RepeatableSection } from '../components/RepeatableSection.tsx'
import { CurrencyInput } from '../components/CurrencyInput.tsx'
import { Button } from '../components/Button.tsx'
import { FrequencySelect, TermSelect, TextField, TotalLine, totalText } from '../components/FormFields.tsx'
import { InterviewNav } from './InterviewNav.tsx'

export function ExpensesPage() {
  const expenses = useStatementStore((s) => s.statement.expenses)
  const addRecord = useStatementStore((s) => s.addRecord)
  const updateRecord = useStatementStore((s) => s.updateRecord)
  const removeRecord = useStatementStore((s) => s.removeRecord)
  const markComplete = useStatementStore((s) => s.markComplete)
  const interview = useInterview()

  const update = (id: string, updates: Partial<Expense>) => updateRecord('expenses', id, { ...updates, complete: false })

  return (
    <div data-testid="page-expenses" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">Your expenses</h1>
      <p className="mt-1 text-sm text-gray-600">
        List what you pay for regularly. Pick the frequency you pay it at; we do the math.
      </p>

      <div className="mt-6">
        <RepeatableSection
          label="Expenses"
          items={expenses}
          addLabel="Add expense"
          emptyMessage="No expenses added yet."
          onAdd={() => addRecord('expenses', { id: crypto.randomUUID(), source: '', value: 0, timesPerYear: 12 })}
          onRemove={(id) => removeRecord('expenses', id)}
          renderItem={(expense) => (
            <div className="flex flex-col gap-3">
              <TermSelect
                label="Kind of expense"
                terms={EXPENSE_TERMS}
                value={expense.source}
                onChange={(source) => update(expense.id, { source, displayName: termLabel(EXPENSE_TERMS, source) })}
              />
              {expense.source === 'other' && (
                <TextField
                  label="What is it?"
                  value={expense.displayName ?? ''}
                  onChange={(displayName) => update(expense.id, { displayName })}
                />
              )}
              <CurrencyInput
                label="Amount"
                value={expense.value}
                onChange={(value) => update(expense.id, { value })}
              />
              <FrequencySelect
                options={TIMES_PER_YEAR_FOR_EXPENSES}
                value={expense.timesPerYear}
                onChange={(timesPerYear) => update(expense.id, { timesPerYear })}
              />
              {!expense.complete && (
                <Button size="sm" className="self-start" disabled={!expense.source} onClick={() => markComplete('expenses', expense.id)}>
                  Done
                </Button>
              )}
            </div>
          )}
          footer={
            expenses.length > 0 && (
              <TotalLine
                label="Total per month"
                amount={totalText(() => expenseListTotal(expenses, { timesPerYear: 12 }))}
                testId="expenses-monthly"
              />
            )
          }
        />
      </div>

      <InterviewNav interview={interview} />
    </div>
  )
}

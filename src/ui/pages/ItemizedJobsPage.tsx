import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import type { ItemizedJob, ItemizedValue } from '../../model/types.ts'
import { TIMES_PER_YEAR_LIST } from '../../income/frequency.ts'
import { removeNonexistentItems } from '../../income/itemized.ts'
import { itemizedJobListGross, itemizedJobListNet } from '../../income/lists.ts'
import { employerSummary } from '../../income/periodic.ts'
import { PAY_DEDUCTION_TERMS, PAY_LINE_TERMS, termLabel } from '../../income/terms.ts'
import type { Terms } from '../../income/terms.ts'
import { RepeatableSection } from '../components/RepeatableSection.tsx'
import { CurrencyInput } from '../components/CurrencyInput.tsx'
import { Button } from '../components/Button.tsx'
import { CheckboxField, FrequencySelect, NumberField, TermSelect, TextField, TotalLine, totalText } from '../components/FormFields.tsx'
import { InterviewNav } from './InterviewNav.tsx'

function emptyItemizedJob(): ItemizedJob {
  return {
    id: crypto.randomUUID(),
    source: '',
    employer: { name: '' },
    timesPerYear: 26,
    toAdd: [{ source: 'wages', value: 0 }],
    toSubtract: [{ source: 'federal taxes' }, { source: 'insurance' }],
  }
}

function setLine(lines: readonly ItemizedValue[], index: number, updates: Partial<ItemizedValue>): ItemizedValue[] {
  return lines.map((line, i) => (i === index ? { ...line, ...updates } : line))
}

interface PayLinesProps {
  title: string
  addLabel: string
  terms: Terms
  lines: ItemizedValue[]
  onChange: (lines: ItemizedValue[]) => void
}

/** One side of a pay stub. Lines the user does not have stay until the job is saved. */
function PayLines({ title, addLabel, terms, lines, onChange }: PayLinesProps) {
  return (
    <fieldset className="flex flex-col gap-2">
      <legend className="text-sm font-semibold text-gray-800">{title}</legend>
      {lines.map((line, index) => (
        <div key={line.source} className="flex flex-col gap-1">
          <CurrencyInput
            label={termLabel(terms, line.source)}
            value={line.value ?? 0}
            disabled={line.exists === false}
            onChange={(value) => onChange(setLine(lines, index, { value }))}
          />
          <CheckboxField
            label={`No ${termLabel(terms, line.source).toLowerCase()} on my pay stub`}
            checked={line.exists === false}
            onChange={(missing) => onChange(setLine(lines, index, { exists: !missing }))}
          />
        </div>
      ))}
      <TermSelect
        label={addLabel}
        terms={terms}
        value=""
        onChange={(source) => {
          if (source && !lines.some((line) => line.source === source)) {
            onChange([...lines, { source, value: 0 }])
          }
        }}
      />
    </fieldset>
  )
}

export function ItemizedJobsPage() {
  const jobs = useStatementStore((s) => s.statement.itemizedJobs)
  const addRecord = useStatementStore((s) => s.addRecord)
  const updateRecord = useStatementStore((s) => s.updateRecord)
  const removeRecord = useStatementStore((s) => s.removeRecord)
  const interview = useInterview()

  const update = (id: string, updates: Partial<ItemizedJob>) =>
    updateRecord('itemizedJobs', id, { ...updates, complete: false })

  const save = (job: ItemizedJob) =>
    updateRecord('itemizedJobs', job.id, {
      toAdd: removeNonexistentItems(job.toAdd),
      toSubtract: removeNonexistentItems(job.toSubtract),
      complete: true,
    })

  return (
    <div data-testid="page-itemized-jobs" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">Your pay stubs</h1>
      <p className="mt-1 text-sm text-gray-600">
        If you have a pay stub, enter each line from it. Amounts are for one pay period.
      </p>

      <div className="mt-6">
        <RepeatableSection
          label="Pay stubs"
          items={jobs}
          addLabel="Add pay stub"
          emptyMessage="No pay stubs added yet."
          onAdd={() => addRecord('itemizedJobs', emptyItemizedJob())}
          onRemove={(id) => removeRecord('itemizedJobs', id)}
          renderItem={(job) => (
            <div className="flex flex-col gap-3">
              <TextField label="Job title" value={job.source} onChange={(source) => update(job.id, { source })} />
              <TextField
                label="Employer name"
                value={job.employer.name}
                onChange={(name) => update(job.id, { employer: { ...job.employer, name } })}
              />
              <CheckboxField
                label="Paid by the hour"
                checked={job.isHourly ?? false}
                onChange={(isHourly) =>
                  update(job.id, {
                    isHourly,
                    toAdd: job.toAdd.map((line) => (line.source === 'wages' ? { ...line, isHourly } : line)),
                  })
                }
              />
              {job.isHourly && (
                <NumberField
                  label="Hours each period"
                  value={job.hoursPerPeriod}
                  onChange={(hoursPerPeriod) => update(job.id, { hoursPerPeriod })}
                />
              )}
              <FrequencySelect
                label="How often are you paid?"
                options={TIMES_PER_YEAR_LIST}
                value={job.timesPerYear}
                onChange={(timesPerYear) => update(job.id, { timesPerYear })}
              />
              <PayLines
                title="Money in"
                addLabel="Add a pay line"
                terms={PAY_LINE_TERMS}
                lines={job.toAdd}
                onChange={(toAdd) => update(job.id, { toAdd })}
              />
              <PayLines
                title="Money taken out"
                addLabel="Add a deduction"
                terms={PAY_DEDUCTION_TERMS}
                lines={job.toSubtract}
                onChange={(toSubtract) => update(job.id, { toSubtract })}
              />
              {job.complete ? (
                <p className="text-xs text-emerald-700">Saved: {employerSummary(job.employer)}</p>
              ) : (
                <Button
                  size="sm"
                  className="self-start"
                  disabled={!job.source || !job.employer.name || (job.isHourly === true && job.hoursPerPeriod === undefined)}
                  onClick={() => save(job)}
                >
                  Done
                </Button>
              )}
            </div>
          )}
          footer={
            jobs.length > 0 && (
              <div className="flex flex-col gap-1">
                <TotalLine label="Gross pay per month" amount={totalText(() => itemizedJobListGross(jobs, { timesPerYear: 12 }))} testId="itemized-gross-monthly" />
                <TotalLine label="Take-home pay per month" amount={totalText(() => itemizedJobListNet(jobs, { timesPerYear: 12 }))} testId="itemized-net-monthly" />
              </div>
            )
          }
        />
      </div>

      <InterviewNav interview={interview} />
    </div>
  )
}

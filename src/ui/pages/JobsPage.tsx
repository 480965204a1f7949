import { useStatementStore } from '../../store/statementStore.ts'
import { useInterview } from '../../interview/useInterview.ts'
import type { Job } from '../../model/types.ts'
import { TIMES_PER_YEAR_LIST } from '../../income/frequency.ts'
import { jobListGross, jobListNet } from '../../income/lists.ts'
import { employerSummary } from '../../income/periodic.ts'
import { RepeatableSection } from '../components/RepeatableSection.tsx'
import { CurrencyInput } from '../components/CurrencyInput.tsx'
import { PhoneNumberInput } from '../components/PhoneNumberInput.tsx'
import { Button } from '../components/Button.tsx'
import { CheckboxField, FrequencySelect, NumberField, TextField, TotalLine, totalText } from '../components/FormFields.tsx'
import { InterviewNav } from './InterviewNav.tsx'

function emptyJob(): Job {
  return {
    id: crypto.randomUUID(),
    source: 'wages',
    employer: { name: '' },
    value: 0,
    timesPerYear: 26,
  }
}

export function JobsPage() {
  const jobs = useStatementStore((s) => s.statement.jobs)
  const addRecord = useStatementStore((s) => s.addRecord)
  const updateRecord = useStatementStore((s) => s.updateRecord)
  const removeRecord = useStatementStore((s) => s.removeRecord)
  const markComplete = useStatementStore((s) => s.markComplete)
  const interview = useInterview()

  const update = (id: string, updates: Partial<Job>) => updateRecord('jobs', id, { ...updates, complete: false })

  return (
    <div data-testid="page-jobs" className="max-w-xl mx-auto">
      <h1 className="text-2xl font-bold text-gray-900">Your jobs</h1>
      <p className="mt-1 text-sm text-gray-600">
        Add each job you have now, including self-employment.
      </p>

      <div className="mt-6">
        <RepeatableSection
          label="Jobs"
          items={jobs}
          addLabel="Add job"
          emptyMessage="No jobs added yet."
          onAdd={() => addRecord('jobs', emptyJob())}
          onRemove={(id) => removeRecord('jobs', id)}
          renderItem={(job) => (
            <div className="flex flex-col gap-3">
              <TextField
                label="Employer name"
                value={job.employer.name}
                onChange={(name) => update(job.id, { employer: { ...job.employer, name } })}
              />
              <TextField
                label="Employer address"
                value={job.employer.address ?? ''}
                onChange={(address) => update(job.id, { employer: { ...job.employer, address } })}
              />
              <PhoneNumberInput
                label="Employer phone"
                defaultValue={job.employer.phone}
                onChange={(phone) => update(job.id, { employer: { ...job.employer, phone } })}
              />
              <CheckboxField
                label="Paid by the hour"
                checked={job.isHourly ?? false}
                onChange={(isHourly) => update(job.id, { isHourly })}
              />
              <CurrencyInput
                label={job.isHourly ? 'Hourly rate' : 'Gross pay each period'}
                value={job.value}
                onChange={(value) => update(job.id, { value })}
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
              <CurrencyInput
                label="Taxes and other deductions each period"
                value={job.deduction ?? 0}
                onChange={(deduction) => update(job.id, { deduction })}
              />
              <CheckboxField
                label="Self-employed"
                checked={job.isSelfEmployed ?? false}
                onChange={(isSelfEmployed) => update(job.id, { isSelfEmployed })}
              />
              {job.complete ? (
                <p className="text-xs text-emerald-700">Saved: {employerSummary(job.employer)}</p>
              ) : (
                <Button
                  size="sm"
                  className="self-start"
                  disabled={!job.employer.name || (job.isHourly === true && job.hoursPerPeriod === undefined)}
                  onClick={() => markComplete('jobs', job.id)}
                >
                  Done
                </Button>
              )}
            </div>
          )}
          footer={
            jobs.length > 0 && (
              <div className="flex flex-col gap-1">
                <TotalLine label="Gross pay per month" amount={totalText(() => jobListGross(jobs, { timesPerYear: 12 }))} testId="jobs-gross-monthly" />
                <TotalLine label="Take-home pay per month" amount={totalText(() => jobListNet(jobs, { timesPerYear: 12 }))} testId="jobs-net-monthly" />
              </div>
            )
          }
        />
      </div>

      <InterviewNav interview={interview} />
    </div>
  )
}

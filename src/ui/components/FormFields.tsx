import { useId } from 'react'
import type { ReactNode } from 'react'
import type { TimesPerYearOption } from '../../income/frequency.ts'
import type { Terms } from '../../income/terms.ts'
import { currency } from '../../model/money.ts'
import { ValidationError } from '../../utils/errors.ts'

const fieldClass =
  'border border-gray-300 rounded-md px-3 py-2 text-sm bg-white text-gray-900 focus:outline-none focus:ring-2 focus:ring-brand focus:border-transparent'

function Field({ label, children, htmlFor }: { label: ReactNode; children: ReactNode; htmlFor: string }) {
  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={htmlFor} className="text-sm font-medium text-gray-700">{label}</label>
      {children}
    </div>
  )
}

interface TextFieldProps {
  label: string
  value: string
  onChange: (value: string) => void
  placeholder?: string
}

export function TextField({ label, value, onChange, placeholder }: TextFieldProps) {
  const id = useId()
  return (
    <Field label={label} htmlFor={id}>
      <input id={id} type="text" className={fieldClass} value={value} placeholder={placeholder} onChange={(e) => onChange(e.target.value)} />
    </Field>
  )
}

interface NumberFieldProps {
  label: string
  value: number | undefined
  onChange: (value: number | undefined) => void
  min?: number
}

export function NumberField({ label, value, onChange, min = 0 }: NumberFieldProps) {
  const id = useId()
  return (
    <Field label={label} htmlFor={id}>
      <input
        id={id}
        type="number"
        min={min}
        className={fieldClass}
        value={value ?? ''}
        onChange={(e) => onChange(e.target.value === '' ? undefined : Number(e.target.value))}
      />
    </Field>
  )
}

interface TermSelectProps {
  label: string
  terms: Terms
  value: string
  onChange: (source: string) => void
}

export function TermSelect({ label, terms, value, onChange }: TermSelectProps) {
  const id = useId()
  return (
    <Field label={label} htmlFor={id}>
      <select id={id} className={fieldClass} value={value} onChange={(e) => onChange(e.target.value)}>
        <option value="" />
        {Object.entries(terms).map(([source, text]) => (
          <option key={source} value={source}>{text}</option>
        ))}
      </select>
    </Field>
  )
}

interface FrequencySelectProps {
  label?: string
  options: readonly TimesPerYearOption[]
  value: number
  onChange: (timesPerYear: number) => void
}

export function FrequencySelect({ label = 'How often?', options, value, onChange }: FrequencySelectProps) {
  const id = useId()
  return (
    <Field label={label} htmlFor={id}>
      <select id={id} className={fieldClass} value={String(value)} onChange={(e) => onChange(Number(e.target.value))}>
        {options.map(([timesPerYear, text]) => (
          <option key={timesPerYear} value={String(timesPerYear)}>{text}</option>
        ))}
      </select>
    </Field>
  )
}

interface CheckboxFieldProps {
  label: string
  checked: boolean
  onChange: (checked: boolean) => void
}

export function CheckboxField({ label, checked, onChange }: CheckboxFieldProps) {
  return (
    <label className="flex items-center gap-2 text-sm text-gray-700 cursor-pointer">
      <input
        type="checkbox"
        className="h-4 w-4 rounded border-gray-300 text-brand focus:ring-brand"
        checked={checked}
        onChange={(e) => onChange(e.target.checked)}
      />
      {label}
    </label>
  )
}

/** A labelled money figure shown under a list. */
export function TotalLine({ label, amount, testId }: { label: string; amount: string; testId?: string }) {
  return (
    <div className="flex justify-between border-t border-gray-200 pt-2 text-sm">
      <span className="text-gray-600">{label}</span>
      <span className="font-semibold text-gray-900" data-testid={testId}>{amount}</span>
    </div>
  )
}

/** Currency text for a total, or the reason it cannot be worked out yet. */
export function totalText(compute: () => number): string {
  try {
    return currency(compute())
  } catch (err) {
    if (err instanceof ValidationError) return err.message
    throw err
  }
}

import { useId, useState } from 'react'
import type { FocusEvent } from 'react'
import { getConfig } from '../../config.ts'
import { parseDate } from '../../calendar/isoDate.ts'
import { BirthDate, ThreePartsDate } from '../../datatypes/threePartsDate.ts'
import type { DataTypeParams } from '../../datatypes/types.ts'
import { ValidationError } from '../../utils/errors.ts'

interface DateParts {
  month: string
  day: string
  year: string
}

interface ThreePartsDateInputProps {
  label: string
  /** Name of the hidden field that carries the ISO value. */
  name?: string
  /** A stored ISO date to start from. */
  defaultValue?: string
  birthDate?: boolean
  params?: DataTypeParams
  onChange?: (value: string | undefined) => void
}

function monthNames(locale: string): string[] {
  return Array.from({ length: 12 }, (_, i) =>
    new Date(Date.UTC(2000, i, 1)).toLocaleString(locale, { month: 'long', timeZone: 'UTC' }),
  )
}

function initialParts(value: string): DateParts {
  if (!value) return { month: '', day: '', year: '' }
  const date = parseDate(value)
  return { month: String(date.month), day: String(date.day), year: String(date.year) }
}

/** "M/D/YYYY" with empty slots for missing parts, or "" when nothing is filled in. */
export function composeDate(parts: DateParts): string {
  const { month, day, year } = parts
  if (!month && !day && !year) return ''
  return `${month}/${day.trim()}/${year.trim()}`
}

export function ThreePartsDateInput({
  label,
  name,
  defaultValue = '',
  birthDate = false,
  params = {},
  onChange,
}: ThreePartsDateInputProps) {
  const groupId = useId()
  const errorId = useId()
  const datatype = birthDate ? BirthDate : ThreePartsDate
  const [parts, setParts] = useState(() => initialParts(defaultValue))
  const [error, setError] = useState<string | null>(null)

  const raw = composeDate(parts)
  const check = (text: string): string | null => {
    try {
      datatype.validate(text, params)
      return null
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      return err.message
    }
  }
  const value = raw && check(raw) === null ? datatype.transform(raw, params) ?? '' : ''

  const update = (part: keyof DateParts, next: string) => {
    const updated = { ...parts, [part]: next }
    setParts(updated)
    const text = composeDate(updated)
    onChange?.(text && check(text) === null ? datatype.transform(text, params) : undefined)
  }

  const handleBlur = (e: FocusEvent<HTMLFieldSetElement>) => {
    // Moving between the three fields is not leaving the date
    if (e.relatedTarget instanceof Node && e.currentTarget.contains(e.relatedTarget)) return
    setError(check(raw))
  }

  const fieldClass = `border rounded-md px-3 py-2 text-sm focus:outline-none focus:ring-2 focus:ring-brand focus:border-transparent ${
    error ? 'border-red-500' : 'border-gray-300'
  }`

  return (
    <fieldset className="flex flex-col gap-1" onBlur={handleBlur} aria-describedby={error ? errorId : undefined}>
      <legend className="text-sm font-medium text-gray-700">{label}</legend>
      <div className="flex gap-2">
        <label className="flex flex-col text-xs text-gray-500">
          Month
          <select
            id={`${groupId}-month`}
            className={fieldClass}
            value={parts.month}
            onChange={(e) => update('month', e.target.value)}
          >
            <option value="" />
            {monthNames(getConfig().locale).map((monthName, i) => (
              <option key={monthName} value={String(i + 1)}>{monthName}</option>
            ))}
          </select>
        </label>
        <label className="flex flex-col text-xs text-gray-500">
          Day
          <input
            id={`${groupId}-day`}
            type="text"
            inputMode="numeric"
            className={`${fieldClass} w-16`}
            value={parts.day}
            onChange={(e) => update('day', e.target.value)}
          />
        </label>
        <label className="flex flex-col text-xs text-gray-500">
          Year
          <input
            id={`${groupId}-year`}
            type="text"
            inputMode="numeric"
            className={`${fieldClass} w-24`}
            value={parts.year}
            onChange={(e) => update('year', e.target.value)}
          />
        </label>
      </div>
      {name && <input type="hidden" name={name} value={value} data-testid="date-value" />}
      {error && (
        <span id={errorId} role="alert" className="text-xs text-red-600">{error}</span>
      )}
    </fieldset>
  )
}

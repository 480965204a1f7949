import { useId, useState } from 'react'
import type { ChangeEvent } from 'react'
import { AsYouType } from 'libphonenumber-js'
import { PhoneNumber, phoneCountry } from '../../datatypes/phoneNumber.ts'
import { ValidationError } from '../../utils/errors.ts'

interface PhoneNumberInputProps {
  label: string
  /** Name of the hidden field that carries the E.164 value. */
  name?: string
  /** A stored E.164 number to start from. */
  defaultValue?: string
  /** Country for numbers typed without "+". Defaults to the configured country. */
  country?: string
  onChange?: (value: string | undefined) => void
}

export function PhoneNumberInput({ label, name, defaultValue = '', country, onChange }: PhoneNumberInputProps) {
  const inputId = useId()
  const errorId = useId()
  const defaultCountry = phoneCountry(country)
  const [text, setText] = useState(() => new AsYouType(defaultCountry).input(defaultValue))
  const [error, setError] = useState<string | null>(null)

  const value = PhoneNumber.transform(text, { country }) ?? ''

  const handleChange = (e: ChangeEvent<HTMLInputElement>) => {
    const raw = e.target.value
    // Let deletions through untouched so the formatter cannot re-add a bracket
    const next = raw.length < text.length ? raw : new AsYouType(defaultCountry).input(raw)
    setText(next)
    setError(null)
    onChange?.(PhoneNumber.transform(next, { country }))
  }

  const handleBlur = () => {
    try {
      PhoneNumber.validate(text, { country })
      setError(null)
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      setError(err.message)
    }
  }

  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={inputId} className="text-sm font-medium text-gray-700">{label}</label>
      <input
        id={inputId}
        type="tel"
        autoComplete="tel"
        className={`border rounded-md px-3 py-2 text-sm focus:outline-none focus:ring-2 focus:ring-brand focus:border-transparent ${
          error ? 'border-red-500' : 'border-gray-300'
        }`}
        value={text}
        onChange={handleChange}
        onBlur={handleBlur}
        aria-invalid={error !== null}
        aria-describedby={error ? errorId : undefined}
      />
      {name && <input type="hidden" name={name} value={value} data-testid="phone-value" />}
      {error && (
        <span id={errorId} role="alert" className="text-xs text-red-600">{error}</span>
      )}
    </div>
  )
}

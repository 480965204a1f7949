import { useId, useState, useCallback } from 'react'
import type { ChangeEvent, ReactNode } from 'react'
import { currency, dollars, parseToCents } from '../../model/money.ts'

interface CurrencyInputProps {
  label: ReactNode
  value: number // integer cents
  onChange: (cents: number) => void
  placeholder?: string
  required?: boolean
  helperText?: string
  disabled?: boolean
}

export function CurrencyInput({
  label,
  value,
  onChange,
  placeholder,
  required,
  helperText,
  disabled,
}: CurrencyInputProps) {
  const inputId = useId()
  const helperId = useId()
  const [focused, setFocused] = useState(false)
  const [rawText, setRawText] = useState('')

  const handleFocus = useCallback(() => {
    setFocused(true)
    // Show the plain dollar amount while editing
    setRawText(value !== 0 ? dollars(value).toString() : '')
  }, [value])

  const handleBlur = useCallback(() => {
    setFocused(false)
    onChange(parseToCents(rawText))
  }, [rawText, onChange])

  const handleChange = useCallback((e: ChangeEvent<HTMLInputElement>) => {
    setRawText(e.target.value)
  }, [])

  const displayValue = focused ? rawText : currency(value)

  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={inputId} className={`text-sm font-medium flex items-center ${disabled ? 'text-gray-400' : 'text-gray-700'}`}>
        {label}
        {required && <span className="text-red-500 ml-0.5">*</span>}
      </label>
      <input
        id={inputId}
        type="text"
        inputMode="decimal"
        className={`border rounded-md px-3 py-2 text-sm focus:outline-none focus:ring-2 focus:ring-brand focus:border-transparent ${
          disabled
            ? 'border-gray-200 bg-gray-50 text-gray-400 cursor-not-allowed'
            : 'border-gray-300 bg-white text-gray-900'
        }`}
        value={displayValue}
        onChange={handleChange}
        onFocus={handleFocus}
        onBlur={handleBlur}
        placeholder={placeholder}
        required={required}
        disabled={disabled}
        aria-describedby={helperText ? helperId : undefined}
      />
      {helperText && (
        <span id={helperId} className="text-xs text-gray-500">{helperText}</span>
      )}
    </div>
  )
}

import { useId, useState } from 'react'
import type { ChangeEvent } from 'react'

interface CharacterCounterProps {
  label: string
  name?: string
  defaultValue?: string
  /** Render a textarea instead of a one-line input. */
  multiline?: boolean
  rows?: number
  onChange?: (value: string) => void
}

export function characterCountMessage(count: number): string {
  return `You have entered ${count} ${count === 1 ? 'character' : 'characters'}.`
}

export function CharacterCounter({
  label,
  name,
  defaultValue = '',
  multiline = false,
  rows = 4,
  onChange,
}: CharacterCounterProps) {
  const inputId = useId()
  const messageId = useId()
  const [text, setText] = useState(defaultValue)

  const handleChange = (e: ChangeEvent<HTMLInputElement | HTMLTextAreaElement>) => {
    setText(e.target.value)
    onChange?.(e.target.value)
  }

  const fieldClass = 'border border-gray-300 rounded-md px-3 py-2 text-sm focus:outline-none focus:ring-2 focus:ring-brand focus:border-transparent'

  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={inputId} className="text-sm font-medium text-gray-700">{label}</label>
      {multiline ? (
        <textarea id={inputId} name={name} rows={rows} className={fieldClass} value={text} onChange={handleChange} aria-describedby={messageId} />
      ) : (
        <input id={inputId} name={name} type="text" className={fieldClass} value={text} onChange={handleChange} aria-describedby={messageId} />
      )}
      <div id={messageId} className="text-xs text-gray-500 pt-1" aria-live="polite">
        {characterCountMessage(text.length)}
      </div>
    </div>
  )
}

import type { DateInput } from '../calendar/isoDate.ts'

/**
 * Field-level settings an interview can pass to a datatype. Each datatype
 * reads only the settings it knows about.
 */
export interface DataTypeParams {
  /** Earliest allowed date, "MM/DD/YYYY" or ISO. */
  min?: string
  /** Latest allowed date, "MM/DD/YYYY" or ISO. */
  max?: string
  minMessage?: string
  maxMessage?: string
  invalidDayMessage?: string
  invalidYearMessage?: string
  /** Replaces every built-in message that has no more specific override. */
  defaultMessage?: string
  /** The date birth dates are checked against. Defaults to the current day. */
  today?: DateInput
  /** Two-letter country for numbers typed without a "+" prefix. */
  country?: string
}

/**
 * A field type the interview can put on any input: validation on submit,
 * conversion of the raw text into a stored value, and the text shown when
 * the field is filled back in.
 */
export interface CustomDataType<T> {
  name: string
  /** Class the widget installer looks for on the input. */
  inputClass: string
  /** Message the browser shows when client-side checks fail. */
  message: string
  /** Throws ValidationError with a message for the user. Empty input is valid. */
  validate(raw: string, params?: DataTypeParams): void
  transform(raw: string, params?: DataTypeParams): T | undefined
  defaultFor(value: T | undefined): string
}

export type ValidationResult<T> = { ok: true; value: T | undefined } | { ok: false; message: string }

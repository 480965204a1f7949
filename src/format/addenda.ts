/**
 * Overflow handling for answers that do not fit on a printed form.
 *
 * Long text is cut to fit its field with a pointer to the addendum, and the
 * full text is kept so the addendum page can print it. Lists of records
 * become addendum tables with the bookkeeping fields stripped out.
 */

import { toUsDate } from '../calendar/isoDate.ts'

export const ADDENDUM_NOTICE = ' (See Addendum.)'

export interface AddendumText {
  title: string
  value: string
}

export interface FittedText {
  /** What goes in the form field. */
  text: string
  /** Full answers for the addendum page; empty when the text fits. */
  addenda: AddendumText[]
}

/**
 * Fit `text` into a field that holds `limit` characters. Text longer than
 * the limit is cut so the notice fits too:
 *
 *   fitText('a'.repeat(30), 20, 'Facts') → { text: 'aaaa (See Addendum.)', addenda: [{ title: 'Facts', value: 'aaa…' }] }
 */
export function fitText(text: string, limit: number, title: string): FittedText {
  if (text.length <= limit) return { text, addenda: [] }
  const kept = text.slice(0, Math.max(limit - ADDENDUM_NOTICE.length, 0))
  return { text: kept + ADDENDUM_NOTICE, addenda: [{ title, value: text }] }
}

// ── Tables ─────────────────────────────────────────────────────

export type AddendumCell = string | number | boolean | null

export interface AddendumTable {
  title: string
  headers: string[]
  rows: Record<string, AddendumCell>[]
}

const HIDDEN_FIELDS = new Set(['id', 'complete', 'address', 'location'])

/** "Pat Doe" from `{ first, last }`, or the text of a `{ text }` name. */
function nameText(value: object): string | undefined {
  if ('text' in value && typeof value.text === 'string') return value.text
  const first = 'first' in value && typeof value.first === 'string' ? value.first : ''
  const last = 'last' in value && typeof value.last === 'string' ? value.last : ''
  const joined = `${first} ${last}`.trim()
  return joined || undefined
}

function cell(key: string, value: unknown): AddendumCell | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (value instanceof Date) {
    return toUsDate({ year: value.getFullYear(), month: value.getMonth() + 1, day: value.getDate() })
  }
  if (typeof value === 'object' && key === 'name') return nameText(value)
  return undefined
}

/**
 * Rows for an addendum table. Ids, completion flags, addresses and
 * underscore fields are dropped; names are flattened to text and dates
 * printed as MM/DD/YYYY. Other nested values are left out.
 */
export function addendumTable(
  records: readonly Record<string, unknown>[],
  title: string,
  headers: string[],
): AddendumTable {
  const rows = records.map((record) => {
    const row: Record<string, AddendumCell> = {}
    for (const [key, value] of Object.entries(record)) {
      if (HIDDEN_FIELDS.has(key) || key.startsWith('_')) continue
      const printed = cell(key, value)
      if (printed !== undefined) row[key] = printed
    }
    return row
  })
  return { title, headers, rows }
}

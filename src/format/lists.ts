export interface CommaListOptions {
  /** Word before the last item. Defaults to "and". */
  conjunction?: string
  /** Put a comma before the conjunction in lists of three or more. Defaults to true. */
  serialComma?: boolean
}

/**
 * Join items into a phrase:
 *
 *   commaList([])              → ""
 *   commaList(['a'])           → "a"
 *   commaList(['a', 'b'])      → "a and b"
 *   commaList(['a', 'b', 'c']) → "a, b, and c"
 */
export function commaList(items: readonly string[], options: CommaListOptions = {}): string {
  const conjunction = options.conjunction ?? 'and'
  const serialComma = options.serialComma ?? true

  if (items.length === 0) return ''
  if (items.length === 1) return items[0]
  if (items.length === 2) return `${items[0]} ${conjunction} ${items[1]}`

  const head = items.slice(0, -1).join(', ')
  const last = items[items.length - 1]
  return `${head}${serialComma ? ',' : ''} ${conjunction} ${last}`
}

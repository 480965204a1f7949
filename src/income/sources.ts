/**
 * Source and owner filters shared by every list total.
 */

/** A single key or several. */
export type SourceFilter = string | readonly string[] | ReadonlySet<string>

export function toSet(filter: SourceFilter | null | undefined): Set<string> {
  if (filter === undefined || filter === null) return new Set()
  if (typeof filter === 'string') return new Set([filter])
  return new Set(filter)
}

/**
 * Combine an include list and an exclude list into one predicate.
 *
 * Whatever is left of `source` after removing `excludeSource` is the
 * allow-list. When nothing is left the exclude list alone decides, and when
 * both are empty every source passes.
 */
export function sourcePredicate(
  source?: SourceFilter | null,
  excludeSource?: SourceFilter | null,
): (itemSource: string) => boolean {
  const exclude = toSet(excludeSource)
  const include = new Set([...toSet(source)].filter((s) => !exclude.has(s)))
  if (include.size > 0) return (s) => include.has(s)
  if (exclude.size > 0) return (s) => !exclude.has(s)
  return () => true
}

export function ownerPredicate(owner?: SourceFilter | null): (itemOwner: string | undefined) => boolean {
  if (owner === undefined || owner === null) return () => true
  const owners = toSet(owner)
  return (o) => o !== undefined && owners.has(o)
}

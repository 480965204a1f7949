/**
 * Statement ↔ JSON conversion for exporting a statement and loading it back.
 */

import type { FinancialStatement } from './types.ts'
import { financialStatementSchema } from './schemas.ts'
import { ValidationError } from '../utils/errors.ts'

export interface SerializedStatement {
  version: 1
  savedAt: string
  statement: FinancialStatement
}

export function serializeStatement(statement: FinancialStatement, savedAt: Date = new Date()): string {
  const payload: SerializedStatement = {
    version: 1,
    savedAt: savedAt.toISOString(),
    statement,
  }
  return JSON.stringify(payload, null, 2)
}

/**
 * Parse an exported statement. Throws ValidationError naming the first
 * offending field when the file is not a statement this version can read.
 */
export function deserializeStatement(json: string): FinancialStatement {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (err) {
    throw new ValidationError(`Saved statement is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (typeof raw !== 'object' || raw === null || !('statement' in raw)) {
    throw new ValidationError('Saved statement is missing its "statement" section')
  }
  const result = financialStatementSchema.safeParse(raw.statement)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ValidationError(`Saved statement is invalid at ${issue.path.join('.') || '(root)'}: ${issue.message}`)
  }
  return result.data
}

// Library entry: everything an interview can call without the React app.

export * from './config.ts'
export * from './utils/errors.ts'
export { Logger, logger, describeError } from './utils/logger.ts'
export type { LogLevel, LogEntry } from './utils/logger.ts'

export * from './model/types.ts'
export * from './model/money.ts'
export { financialStatementSchema } from './model/schemas.ts'
export * from './model/serialize.ts'

export * from './format/numbers.ts'
export * from './format/lists.ts'
export * from './format/html.ts'

export * from './calendar/isoDate.ts'
export * from './calendar/businessDays.ts'

export * from './income/sources.ts'
export * from './income/terms.ts'
export * from './income/frequency.ts'
export * from './income/periodic.ts'
export * from './income/itemized.ts'
export * from './income/lists.ts'
export * from './income/addup.ts'

export * from './datatypes/index.ts'
export { installWidgets, mountWidgets } from './ui/mountWidgets.tsx'

import { InvalidInputError, ValidationError } from '../utils/errors.ts'
import { logger } from '../utils/logger.ts'
import type { CustomDataType, DataTypeParams, ValidationResult } from './types.ts'

const log = logger.child({ module: 'datatypes' })

const registry = new Map<string, CustomDataType<unknown>>()

/** Add a datatype. A later registration under the same name replaces the earlier one. */
export function registerDataType<T>(type: CustomDataType<T>): void {
  if (registry.has(type.name)) {
    log.debug('Replacing datatype', { name: type.name })
  }
  registry.set(type.name, type)
}

export function getDataType(name: string): CustomDataType<unknown> | undefined {
  return registry.get(name)
}

export function listDataTypes(): string[] {
  return [...registry.keys()]
}

export function unregisterDataType(name: string): boolean {
  return registry.delete(name)
}

/**
 * Check raw field text against a registered datatype and convert it.
 * User-facing problems come back as `{ ok: false }`; an unknown datatype
 * name throws.
 */
export function validateInput(name: string, raw: string, params?: DataTypeParams): ValidationResult<unknown> {
  const type = registry.get(name)
  if (!type) {
    throw new InvalidInputError(`No datatype named ${JSON.stringify(name)} is registered`, name)
  }
  try {
    type.validate(raw, params)
    return { ok: true, value: type.transform(raw, params) }
  } catch (err) {
    if (err instanceof ValidationError) return { ok: false, message: err.message }
    throw err
  }
}

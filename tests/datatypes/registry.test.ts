import { describe, it, expect, afterEach } from 'vitest'
import {
  getDataType,
  listDataTypes,
  registerDataType,
  unregisterDataType,
  validateInput,
} from '../../src/datatypes/index.ts'
import type { CustomDataType } from '../../src/datatypes/index.ts'
import { InvalidInputError, ValidationError } from '../../src/utils/errors.ts'

const Shout: CustomDataType<string> = {
  name: 'Shout',
  inputClass: 'shout',
  message: 'Answer in capitals',
  validate(raw) {
    if (raw !== raw.toUpperCase()) throw new ValidationError('Answer in capitals')
  },
  transform(raw) {
    return raw === '' ? undefined : raw
  },
  defaultFor(value) {
    return value ?? ''
  },
}

afterEach(() => {
  unregisterDataType('Shout')
})

describe('datatype registry', () => {
  it('registers the built-in datatypes on import', () => {
    expect(listDataTypes()).toEqual(expect.arrayContaining(['ThreePartsDate', 'BirthDate', 'al_international_phone']))
  })

  it('adds and removes custom datatypes', () => {
    registerDataType(Shout)
    expect(getDataType('Shout')?.inputClass).toBe('shout')
    expect(unregisterDataType('Shout')).toBe(true)
    expect(getDataType('Shout')).toBeUndefined()
  })
})

describe('validateInput', () => {
  it('converts valid input', () => {
    expect(validateInput('ThreePartsDate', '7/4/2023')).toEqual({ ok: true, value: '2023-07-04' })
  })

  it('returns the message for invalid input', () => {
    expect(validateInput('BirthDate', '7/4/2023', { today: '2023-06-01' })).toEqual({
      ok: false,
      message: 'Answer with a date of birth (7/4/2023 is in the future)',
    })
    registerDataType(Shout)
    expect(validateInput('Shout', 'quiet')).toEqual({ ok: false, message: 'Answer in capitals' })
  })

  it('throws for an unknown datatype', () => {
    expect(() => validateInput('Nope', 'x')).toThrow(InvalidInputError)
  })
})

import { isSupportedCountry, isValidPhoneNumber, parsePhoneNumberFromString } from 'libphonenumber-js'
import type { CountryCode } from 'libphonenumber-js'
import { getConfig } from '../config.ts'
import { ValidationError } from '../utils/errors.ts'
import type { CustomDataType } from './types.ts'

export const PHONE_MESSAGE =
  'This phone number doesn\'t look right. Note that a non-US number needs a "+" before the number.'

/** The country used for numbers typed without "+", falling back to the configured default. */
export function phoneCountry(country?: string): CountryCode | undefined {
  const code = (country ?? getConfig().defaultPhoneCountry).toUpperCase()
  return isSupportedCountry(code) ? code : undefined
}

/** Any phone number in the world; stored in E.164 form ("+12133734253"). */
export const PhoneNumber: CustomDataType<string> = {
  name: 'al_international_phone',
  inputClass: 'al_international_phone',
  message: PHONE_MESSAGE,
  validate(raw, params = {}) {
    const text = raw.trim()
    if (text === '') return
    if (!isValidPhoneNumber(text, phoneCountry(params.country))) {
      throw new ValidationError(params.defaultMessage ?? PHONE_MESSAGE)
    }
  },
  transform(raw, params = {}) {
    const text = raw.trim()
    if (text === '') return undefined
    return parsePhoneNumberFromString(text, phoneCountry(params.country))?.number ?? text
  },
  defaultFor(value) {
    return value ?? ''
  },
}

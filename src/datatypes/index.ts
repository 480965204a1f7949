import { registerDataType } from './registry.ts'
import { BirthDate, ThreePartsDate } from './threePartsDate.ts'
import { PhoneNumber } from './phoneNumber.ts'

export function registerDefaultDataTypes(): void {
  registerDataType(ThreePartsDate)
  registerDataType(BirthDate)
  registerDataType(PhoneNumber)
}

registerDefaultDataTypes()

export * from './types.ts'
export * from './registry.ts'
export { BirthDate, ThreePartsDate, checkEmptyParts } from './threePartsDate.ts'
export { PHONE_MESSAGE, PhoneNumber, phoneCountry } from './phoneNumber.ts'

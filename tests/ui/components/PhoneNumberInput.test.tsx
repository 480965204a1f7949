import { fireEvent, render, screen } from '@testing-library/react'
import { describe, it, expect, vi } from 'vitest'
import { PhoneNumberInput } from '../../../src/ui/components/PhoneNumberInput.tsx'
import { PHONE_MESSAGE } from '../../../src/datatypes/phoneNumber.ts'

describe('PhoneNumberInput', () => {
  it('formats a US number and stores it in E.164 form', () => {
    const onChange = vi.fn()
    render(<PhoneNumberInput label="Phone" name="phone" onChange={onChange} />)
    const input = screen.getByLabelText<HTMLInputElement>('Phone')

    fireEvent.change(input, { target: { value: '2133734253' } })

    expect(input.value).toBe('(213) 373-4253')
    expect(screen.getByTestId<HTMLInputElement>('phone-value').value).toBe('+12133734253')
    expect(onChange).toHaveBeenLastCalledWith('+12133734253')
  })

  it('starts from a stored number', () => {
    render(<PhoneNumberInput label="Phone" name="phone" defaultValue="+12133734253" />)
    expect(screen.getByTestId<HTMLInputElement>('phone-value').value).toBe('+12133734253')
  })

  it('explains a bad number when the field is left', () => {
    render(<PhoneNumberInput label="Phone" />)
    const input = screen.getByLabelText('Phone')

    fireEvent.change(input, { target: { value: '123' } })
    fireEvent.blur(input)

    expect(screen.getByRole('alert').textContent).toBe(PHONE_MESSAGE)
    expect(input.getAttribute('aria-invalid')).toBe('true')

    fireEvent.change(input, { target: { value: '1234' } })
    expect(screen.queryByRole('alert')).toBeNull()
  })

  it('accepts an empty field', () => {
    render(<PhoneNumberInput label="Phone" />)
    fireEvent.blur(screen.getByLabelText('Phone'))
    expect(screen.queryByRole('alert')).toBeNull()
  })
})

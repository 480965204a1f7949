import { fireEvent, render, screen } from '@testing-library/react'
import { describe, it, expect, vi } from 'vitest'
import { ThreePartsDateInput, composeDate } from '../../../src/ui/components/ThreePartsDateInput.tsx'

describe('composeDate', () => {
  it('leaves empty slots for missing parts', () => {
    expect(composeDate({ month: '7', day: '', year: '2023' })).toBe('7//2023')
    expect(composeDate({ month: '', day: '', year: '' })).toBe('')
  })
})

describe('ThreePartsDateInput', () => {
  it('combines the parts into an ISO date', () => {
    const onChange = vi.fn()
    render(<ThreePartsDateInput label="Hearing date" name="hearing" onChange={onChange} />)

    fireEvent.change(screen.getByLabelText('Month'), { target: { value: '7' } })
    fireEvent.change(screen.getByLabelText('Day'), { target: { value: '4' } })
    fireEvent.change(screen.getByLabelText('Year'), { target: { value: '2023' } })

    expect(screen.getByTestId<HTMLInputElement>('date-value').value).toBe('2023-07-04')
    expect(onChange).toHaveBeenLastCalledWith('2023-07-04')
  })

  it('fills in a stored date', () => {
    render(<ThreePartsDateInput label="Hearing date" name="hearing" defaultValue="2023-07-04" />)
    expect(screen.getByLabelText<HTMLSelectElement>('Month').value).toBe('7')
    expect(screen.getByLabelText<HTMLInputElement>('Day').value).toBe('4')
    expect(screen.getByLabelText<HTMLInputElement>('Year').value).toBe('2023')
  })

  it('names the missing part when the date is left', () => {
    render(<ThreePartsDateInput label="Hearing date" name="hearing" />)

    fireEvent.change(screen.getByLabelText('Month'), { target: { value: '7' } })
    fireEvent.change(screen.getByLabelText('Day'), { target: { value: '4' } })
    fireEvent.blur(screen.getByLabelText('Day'))

    expect(screen.getByRole('alert').textContent).toBe('Enter a year')
    expect(screen.getByTestId<HTMLInputElement>('date-value').value).toBe('')
  })

  it('rejects a birth date in the future', () => {
    render(<ThreePartsDateInput label="Date of birth" name="dob" birthDate params={{ today: '2023-06-01' }} />)

    fireEvent.change(screen.getByLabelText('Month'), { target: { value: '7' } })
    fireEvent.change(screen.getByLabelText('Day'), { target: { value: '4' } })
    fireEvent.change(screen.getByLabelText('Year'), { target: { value: '2023' } })
    fireEvent.blur(screen.getByLabelText('Year'))

    expect(screen.getByRole('alert').textContent).toBe('Answer with a date of birth (7/4/2023 is in the future)')
  })
})

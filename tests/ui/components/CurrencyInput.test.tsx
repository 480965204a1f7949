import { render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import { describe, it, expect, vi } from 'vitest'
import { CurrencyInput } from '../../../src/ui/components/CurrencyInput.tsx'

describe('CurrencyInput', () => {
  it('renders label and formatted value', () => {
    render(<CurrencyInput label="Rent" value={120000} onChange={() => {}} />)
    expect(screen.getByText('Rent')).toBeDefined()
    expect(screen.getByRole<HTMLInputElement>('textbox').value).toBe('$1,200.00')
  })

  it('shows the plain amount while editing', async () => {
    const user = userEvent.setup()
    render(<CurrencyInput label="Rent" value={120050} onChange={() => {}} />)
    const input = screen.getByRole<HTMLInputElement>('textbox')
    await user.click(input)
    expect(input.value).toBe('1200.5')
  })

  it('emits cents on blur', async () => {
    const user = userEvent.setup()
    const onChange = vi.fn()
    render(<CurrencyInput label="Rent" value={0} onChange={onChange} />)

    const input = screen.getByRole('textbox')
    await user.click(input)
    await user.type(input, '$1,200.50')
    await user.tab()

    expect(onChange).toHaveBeenCalledWith(120050)
  })

  it('treats a cleared field as 0', async () => {
    const user = userEvent.setup()
    const onChange = vi.fn()
    render(<CurrencyInput label="Rent" value={5000} onChange={onChange} />)

    const input = screen.getByRole('textbox')
    await user.click(input)
    await user.clear(input)
    await user.tab()

    expect(onChange).toHaveBeenCalledWith(0)
  })

  it('links the helper text', () => {
    render(<CurrencyInput label="Rent" value={0} onChange={() => {}} helperText="Before utilities" />)
    const helper = screen.getByText('Before utilities')
    expect(screen.getByRole('textbox').getAttribute('aria-describedby')).toBe(helper.id)
  })
})

import { render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import { describe, it, expect, vi } from 'vitest'
import { QuickExitButton } from '../../../src/ui/components/QuickExitButton.tsx'
import { configure } from '../../../src/config.ts'

describe('QuickExitButton', () => {
  it('leaves for the configured page', async () => {
    const user = userEvent.setup()
    const leave = vi.fn()
    configure({ quickExitUrl: 'https://example.com/weather' })
    render(<QuickExitButton leave={leave} />)

    await user.click(screen.getByRole('button', { name: 'Exit' }))

    expect(leave).toHaveBeenCalledWith('https://example.com/weather')
  })

  it('takes its own label and page', async () => {
    const user = userEvent.setup()
    const leave = vi.fn()
    render(<QuickExitButton label="Leave now" url="https://example.org/" leave={leave} />)

    await user.click(screen.getByRole('button', { name: 'Leave now' }))

    expect(leave).toHaveBeenCalledWith('https://example.org/')
  })
})

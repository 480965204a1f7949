import { render, screen } from '@testing-library/react'
import { describe, it, expect } from 'vitest'
import { MemoryRouter } from 'react-router-dom'
import { Sidebar } from '../../../src/ui/components/Sidebar.tsx'
import type { SidebarStep } from '../../../src/ui/components/Sidebar.tsx'

const STEPS: SidebarStep[] = [
  { id: 'welcome', label: 'Welcome', path: '/', section: 'getting-started', isComplete: true, status: 'completed' },
  { id: 'income-sources', label: 'Income Sources', path: '/interview/income-sources', section: 'getting-started', isComplete: false, status: 'current' },
  { id: 'incomes', label: 'Other Income', path: '/interview/incomes', section: 'income', isComplete: false, status: 'pending', count: 3 },
  { id: 'summary', label: 'Summary', path: '/interview/summary', section: 'review', isComplete: false, status: 'pending' },
]

function renderSidebar(leftOverMonthly?: string) {
  return render(
    <MemoryRouter initialEntries={['/interview/income-sources']}>
      <Sidebar steps={STEPS} leftOverMonthly={leftOverMonthly} />
    </MemoryRouter>,
  )
}

describe('Sidebar', () => {
  it('groups steps under their section headers', () => {
    renderSidebar()
    expect(screen.getByText('Getting Started')).toBeDefined()
    expect(screen.getByText('Income')).toBeDefined()
    expect(screen.getByText('Review')).toBeDefined()
  })

  it('links each step', () => {
    renderSidebar()
    expect(screen.getByRole('link', { name: /other income/i }).getAttribute('href')).toBe('/interview/incomes')
  })

  it('reports progress', () => {
    renderSidebar()
    expect(screen.getByText('1 of 4 complete')).toBeDefined()
    expect(screen.getByRole('progressbar').getAttribute('aria-valuenow')).toBe('25')
  })

  it('counts finished steps in each section', () => {
    renderSidebar()
    expect(screen.getByLabelText('1 of 2 done').textContent).toBe('1/2')
    expect(screen.getAllByLabelText('0 of 1 done')).toHaveLength(2)
  })

  it('shows how many records a step holds', () => {
    renderSidebar()
    expect(screen.getByLabelText('3 added').textContent).toBe('3')
  })

  it('shows the monthly amount left over when given', () => {
    renderSidebar('$1,083.33')
    expect(screen.getByTestId('sidebar-left-over').textContent).toBe('$1,083.33')
  })

  it('offers a quick exit', () => {
    renderSidebar()
    expect(screen.getByRole('button', { name: 'Exit' })).toBeDefined()
    expect(screen.queryByTestId('sidebar-left-over')).toBeNull()
  })
})

import { useState } from 'react'
import { Outlet, useLocation } from 'react-router-dom'
import { Menu } from 'lucide-react'
import { Sidebar } from './Sidebar.tsx'
import type { SidebarStep } from './Sidebar.tsx'
import { useInterview } from '../../interview/useInterview.ts'
import { useStatementStore } from '../../store/statementStore.ts'
import { netAvailable } from '../pages/SummaryPage.tsx'
import { totalText } from './FormFields.tsx'
import { QuickExitButton } from './QuickExitButton.tsx'

export function AppShell() {
  const [sidebarOpen, setSidebarOpen] = useState(false)
  const location = useLocation()
  const { steps } = useInterview()
  const statement = useStatementStore((s) => s.statement)

  const sidebarSteps: SidebarStep[] = steps.map((step) => ({
    id: step.id,
    label: step.label,
    path: step.path,
    section: step.section,
    isComplete: step.isComplete(statement),
    status:
      step.path === location.pathname
        ? 'current'
        : step.isComplete(statement)
          ? 'completed'
          : 'pending',
    count: step.count?.(statement),
  }))

  return (
    <div className="flex h-screen bg-white">
      <a href="#main-content" className="sr-only focus:not-sr-only focus:absolute focus:z-50 focus:top-2 focus:left-2 focus:bg-white focus:px-4 focus:py-2 focus:text-sm focus:font-medium focus:text-blue-700 focus:border focus:border-blue-300 focus:rounded-md focus:shadow-md">
        Skip to main content
      </a>
      {sidebarOpen && (
        <div
          className="fixed inset-0 bg-black/30 z-20 lg:hidden"
          onClick={() => setSidebarOpen(false)}
        />
      )}

      <aside
        className={`fixed inset-y-0 left-0 z-30 w-60 bg-gray-50 border-r border-gray-200 transition-transform lg:translate-x-0 lg:static lg:z-auto ${
          sidebarOpen ? 'translate-x-0' : '-translate-x-full'
        }`}
      >
        <Sidebar steps={sidebarSteps} leftOverMonthly={totalText(() => netAvailable(statement, 12))} />
      </aside>

      <div className="flex-1 flex flex-col min-w-0">
        <header className="flex items-center gap-3 px-4 py-3 border-b border-gray-200 bg-white lg:hidden">
          <button
            onClick={() => setSidebarOpen(true)}
            className="flex items-center justify-center h-11 w-11 -ml-2 rounded-lg text-gray-500 hover:text-gray-900 hover:bg-gray-100 transition-colors"
            aria-label="Open sidebar"
          >
            <Menu size={20} />
          </button>
          <span className="flex-1 font-bold text-gray-900">Financial Statement</span>
          <QuickExitButton />
        </header>

        <main id="main-content" tabIndex={-1} className="flex-1 overflow-y-auto p-4 sm:p-6">
          <Outlet />
        </main>
      </div>
    </div>
  )
}

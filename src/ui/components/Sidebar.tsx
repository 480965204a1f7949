import { NavLink } from 'react-router-dom'
import { Check } from 'lucide-react'
import type { InterviewSection } from '../../interview/steps.ts'
import { QuickExitButton } from './QuickExitButton.tsx'

export interface SidebarStep {
  id: string
  label: string
  path: string
  section: InterviewSection
  isComplete: boolean
  status: 'completed' | 'current' | 'pending'
  /** Records entered on the step; left out for steps without a list. */
  count?: number
}

interface SidebarProps {
  steps: SidebarStep[]
  /** Monthly amount left after expenses, already formatted. */
  leftOverMonthly?: string
}

const SECTION_LABELS: Record<InterviewSection, string> = {
  'getting-started': 'Getting Started',
  'income': 'Income',
  'assets-expenses': 'Assets & Expenses',
  'review': 'Review',
}

interface SectionGroup {
  section: InterviewSection
  steps: { step: SidebarStep; index: number }[]
}

function groupBySection(steps: SidebarStep[]): SectionGroup[] {
  const groups: SectionGroup[] = []
  steps.forEach((step, index) => {
    const last = groups[groups.length - 1]
    if (last && last.section === step.section) {
      last.steps.push({ step, index })
    } else {
      groups.push({ section: step.section, steps: [{ step, index }] })
    }
  })
  return groups
}

const BADGE_CLASSES: Record<SidebarStep['status'], string> = {
  completed: 'bg-emerald-500 text-white',
  current: 'bg-brand text-white font-bold',
  pending: 'border-2 border-gray-200 text-gray-400 font-medium',
}

function StepBadge({ status, index }: { status: SidebarStep['status']; index: number }) {
  return (
    <span
      className={`flex items-center justify-center w-5 h-5 rounded-full text-[10px] shrink-0 ${BADGE_CLASSES[status]}`}
      aria-label={status}
    >
      {status === 'completed' ? <Check size={12} strokeWidth={3} aria-hidden="true" /> : index + 1}
    </span>
  )
}

export function Sidebar({ steps, leftOverMonthly }: SidebarProps) {
  const completedCount = steps.filter((s) => s.isComplete).length
  const percent = steps.length > 0 ? Math.round((completedCount / steps.length) * 100) : 0

  return (
    <nav className="flex flex-col h-full" aria-label="Interview steps">
      <div className="flex items-start justify-between gap-2 px-4 py-4 border-b border-gray-200">
        <div>
          <span className="text-base font-bold text-gray-900 tracking-tight">Financial Statement</span>
          <p className="text-[11px] text-gray-400 mt-0.5">Income, assets and expenses</p>
        </div>
        <QuickExitButton />
      </div>

      <ul className="flex-1 overflow-y-auto py-2 px-2">
        {groupBySection(steps).map((group) => {
          const done = group.steps.filter(({ step }) => step.isComplete).length
          return (
            <li key={group.section}>
              <div className="flex justify-between px-3 pt-3 pb-1 text-[10px] font-semibold uppercase tracking-wider text-gray-400">
                <span>{SECTION_LABELS[group.section]}</span>
                <span aria-label={`${done} of ${group.steps.length} done`}>{done}/{group.steps.length}</span>
              </div>
              <ul className="space-y-0.5">
                {group.steps.map(({ step, index }) => (
                  <li key={step.id}>
                    <NavLink
                      to={step.path}
                      className={({ isActive }) =>
                        `flex items-center gap-2.5 px-3 py-2.5 text-sm rounded-md transition-colors ${
                          isActive ? 'bg-blue-50 text-brand font-medium' : step.isComplete ? 'text-gray-600 hover:bg-gray-100' : 'text-gray-400 hover:bg-gray-50'
                        }`
                      }
                    >
                      <StepBadge status={step.isComplete && step.status === 'current' ? 'completed' : step.status} index={index} />
                      <span className="flex-1 leading-tight">{step.label}</span>
                      {step.count !== undefined && step.count > 0 && (
                        <span className="rounded-full bg-gray-200 px-1.5 text-[10px] text-gray-600" aria-label={`${step.count} added`}>
                          {step.count}
                        </span>
                      )}
                    </NavLink>
                  </li>
                ))}
              </ul>
            </li>
          )
        })}
      </ul>

      <div className="px-4 py-3 border-t border-gray-200 flex flex-col gap-2">
        {leftOverMonthly !== undefined && (
          <div className="flex justify-between text-xs">
            <span className="text-gray-500">Left over each month</span>
            <span className="font-semibold text-gray-900 tabular-nums" data-testid="sidebar-left-over">{leftOverMonthly}</span>
          </div>
        )}
        <div className="flex justify-between text-[11px]">
          <span className="text-gray-400">{completedCount} of {steps.length} complete</span>
          <span className="font-medium text-gray-500">{percent}%</span>
        </div>
        <div
          className="h-1.5 bg-gray-100 rounded-full overflow-hidden"
          role="progressbar"
          aria-valuenow={percent}
          aria-valuemin={0}
          aria-valuemax={100}
          aria-label={`Interview progress: ${completedCount} of ${steps.length} steps complete`}
        >
          <div
            className={`h-full rounded-full transition-all duration-300 ${percent === 100 ? 'bg-emerald-500' : 'bg-brand'}`}
            style={{ width: `${percent}%` }}
          />
        </div>
      </div>
    </nav>
  )
}

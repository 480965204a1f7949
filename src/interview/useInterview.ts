import { useLocation, useNavigate } from 'react-router-dom'
import { useStatementStore } from '../store/statementStore.ts'
import { STEPS } from './steps.ts'

export function useInterview() {
  const statement = useStatementStore((s) => s.statement)
  const location = useLocation()
  const navigate = useNavigate()

  const visibleSteps = STEPS.filter((s) => s.isVisible(statement))
  const currentIndex = visibleSteps.findIndex(
    (s) => s.path === location.pathname,
  )

  const progress = {
    current: currentIndex + 1,
    total: visibleSteps.length,
    percent:
      visibleSteps.length > 0
        ? Math.round(((currentIndex + 1) / visibleSteps.length) * 100)
        : 0,
    completedCount: visibleSteps.filter((s) => s.isComplete(statement)).length,
  }

  const stepAt = (index: number) => (index >= 0 && index < visibleSteps.length ? visibleSteps[index] : undefined)

  return {
    steps: visibleSteps,
    currentStep: stepAt(currentIndex),
    currentIndex,
    progress,

    goNext: () => {
      const next = stepAt(currentIndex + 1)
      if (next) navigate(next.path)
    },
    goPrev: () => {
      const prev = stepAt(currentIndex - 1)
      if (prev && currentIndex > 0) navigate(prev.path)
    },
    goToStep: (stepId: string) => {
      const step = visibleSteps.find((s) => s.id === stepId)
      if (step) navigate(step.path)
    },
    canGoNext: currentIndex < visibleSteps.length - 1,
    canGoPrev: currentIndex > 0,
  }
}

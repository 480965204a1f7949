import { Navigate, useParams } from 'react-router-dom'
import { STEPS } from '../../interview/steps.ts'
import { useStatementStore } from '../../store/statementStore.ts'

/** Renders the step named in the URL, sending hidden or unknown steps back to the checklist. */
export function InterviewRouter() {
  const { stepId } = useParams()
  const statement = useStatementStore((s) => s.statement)
  const step = STEPS.find((s) => s.id === stepId)

  if (!step || !step.isVisible(statement)) {
    return <Navigate to="/interview/income-sources" replace />
  }

  const Component = step.component
  return <Component />
}

import { BrowserRouter, Navigate, Route, Routes } from 'react-router-dom'
import { AppShell } from './ui/components/AppShell.tsx'
import { InterviewRouter } from './ui/pages/InterviewRouter.tsx'
import { WelcomePage } from './ui/pages/WelcomePage.tsx'

function App() {
  return (
    <BrowserRouter>
      <Routes>
        <Route element={<AppShell />}>
          <Route index element={<WelcomePage />} />
          <Route path="interview/:stepId" element={<InterviewRouter />} />
        </Route>
        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
    </BrowserRouter>
  )
}

export default App

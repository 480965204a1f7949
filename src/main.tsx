import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import App from './App.tsx'
import './index.css'
import { installWidgets } from './ui/mountWidgets.tsx'

const container = document.getElementById('root')

if (container) {
  createRoot(container).render(
    <StrictMode>
      <App />
    </StrictMode>,
  )
} else {
  // Embedded in a host interview page: mount widgets into its placeholders
  installWidgets(document)
}

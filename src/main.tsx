import { StrictMode, Component } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App.tsx'
import { describeFatalError } from './ui/errorReport/errorReport'
import type { FatalErrorSummary } from './ui/errorReport/errorReport'

interface ErrorBoundaryState { fatal: FatalErrorSummary | null }

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  state: ErrorBoundaryState = { fatal: null }
  static getDerivedStateFromError(error: unknown): ErrorBoundaryState {
    return { fatal: describeFatalError(error) }
  }
  render() {
    const { fatal } = this.state
    if (!fatal) return this.props.children
    return (
      <div className="fatal-error" role="alert">
        <h2>Something went wrong</h2>
        <p>The sizing tool stopped on an unexpected error. Reload the page to start again.</p>
        <button className="cta-btn" onClick={() => window.location.reload()}>Reload</button>
        <div className="error-panel">
          <strong>{fatal.code}</strong>
          <pre>{fatal.message}</pre>
        </div>
      </div>
    )
  }
}

const rootElement = document.getElementById('root')
if (!rootElement) throw new Error('Missing #root element in index.html')

createRoot(rootElement).render(
  <StrictMode>
    <ErrorBoundary>
      <App />
    </ErrorBoundary>
  </StrictMode>,
)

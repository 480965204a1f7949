import { useNavigate } from 'react-router-dom'

export function WelcomePage() {
  const navigate = useNavigate()

  return (
    <div data-testid="page-welcome" className="max-w-xl mx-auto py-8 sm:py-12 px-4 sm:px-0 text-center">
      <h1 className="text-2xl sm:text-3xl font-bold text-gray-900">
        Your financial statement
      </h1>
      <p className="mt-3 text-base sm:text-lg text-gray-600">
        We will ask about your income, what you own and what you spend each month.
        Your answers stay in this browser.
      </p>
      <button
        type="button"
        onClick={() => navigate('/interview/income-sources')}
        className="mt-8 w-full sm:w-auto px-6 py-3.5 sm:py-3 bg-brand text-white font-medium rounded-lg hover:bg-blue-900 active:bg-blue-950 transition-colors"
      >
        Let's Start
      </button>
    </div>
  )
}

import { LogOut } from 'lucide-react'
import { getConfig } from '../../config.ts'
import { Button } from './Button.tsx'

interface QuickExitButtonProps {
  label?: string
  /** Page to leave for. Defaults to the configured quick-exit page. */
  url?: string
  /** Navigation used on click; replaces the page so Back does not return here. */
  leave?: (url: string) => void
  className?: string
}

function replacePage(url: string) {
  window.location.replace(url)
}

/** Leaves the interview at once for a neutral site. */
export function QuickExitButton({ label = 'Exit', url, leave = replacePage, className }: QuickExitButtonProps) {
  return (
    <Button
      variant="exit"
      size="sm"
      icon={LogOut}
      className={className}
      title="Leave this site now"
      onClick={() => leave(url ?? getConfig().quickExitUrl)}
    >
      {label}
    </Button>
  )
}

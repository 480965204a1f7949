import { useState } from 'react'
import { Share2 } from 'lucide-react'
import { Button } from './Button.tsx'
import { ClipboardTooltip, copyToClipboard } from './CopyButton.tsx'
import type { TooltipState } from './CopyButton.tsx'
import { describeError, logger } from '../../utils/logger.ts'

const log = logger.child({ widget: 'share' })

interface ShareButtonProps {
  text: string
  /** Title passed to the device share sheet. */
  title?: string
  label?: string
  tooltipInertText?: string
  /** Defaults to "Copied: " followed by the text. */
  tooltipCopiedText?: string
}

function canShare(): boolean {
  return typeof navigator !== 'undefined' && typeof navigator.share === 'function'
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError'
}

/**
 * Opens the device share sheet where the browser has one and copies the
 * text to the clipboard everywhere else.
 */
export function ShareButton({
  text,
  title,
  label = 'Share',
  tooltipInertText = 'Copy to clipboard',
  tooltipCopiedText,
}: ShareButtonProps) {
  const [tooltip, setTooltip] = useState<TooltipState>('hidden')
  const native = canShare()

  const handleClick = async () => {
    try {
      if (native) {
        await navigator.share({ text, title })
        return
      }
      await copyToClipboard(text)
      setTooltip('copied')
    } catch (err) {
      // The user closed the share sheet
      if (isAbort(err)) return
      log.warn('Share button click failed', { error: describeError(err) })
    }
  }

  return (
    <div className="relative inline-block">
      {!native && (
        <ClipboardTooltip
          state={tooltip}
          inertText={tooltipInertText}
          copiedText={tooltipCopiedText ?? `Copied: ${text}`}
        />
      )}
      <Button
        variant="secondary"
        onMouseEnter={() => setTooltip('inert')}
        onMouseLeave={() => setTooltip('hidden')}
        onClick={handleClick}
      >
        <Share2 size={14} />
        {label}
      </Button>
    </div>
  )
}

import { useState } from 'react'
import { Copy } from 'lucide-react'
import { Button } from './Button.tsx'
import { cn } from '../../lib/utils.ts'
import { describeError, logger } from '../../utils/logger.ts'

const log = logger.child({ widget: 'copy' })

export type TooltipState = 'hidden' | 'inert' | 'copied'

export async function copyToClipboard(text: string): Promise<void> {
  await navigator.clipboard.writeText(text)
}

interface ClipboardTooltipProps {
  state: TooltipState
  inertText: string
  copiedText: string
}

/** The hover bubble over a copy or share button. */
export function ClipboardTooltip({ state, inertText, copiedText }: ClipboardTooltipProps) {
  if (state === 'hidden') return null
  return (
    <span
      role="tooltip"
      className="absolute bottom-full left-1/2 -translate-x-1/2 mb-1 whitespace-nowrap rounded bg-gray-900 px-2 py-1 text-xs text-white"
    >
      {state === 'inert' ? inertText : copiedText}
    </span>
  )
}

interface CopyButtonProps {
  text: string
  /** Prompt shown before the copyable text. */
  textBefore?: string
  label?: string
  tooltipInertText?: string
  tooltipCopiedText?: string
  /** Show the text in a read-only block instead of a one-line field. */
  block?: boolean
  scrollable?: boolean
  className?: string
}

export function CopyButton({
  text,
  textBefore,
  label = 'Copy',
  tooltipInertText = 'Copy to clipboard',
  tooltipCopiedText = 'Copied!',
  block = false,
  scrollable = true,
  className,
}: CopyButtonProps) {
  const [tooltip, setTooltip] = useState<TooltipState>('hidden')

  const handleClick = async () => {
    try {
      await copyToClipboard(text)
      setTooltip('copied')
    } catch (err) {
      log.warn('Copy button click failed', { error: describeError(err) })
    }
  }

  const fieldClass = 'w-full border border-gray-300 rounded-md px-3 py-2 text-sm text-gray-900'

  return (
    <div className={cn('flex flex-col gap-2', className)}>
      {textBefore && <span className="text-sm text-gray-700">{textBefore}</span>}
      {block ? (
        <textarea
          readOnly
          aria-label={textBefore ?? 'Text to copy'}
          className={cn(fieldClass, 'bg-gray-50', scrollable ? 'max-h-64 overflow-y-auto' : 'overflow-hidden')}
          value={text}
        />
      ) : (
        <input readOnly type="text" aria-label={textBefore ?? 'Text to copy'} className={fieldClass} value={text} />
      )}
      <div className="relative self-start">
        <ClipboardTooltip state={tooltip} inertText={tooltipInertText} copiedText={tooltipCopiedText} />
        <Button
          variant="secondary"
          onMouseEnter={() => setTooltip('inert')}
          onMouseLeave={() => setTooltip('hidden')}
          onClick={handleClick}
        >
          <Copy size={14} />
          {label}
        </Button>
      </div>
    </div>
  )
}

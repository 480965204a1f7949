import { useId, useState } from 'react'
import { ChevronDown, ChevronRight } from 'lucide-react'
import { cn } from '../../lib/utils.ts'
import { CopyButton } from './CopyButton.tsx'

interface DisplayTemplateProps {
  subject?: string
  content: string
  scrollable?: boolean
  /** Hide the content behind the subject until it is clicked. */
  collapse?: boolean
  copy?: boolean
  className?: string
  containerClassName?: string
}

function Paragraphs({ text }: { text: string }) {
  return (
    <>
      {text.split(/\n\s*\n/).map((paragraph, i) => (
        <p key={i} className="mb-2 whitespace-pre-line">{paragraph}</p>
      ))}
    </>
  )
}

export function DisplayTemplate({
  subject = '',
  content,
  scrollable = true,
  collapse = false,
  copy = false,
  className = 'bg-gray-50',
  containerClassName,
}: DisplayTemplateProps) {
  const panelId = useId()
  const [open, setOpen] = useState(!collapse)
  const scrollClass = scrollable ? 'max-h-64 overflow-y-auto' : ''

  const body = copy ? (
    <CopyButton text={content} block scrollable={scrollable} className={className} />
  ) : (
    <div className={cn('rounded-md border border-gray-200 p-3 pb-1 text-sm text-gray-800', scrollClass, className)}>
      <Paragraphs text={content} />
    </div>
  )

  return (
    <div className={cn('flex flex-col gap-2', containerClassName)} data-testid="display-template">
      {collapse ? (
        <button
          type="button"
          className="flex items-center gap-1 text-sm font-semibold text-gray-800"
          aria-expanded={open}
          aria-controls={panelId}
          onClick={() => setOpen(!open)}
        >
          {open ? <ChevronDown size={14} /> : <ChevronRight size={14} />}
          {subject}
        </button>
      ) : (
        subject && <h3 className="text-sm font-semibold text-gray-800">{subject}</h3>
      )}
      {open && <div id={panelId}>{body}</div>}
    </div>
  )
}

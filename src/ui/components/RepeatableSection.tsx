import type { ReactNode } from 'react'
import { Trash2, Plus } from 'lucide-react'
import { Button } from './Button.tsx'

const ACCENT_COLORS = ['#3b82f6', '#10b981', '#f59e0b', '#f43f5e', '#8b5cf6']

interface RepeatableSectionProps<T extends { id: string }> {
  label: string
  items: T[]
  renderItem: (item: T, index: number) => ReactNode
  onAdd: () => void
  onRemove: (id: string) => void
  addLabel?: string
  emptyMessage?: string
  /** Shown under the list, typically the list total. */
  footer?: ReactNode
}

export function RepeatableSection<T extends { id: string }>({
  label,
  items,
  renderItem,
  onAdd,
  onRemove,
  addLabel = 'Add',
  emptyMessage = 'Nothing added yet.',
  footer,
}: RepeatableSectionProps<T>) {
  return (
    <div className="flex flex-col gap-3">
      <div className="flex items-center justify-between">
        <h3 className="text-sm font-semibold text-gray-800">{label}</h3>
        <Button variant="outline" size="sm" icon={Plus} onClick={onAdd}>
          {addLabel}
        </Button>
      </div>

      {items.length === 0 ? (
        <p className="text-sm text-gray-500 italic">{emptyMessage}</p>
      ) : (
        <ul className="flex flex-col gap-3">
          {items.map((item, index) => (
            <li
              key={item.id}
              className="relative border border-gray-200 border-l-4 rounded-md p-3 pr-10"
              style={{ borderLeftColor: ACCENT_COLORS[index % ACCENT_COLORS.length] }}
            >
              <div>{renderItem(item, index)}</div>
              <Button
                variant="destructive"
                size="icon"
                onClick={() => onRemove(item.id)}
                aria-label={`Remove item ${index + 1}`}
                className="absolute top-2 right-2"
                title="Remove"
                icon={Trash2}
              />
            </li>
          ))}
        </ul>
      )}
      {footer}
    </div>
  )
}

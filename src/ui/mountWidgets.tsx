/**
 * Mounts toolbox widgets into server-rendered interview screens.
 *
 * The host page marks placeholders with `data-toolbox-widget="<kind>"` and
 * passes settings as further `data-*` attributes. Each time the host fires
 * its page-load event, every unmounted placeholder gets its widget.
 *
 *   <div data-toolbox-widget="copy" data-text="Case 123"></div>
 */

import { Component } from 'react'
import type { ReactElement, ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import type { Root } from 'react-dom/client'
import { getConfig } from '../config.ts'
import { parseDate } from '../calendar/isoDate.ts'
import { describeError, logger } from '../utils/logger.ts'
import { CharacterCounter } from './components/CharacterCounter.tsx'
import { CopyButton } from './components/CopyButton.tsx'
import { ShareButton } from './components/ShareButton.tsx'
import { PhoneNumberInput } from './components/PhoneNumberInput.tsx'
import { ThreePartsDateInput } from './components/ThreePartsDateInput.tsx'
import { DisplayTemplate } from './components/DisplayTemplate.tsx'
import { QuickExitButton } from './components/QuickExitButton.tsx'

const log = logger.child({ module: 'mountWidgets' })

const MOUNTED = 'toolboxMounted'

type WidgetFactory = (data: DOMStringMap) => ReactElement

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  return value !== 'false'
}

/** A date setting the widget can read, or undefined after a warning. */
function dateSetting(kind: string, value: string | undefined): string | undefined {
  if (!value) return undefined
  try {
    parseDate(value)
    return value
  } catch (err) {
    log.warn('Ignoring invalid date setting', { kind, value, error: describeError(err) })
    return undefined
  }
}

interface WidgetBoundaryProps {
  kind: string
  children: ReactNode
}

/** Keeps one widget's render failure from taking down the rest of the screen. */
class WidgetBoundary extends Component<WidgetBoundaryProps, { failed: boolean }> {
  state = { failed: false }

  static getDerivedStateFromError() {
    return { failed: true }
  }

  componentDidCatch(error: Error) {
    log.warn('Widget failed to render', { kind: this.props.kind, error: describeError(error) })
  }

  render() {
    return this.state.failed ? null : this.props.children
  }
}

export const WIDGETS: Record<string, WidgetFactory> = {
  'character-counter': (data) => (
    <CharacterCounter
      label={data.label ?? ''}
      name={data.name}
      defaultValue={data.value}
      multiline={flag(data.multiline, false)}
    />
  ),
  copy: (data) => (
    <CopyButton
      text={data.text ?? ''}
      textBefore={data.textBefore}
      label={data.label}
      tooltipInertText={data.tooltipInert}
      tooltipCopiedText={data.tooltipCopied}
    />
  ),
  share: (data) => (
    <ShareButton
      text={data.text ?? ''}
      title={data.title}
      label={data.label}
      tooltipInertText={data.tooltipInert}
      tooltipCopiedText={data.tooltipCopied}
    />
  ),
  phone: (data) => (
    <PhoneNumberInput label={data.label ?? ''} name={data.name} defaultValue={data.value} country={data.country} />
  ),
  'three-parts-date': (data) => (
    <ThreePartsDateInput
      label={data.label ?? ''}
      name={data.name}
      defaultValue={dateSetting('three-parts-date', data.value)}
      params={{ min: data.min, max: data.max, minMessage: data.minMessage, maxMessage: data.maxMessage, defaultMessage: data.defaultMessage }}
    />
  ),
  'birth-date': (data) => (
    <ThreePartsDateInput
      birthDate
      label={data.label ?? ''}
      name={data.name}
      defaultValue={dateSetting('birth-date', data.value)}
      params={{ min: data.min, max: data.max, minMessage: data.minMessage, maxMessage: data.maxMessage, defaultMessage: data.defaultMessage }}
    />
  ),
  'quick-exit': (data) => <QuickExitButton label={data.label} url={data.url} />,
  'display-template': (data) => (
    <DisplayTemplate
      subject={data.subject}
      content={data.content ?? ''}
      scrollable={flag(data.scrollable, true)}
      collapse={flag(data.collapse, false)}
      copy={flag(data.copy, false)}
    />
  ),
}

/** Mount every placeholder under `doc` that has no widget yet. Returns the new roots. */
export function mountWidgets(doc: ParentNode): Root[] {
  const roots: Root[] = []
  for (const element of doc.querySelectorAll<HTMLElement>('[data-toolbox-widget]')) {
    if (element.dataset[MOUNTED]) continue
    const kind = element.dataset.toolboxWidget ?? ''
    try {
      const factory = WIDGETS[kind]
      if (!factory) {
        log.warn('Unknown widget', { kind })
        continue
      }
      const root = createRoot(element)
      root.render(<WidgetBoundary kind={kind}>{factory(element.dataset)}</WidgetBoundary>)
      element.dataset[MOUNTED] = 'true'
      roots.push(root)
    } catch (err) {
      log.warn('Widget failed to mount', { kind, error: describeError(err) })
    }
  }
  return roots
}

/**
 * Listen for the host's page-load event and mount widgets each time it
 * fires. Returns a function that stops listening and unmounts everything.
 */
export function installWidgets(doc: Document = document, eventName: string = getConfig().pageLoadEvent): () => void {
  const roots: Root[] = []
  const onPageLoad = () => {
    roots.push(...mountWidgets(doc))
  }
  doc.addEventListener(eventName, onPageLoad)
  log.debug('Widgets installed', { eventName })

  return () => {
    doc.removeEventListener(eventName, onPageLoad)
    for (const root of roots.splice(0)) {
      try {
        root.unmount()
      } catch (err) {
        log.warn('Widget failed to unmount', { error: describeError(err) })
      }
    }
  }
}

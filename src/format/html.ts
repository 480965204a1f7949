/**
 * Small HTML snippets for question text rendered by the host.
 */

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch])
}

/** A phone number the reader can tap to dial. */
export function tel(phoneNumber: string | number): string {
  const text = escapeHtml(String(phoneNumber))
  return `<a href="tel:${text}">${text}</a>`
}

export interface IconOptions {
  /** Theme color variable name, e.g. "primary". */
  color?: string | null
  /** Any CSS color; wins over `color`. */
  colorCss?: string
  size?: 'xs' | 'sm' | 'lg' | '2x'
}

/**
 * Font Awesome icon markup. With neither color set the host's
 * `:icon:` shorthand is returned instead.
 *
 *   faIcon('phone')                    → '<i class="fa fa-phone fa-sm" style="color:var(--primary);"></i>'
 *   faIcon('phone', { colorCss: 'red' }) → '<i class="fa fa-phone fa-sm" style="color:red;"></i>'
 */
export function faIcon(icon: string, options: IconOptions = {}): string {
  const color = options.color === undefined ? 'primary' : options.color
  const size = options.size ?? 'sm'
  const name = escapeHtml(icon)
  if (!color && !options.colorCss) return `:${name}:`
  const style = options.colorCss ? escapeHtml(options.colorCss) : `var(--${escapeHtml(color ?? '')})`
  return `<i class="fa fa-${name} fa-${size}" style="color:${style};"></i>`
}

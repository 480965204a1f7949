/**
 * Toolbox-wide settings.
 *
 * Defaults suit a Massachusetts court interview in US English. Interviews
 * for another jurisdiction call `configure()` once at start-up.
 */

import { z } from 'zod'

export const toolboxConfigSchema = z.object({
  locale: z.string().min(2).default('en-US'),
  currency: z.string().regex(/^[A-Z]{3}$/, 'Currency must be a 3-letter ISO code').default('USD'),
  holidayCountry: z.string().regex(/^[A-Z]{2}$/, 'Country must be a 2-letter uppercase code').default('US'),
  holidaySubdivision: z.string().default('MA'),
  defaultPhoneCountry: z.string().regex(/^[A-Z]{2}$/, 'Country must be a 2-letter uppercase code').default('US'),
  /** DOM event the host fires on `document` after each screen renders. */
  pageLoadEvent: z.string().min(1).default('interview:pageload'),
  /** Page the quick-exit button leaves for. */
  quickExitUrl: z.string().url('Quick exit must be a full URL').default('https://www.google.com/'),
  /** Earliest year a three-part date may have. */
  dateMinYear: z.number().int().default(1000),
})

export type ToolboxConfig = z.infer<typeof toolboxConfigSchema>

let current: ToolboxConfig = toolboxConfigSchema.parse({})

export function getConfig(): ToolboxConfig {
  return current
}

/** Merge overrides into the active settings. Throws a ZodError on invalid values. */
export function configure(overrides: Partial<ToolboxConfig>): ToolboxConfig {
  current = toolboxConfigSchema.parse({ ...current, ...overrides })
  return current
}

export function resetConfig(): void {
  current = toolboxConfigSchema.parse({})
}

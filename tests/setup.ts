/**
 * Vitest global setup. Every test starts from the default toolbox settings.
 */

import { afterEach } from 'vitest'
import { resetConfig } from '../src/config.ts'

afterEach(() => {
  resetConfig()
})

import { describe, it, expect, beforeEach, vi } from 'vitest'

// Mock idb — IndexedDB is not available in the node test environment
const fakeStore = new Map<string, unknown>()
vi.mock('idb', () => ({
  openDB: vi.fn(() => Promise.resolve({
    get: vi.fn((_, key: string) => Promise.resolve(fakeStore.get(key))),
    put: vi.fn((_, value: unknown, key: string) => { fakeStore.set(key, value); return Promise.resolve() }),
    delete: vi.fn((_, key: string) => { fakeStore.delete(key); return Promise.resolve() }),
  })),
}))

// Import store after mock is in place
const { useStatementStore } = await import('../../src/store/statementStore.ts')

import { emptyFinancialStatement } from '../../src/model/types.ts'
import type { FinancialStatement, Income, Job } from '../../src/model/types.ts'
import { serializeStatement } from '../../src/model/serialize.ts'
import { ValidationError } from '../../src/utils/errors.ts'

const STORAGE_KEY = 'interview-toolbox-store:statement'

/** Let pending IndexedDB writes land. */
function flushWrites() {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

beforeEach(async () => {
  useStatementStore.getState().resetStatement()
  await flushWrites()
  fakeStore.clear()
})

function getState() {
  return useStatementStore.getState()
}

// ── Test helpers ────────────────────────────────────────────────

function makeIncome(overrides: Partial<Income> = {}): Income {
  return { id: 'inc-1', source: 'SSR', value: 90000, timesPerYear: 12, ...overrides }
}

function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'job-1',
    source: 'wages',
    employer: { name: 'Acme Corp' },
    value: 200000,
    timesPerYear: 26,
    ...overrides,
  }
}

// ── Records ─────────────────────────────────────────────────────

describe('records', () => {
  it('adds, updates and removes', () => {
    getState().addRecord('incomes', makeIncome())
    getState().addRecord('incomes', makeIncome({ id: 'inc-2', source: 'pension' }))
    expect(getState().statement.incomes).toHaveLength(2)

    getState().updateRecord('incomes', 'inc-2', { value: 45000 })
    expect(getState().statement.incomes[1].value).toBe(45000)
    expect(getState().statement.incomes[0].value).toBe(90000)

    getState().removeRecord('incomes', 'inc-1')
    expect(getState().statement.incomes.map((i) => i.id)).toEqual(['inc-2'])
  })

  it('keeps lists apart', () => {
    getState().addRecord('jobs', makeJob())
    expect(getState().statement.jobs).toHaveLength(1)
    expect(getState().statement.incomes).toHaveLength(0)
  })

  it('marks a record complete', () => {
    getState().addRecord('jobs', makeJob())
    getState().markComplete('jobs', 'job-1')
    expect(getState().statement.jobs[0].complete).toBe(true)
  })
})

// ── Income checklist ────────────────────────────────────────────

describe('income checklist', () => {
  it('stores each ticked source once', () => {
    getState().setSelectedIncomeSources(['wages', 'SSR', 'wages'])
    expect(getState().statement.selectedIncomeSources).toEqual(['wages', 'SSR'])
  })

  it('adds blank incomes for new non-wage sources only', () => {
    getState().addRecord('incomes', makeIncome())
    getState().setSelectedIncomeSources(['wages', 'SSR', 'pension'])
    getState().moveChecksToIncomes()

    const incomes = getState().statement.incomes
    expect(incomes.map((i) => i.source)).toEqual(['SSR', 'pension'])
    expect(incomes[1]).toMatchObject({ displayName: 'Pension', value: 0, timesPerYear: 12 })
    expect(typeof incomes[1].id).toBe('string')
  })

  it('adds one write-in income however often it runs', () => {
    getState().setSelectedIncomeSources(['SSR', 'other'])
    getState().moveChecksToIncomes()
    getState().moveChecksToIncomes()
    getState().moveChecksToIncomes()

    expect(getState().statement.incomes.map((i) => i.source)).toEqual(['SSR', ''])
    expect(getState().statement.incomes[1].checklistSource).toBe('other')
  })

  it('drops untouched incomes whose source was unticked', () => {
    getState().setSelectedIncomeSources(['SSR', 'pension', 'alimony'])
    getState().moveChecksToIncomes()
    const pension = getState().statement.incomes[1]
    getState().updateRecord('incomes', pension.id, { value: 45000 })

    getState().setSelectedIncomeSources(['SSR'])
    getState().moveChecksToIncomes()

    expect(getState().statement.incomes.map((i) => i.source)).toEqual(['SSR', 'pension'])
  })

  it('does nothing when every source already has an income', () => {
    getState().addRecord('incomes', makeIncome())
    getState().setSelectedIncomeSources(['SSR'])
    const before = getState().statement
    getState().moveChecksToIncomes()
    expect(getState().statement).toBe(before)
  })
})

// ── Import ──────────────────────────────────────────────────────

describe('importStatement', () => {
  it('replaces the statement with a saved one', () => {
    const saved: FinancialStatement = { ...emptyFinancialStatement(), jobs: [makeJob()] }
    getState().importStatement(serializeStatement(saved))
    expect(getState().statement).toEqual(saved)
  })

  it('keeps the current statement when the file is bad', () => {
    getState().addRecord('incomes', makeIncome())
    expect(() => getState().importStatement('{"statement": {}}')).toThrow(ValidationError)
    expect(getState().statement.incomes).toHaveLength(1)
  })
})

// ── Persistence ─────────────────────────────────────────────────

describe('persistence', () => {
  it('saves the statement to IndexedDB', async () => {
    getState().addRecord('incomes', makeIncome())
    await vi.waitFor(() => {
      expect(fakeStore.get(STORAGE_KEY)).toMatchObject({
        state: { statement: { incomes: [makeIncome()] } },
      })
    })
  })

  it('restores a saved statement', async () => {
    const saved: FinancialStatement = { ...emptyFinancialStatement(), incomes: [makeIncome({ id: 'saved' })] }
    fakeStore.set(STORAGE_KEY, { state: { statement: saved }, version: 0 })
    await useStatementStore.persist.rehydrate()
    expect(getState().statement.incomes[0].id).toBe('saved')
  })

  it('discards a saved statement that no longer validates', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    getState().addRecord('jobs', makeJob())
    await flushWrites()
    fakeStore.set(STORAGE_KEY, { state: { statement: { incomes: 'nope' } }, version: 0 })
    await useStatementStore.persist.rehydrate()
    expect(getState().statement.jobs).toHaveLength(1)
    expect(String(warn.mock.calls[0][0])).toContain('Discarding saved statement that no longer validates')
    warn.mockRestore()
  })
})

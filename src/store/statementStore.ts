import { create } from 'zustand'
import { persist, type StorageValue } from 'zustand/middleware'
import { openDB } from 'idb'
import type {
  FinancialStatement,
  Income,
  StatementRecordKind,
  StatementRecordLists,
  StatementRecordMap,
} from '../model/types.ts'
import { emptyFinancialStatement } from '../model/types.ts'
import { financialStatementSchema } from '../model/schemas.ts'
import { deserializeStatement } from '../model/serialize.ts'
import { moveChecksToList } from '../income/lists.ts'
import { INCOME_TERMS, NON_WAGE_INCOME_TERMS } from '../income/terms.ts'
import { logger } from '../utils/logger.ts'

const log = logger.child({ module: 'statementStore' })

// ── Types ──────────────────────────────────────────────────────

/** Record kinds that carry a `complete` flag. */
export type CompletableKind = Exclude<StatementRecordKind, 'ledger'>

export interface StatementStoreState {
  statement: FinancialStatement

  // Actions
  addRecord: <K extends StatementRecordKind>(kind: K, record: StatementRecordMap[K]) => void
  updateRecord: <K extends StatementRecordKind>(kind: K, id: string, updates: Partial<StatementRecordMap[K]>) => void
  removeRecord: (kind: StatementRecordKind, id: string) => void
  markComplete: (kind: CompletableKind, id: string) => void
  setSelectedIncomeSources: (sources: string[]) => void
  /**
   * Sync incomes with the checklist: add a blank income for every ticked
   * non-wage source that has none yet, and drop untouched blanks whose
   * source was unticked. Running it again changes nothing.
   */
  moveChecksToIncomes: () => void
  /** Replace the statement with an exported one. Throws ValidationError on a bad file. */
  importStatement: (json: string) => void
  resetStatement: () => void
}

type PersistedState = Pick<StatementStoreState, 'statement'>

// ── IndexedDB storage adapter ──────────────────────────────────

const DB_NAME = 'interview-toolbox'
const STORE_NAME = 'state'
const KEY = 'statement'

function openStateDb() {
  return openDB(DB_NAME, 1, {
    upgrade(db) {
      if (!db.objectStoreNames.contains(STORE_NAME)) {
        db.createObjectStore(STORE_NAME)
      }
    },
  })
}

const idbStorage = {
  async getItem(name: string): Promise<StorageValue<PersistedState> | null> {
    const db = await openStateDb()
    const val: unknown = await db.get(STORE_NAME, `${name}:${KEY}`)
    return readPersisted(val)
  },
  async setItem(name: string, value: StorageValue<PersistedState>) {
    const db = await openStateDb()
    await db.put(STORE_NAME, value, `${name}:${KEY}`)
  },
  async removeItem(name: string) {
    const db = await openStateDb()
    await db.delete(STORE_NAME, `${name}:${KEY}`)
  },
}

/** Validate what IndexedDB hands back; anything unreadable starts a fresh statement. */
function readPersisted(val: unknown): StorageValue<PersistedState> | null {
  if (typeof val !== 'object' || val === null || !('state' in val)) return null
  const state = val.state
  if (typeof state !== 'object' || state === null || !('statement' in state)) return null
  const parsed = financialStatementSchema.safeParse(state.statement)
  if (!parsed.success) {
    log.warn('Discarding saved statement that no longer validates', {
      path: parsed.error.issues[0]?.path.join('.'),
    })
    return null
  }
  const version = 'version' in val && typeof val.version === 'number' ? val.version : undefined
  return { state: { statement: parsed.data }, version }
}

// ── Helpers ────────────────────────────────────────────────────

/** Checklist keys answered on the jobs screens instead. */
const JOB_SOURCES = new Set(Object.keys(INCOME_TERMS))

/** A checklist-created income the user has not filled in. */
function isUntouched(income: Income): boolean {
  return income.value === 0 && !income.complete
}

function listOf<K extends StatementRecordKind>(lists: StatementRecordLists, kind: K): StatementRecordMap[K][] {
  return lists[kind]
}

function withList<K extends StatementRecordKind>(
  statement: FinancialStatement,
  kind: K,
  list: StatementRecordMap[K][],
): FinancialStatement {
  return { ...statement, [kind]: list }
}

// ── Store ──────────────────────────────────────────────────────

export const useStatementStore = create<StatementStoreState>()(
  persist(
    (set, get) => ({
      statement: emptyFinancialStatement(),

      addRecord: (kind, record) => {
        const statement = get().statement
        set({ statement: withList(statement, kind, [...listOf(statement, kind), record]) })
      },

      updateRecord: (kind, id, updates) => {
        const statement = get().statement
        const list = listOf(statement, kind).map((r) => (r.id === id ? { ...r, ...updates } : r))
        set({ statement: withList(statement, kind, list) })
      },

      removeRecord: (kind, id) => {
        const statement = get().statement
        set({ statement: withList(statement, kind, listOf(statement, kind).filter((r) => r.id !== id)) })
      },

      markComplete: (kind, id) => {
        const statement = get().statement
        const list = listOf(statement, kind).map((r) => (r.id === id ? { ...r, complete: true } : r))
        set({ statement: withList(statement, kind, list) })
      },

      setSelectedIncomeSources: (sources) => {
        set({ statement: { ...get().statement, selectedIncomeSources: [...new Set(sources)] } })
      },

      moveChecksToIncomes: () => {
        const statement = get().statement
        const ticked = new Set(statement.selectedIncomeSources.filter((source) => !JOB_SOURCES.has(source)))
        const kept = statement.incomes.filter(
          (inc) => inc.checklistSource === undefined || ticked.has(inc.checklistSource) || !isUntouched(inc),
        )
        const existing = new Set(kept.map((inc) => inc.checklistSource ?? inc.source))
        const pending = [...ticked].filter((source) => !existing.has(source))
        const added = moveChecksToList(pending, NON_WAGE_INCOME_TERMS, () => crypto.randomUUID())
        if (added.length === 0 && kept.length === statement.incomes.length) return
        set({ statement: { ...statement, incomes: [...kept, ...added] } })
      },

      importStatement: (json) => {
        set({ statement: deserializeStatement(json) })
        log.info('Imported statement')
      },

      resetStatement: () => {
        set({ statement: emptyFinancialStatement() })
      },
    }),
    {
      name: 'interview-toolbox-store',
      storage: idbStorage,
      partialize: (state) => ({ statement: state.statement }),
    },
  ),
)

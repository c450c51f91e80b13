import type { BlockKind } from '@/executor/types'

export const DEFAULTS = {
  EXECUTION_TIMEOUT_MS: 300_000,
  SESSION_IDLE_TIMEOUT_MS: 3_600_000,
  SESSION_SWEEP_INTERVAL_MS: 60_000,
  MAX_HISTORY_ENTRIES: 500,
  RUN_HISTORY_LIMIT: 100,
  VARIABLE_PREVIEW_LENGTH: 200,
  TABLE_PREVIEW_ROWS: 100,
} as const

export const ANALYZED_LANGUAGES = new Set(['javascript', 'js'])

export const DOCUMENT_KINDS: ReadonlySet<BlockKind> = new Set<BlockKind>(['markdown', 'text'])

export const DEFAULT_LANGUAGE_BY_KIND: Record<BlockKind, string> = {
  code: 'javascript',
  markdown: 'markdown',
  sql: 'sql',
  text: 'text',
}

export const IMPORT_BINDING_HELPER = '__importBinding'

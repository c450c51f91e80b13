export type BlockKind = 'code' | 'markdown' | 'sql' | 'text'

export type BlockStatus = 'idle' | 'running' | 'completed' | 'failed' | 'stale' | 'skipped'

export interface NotebookBlock {
  id: string
  projectId: string
  kind: BlockKind
  language: string
  title?: string
  source: string
  position: number
  status: BlockStatus
  lastResult?: BlockExecutionResult
  lastError?: string
  lastDurationMs?: number
  executionCount: number
  updatedAt: Date
}

/**
 * A name bound by an import. `imported` is `'*'` for namespace imports and
 * `'default'` for default imports and plain `require` bindings.
 */
export interface ImportBinding {
  local: string
  module: string
  imported: string
}

export interface AnalysisRecord {
  ok: true
  language: string
  imports: string[]
  importBindings: ImportBinding[]
  variablesDefined: string[]
  functionsDefined: string[]
  referenced: string[]
  /** Data files read by literal path. */
  filesRead: string[]
  filesWritten: string[]
  complexity: number
}

export interface AnalysisError {
  ok: false
  message: string
  line: number
  column: number
  position: number
}

export type AnalysisResult = AnalysisRecord | AnalysisError

export type EdgeKind =
  | 'variable-dependency'
  | 'import-dependency'
  | 'function-dependency'
  | 'explicit'
  | 'execution-order-fallback'

export interface DependencyEdge {
  source: string
  target: string
  kind: EdgeKind
  /** Names that produced an inferred edge; empty for explicit and fallback edges. */
  symbols: string[]
}

export interface GraphNode {
  id: string
  ordinal: number
}

export interface DependencyGraph {
  nodes: GraphNode[]
  edges: DependencyEdge[]
}

export interface ExplicitEdge {
  source: string
  target: string
}

export interface GraphBuildInput {
  id: string
  analysis: AnalysisResult
  explicitEdges?: ExplicitEdge[]
}

export type ExecutionPlan =
  | { isValid: true; order: string[] }
  | { isValid: false; reason: string; cycleNodes: string[]; cycles: string[][] }

export type SessionStatus = 'created' | 'idle' | 'running' | 'stopped'

export interface VariableSnapshot {
  name: string
  type: string
  preview: string
}

export interface SessionHistoryEntry {
  blockId: string
  status: 'completed' | 'failed'
  executedAt: Date
  durationMs: number
  error?: string
}

export interface SessionState {
  sessionId: string
  status: SessionStatus
  variables: Record<string, VariableSnapshot>
  imports: string[]
  history: SessionHistoryEntry[]
  executionCount: number
  createdAt: Date
  lastActivityAt: Date
}

export interface TableData {
  columns: string[]
  rows: unknown[][]
  /** Row count before truncation to the preview limit. */
  totalRows: number
}

export type OutputArtifact =
  | { type: 'stream'; name: 'stdout' | 'stderr'; text: string }
  | { type: 'display'; text: string }
  | { type: 'html'; html: string; filename?: string }
  | { type: 'png'; data: string; filename?: string }
  | ({ type: 'table'; filename?: string } & TableData)
  | { type: 'error'; errorType: ExecutionErrorType; message: string; traceback?: string }

export type ExecutionErrorType = 'syntax' | 'runtime' | 'timeout' | 'unsupported'

export interface ExecutionError {
  type: ExecutionErrorType
  name: string
  message: string
  line?: number
  column?: number
  traceback?: string
}

export interface StateDelta {
  variables: string[]
  imports: string[]
}

export type SkipReason =
  | { kind: 'upstream-failed'; blockId: string }
  | { kind: 'session-unavailable' }
  | { kind: 'cancelled' }

export interface BlockExecutionResult {
  blockId: string
  sessionId: string
  status: 'completed' | 'failed' | 'skipped'
  stdout: string
  stderr: string
  outputs: OutputArtifact[]
  error?: ExecutionError
  durationMs: number
  executedAt: Date
  executionCount?: number
  delta: StateDelta
  skipReason?: SkipReason
}

export type WorkflowStatus = 'completed' | 'completed_with_errors' | 'failed' | 'cancelled'

export type WorkflowError =
  | { type: 'cycle'; reason: string; cycleNodes: string[] }
  | { type: 'session-unavailable'; message: string }

export interface WorkflowResult {
  runId: string
  projectId: string
  sessionId?: string
  overallStatus: WorkflowStatus
  order: string[]
  results: BlockExecutionResult[]
  error?: WorkflowError
  startedAt: Date
  completedAt: Date
  durationMs: number
}

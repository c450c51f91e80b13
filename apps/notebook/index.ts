export { createAnalysisCache, type AnalysisCache } from '@/executor/analysis/analysis-cache'
export { analyze, normalizeLanguage, rewriteForSession } from '@/executor/analysis/static-analyzer'
export { buildGraph, DependencyGraphBuilder } from '@/executor/dag/builder'
export {
  DATA_EDGE_KINDS,
  getAffectedBlocks,
  getDownstreamBlocks,
  getGraphStatistics,
  getParallelGroups,
  getUpstreamBlocks,
  type GraphStatistics,
  validateEdgeAddition,
} from '@/executor/dag/traversal'
export { validate } from '@/executor/dag/validator'
export * from '@/executor/errors'
export {
  type ExecuteBlockOptions,
  type FailurePolicy,
  type RunOptions,
  WorkflowExecutor,
} from '@/executor/execution/workflow-executor'
export type {
  ActiveRun,
  BlockRunSummary,
  ExecutionStatistics,
  RunLogEntry,
  RunRecord,
} from '@/executor/execution/run-registry'
export type {
  BackendStateSnapshot,
  ExecutionBackend,
  ExecutionOutcome,
  ExecutionRequest,
  SessionHandle,
} from '@/executor/session/backend'
export { ExecutionSessionManager, type SessionManagerOptions } from '@/executor/session/session-manager'
export { VmExecutionBackend, type VmBackendOptions } from '@/executor/session/vm-backend'
export type * from '@/executor/types'
export { type Env, getEnv, parseEnv } from '@/lib/core/config/env'
export { createNotebookEngine, type NotebookEngine, type NotebookEngineOptions } from '@/lib/notebook/engine'
export { getErrorStatus, InvalidIntentError, toErrorResponse } from '@/lib/notebook/errors'
export { type NotebookEvent, NotebookEventBus, type NotebookEventHandler } from '@/lib/notebook/events'
export {
  type BlockChange,
  type DagReport,
  type NewBlockInput,
  ProjectGraphService,
} from '@/lib/notebook/graph-service'
export {
  applyIntent,
  type CodeGenerator,
  type IntentOutcome,
  type NotebookIntent,
  notebookIntentSchema,
  parseIntent,
} from '@/lib/notebook/intents'
export { DrizzleBlockRepository, DrizzleEdgeRepository } from '@/lib/notebook/repositories/drizzle'
export { MemoryBlockRepository, MemoryEdgeRepository } from '@/lib/notebook/repositories/memory'
export type { BlockRepository, EdgeRepository, StoredEdge } from '@/lib/notebook/repositories/types'

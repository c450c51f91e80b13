import { createDb, type Database } from '@dagbook/db'
import { createLogger } from '@dagbook/logger'
import { type FailurePolicy, WorkflowExecutor } from '@/executor/execution/workflow-executor'
import type { ExecutionBackend } from '@/executor/session/backend'
import { ExecutionSessionManager } from '@/executor/session/session-manager'
import { VmExecutionBackend } from '@/executor/session/vm-backend'
import { type Env, getEnv } from '@/lib/core/config/env'
import { NotebookEventBus } from '@/lib/notebook/events'
import { ProjectGraphService } from '@/lib/notebook/graph-service'
import {
  applyIntent,
  type CodeGenerator,
  type IntentOutcome,
  parseIntent,
} from '@/lib/notebook/intents'
import { DrizzleBlockRepository, DrizzleEdgeRepository } from '@/lib/notebook/repositories/drizzle'
import { MemoryBlockRepository, MemoryEdgeRepository } from '@/lib/notebook/repositories/memory'

const logger = createLogger('NotebookEngine')

export interface NotebookEngineOptions {
  env?: Env
  /** Database to persist blocks in. Defaults to one opened from `DATABASE_URL`, else memory. */
  db?: Database
  backend?: ExecutionBackend
  generator?: CodeGenerator
  failurePolicy?: FailurePolicy
  /** Collect idle sessions on a timer. */
  sweepIdleSessions?: boolean
}

export interface NotebookEngine {
  events: NotebookEventBus
  graphService: ProjectGraphService
  sessions: ExecutionSessionManager
  executor: WorkflowExecutor
  /** Validates and applies an intent from a chat parser or agent. */
  handleIntent(value: unknown): Promise<IntentOutcome>
  dispose(): Promise<void>
}

function createRepositories(env: Env, db: Database | undefined) {
  const database = db ?? (env.DATABASE_URL ? createDb(env.DATABASE_URL) : undefined)
  if (!database) {
    logger.warn('No database configured, keeping blocks in memory')
    return { blocks: new MemoryBlockRepository(), edges: new MemoryEdgeRepository() }
  }
  return { blocks: new DrizzleBlockRepository(database), edges: new DrizzleEdgeRepository(database) }
}

/** Wires the graph service, session manager and executor from configuration. */
export function createNotebookEngine(options: NotebookEngineOptions = {}): NotebookEngine {
  const env = options.env ?? getEnv()
  const events = new NotebookEventBus()
  const graphService = new ProjectGraphService({ ...createRepositories(env, options.db), events })
  const sessions = new ExecutionSessionManager({
    backend: options.backend ?? new VmExecutionBackend({ workspaceDir: env.NOTEBOOK_WORKSPACE_DIR }),
    timeoutMs: env.NOTEBOOK_EXECUTION_TIMEOUT_MS,
    idleTimeoutMs: env.NOTEBOOK_SESSION_IDLE_TIMEOUT_MS,
  })
  if (options.sweepIdleSessions) {
    sessions.startIdleSweep(env.NOTEBOOK_SESSION_SWEEP_INTERVAL_MS)
  }
  const executor = new WorkflowExecutor({
    graphService,
    sessions,
    events,
    failurePolicy: options.failurePolicy,
  })

  return {
    events,
    graphService,
    sessions,
    executor,
    handleIntent: (value) =>
      applyIntent(parseIntent(value), { graphService, executor, generator: options.generator }),
    dispose: () => sessions.dispose(),
  }
}

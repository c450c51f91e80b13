import { createLogger } from '@dagbook/logger'
import { v4 as uuidv4 } from 'uuid'
import { normalizeLanguage } from '@/executor/analysis/static-analyzer'
import { ANALYZED_LANGUAGES, DOCUMENT_KINDS } from '@/executor/constants'
import { DATA_EDGE_KINDS, getUpstreamBlocks } from '@/executor/dag/traversal'
import { validate } from '@/executor/dag/validator'
import {
  AnalysisFailedError,
  BlockNotFoundError,
  SessionUnavailableError,
  WorkflowAbortedError,
} from '@/executor/errors'
import {
  type ActiveRun,
  type ExecutionStatistics,
  RunRegistry,
  type RunLogEntry,
  type RunRecord,
} from '@/executor/execution/run-registry'
import type { ExecutionSessionManager } from '@/executor/session/session-manager'
import type {
  BlockExecutionResult,
  DependencyGraph,
  NotebookBlock,
  SessionState,
  SkipReason,
  WorkflowError,
  WorkflowResult,
  WorkflowStatus,
} from '@/executor/types'
import type { NotebookEventBus } from '@/lib/notebook/events'
import type { ProjectGraphService } from '@/lib/notebook/graph-service'

const logger = createLogger('WorkflowExecutor')

/**
 * What happens to the rest of a run after a block fails. `skip-dependents`
 * skips every block that depends on a failed or skipped block through a data
 * or explicit edge; `continue` runs everything.
 */
export type FailurePolicy = 'skip-dependents' | 'continue'

export interface RunOptions {
  runId?: string
  /** Session to run in. Defaults to the project's session, created on demand. */
  sessionId?: string
  failurePolicy?: FailurePolicy
  /** Bindings visible to every block of the run; never committed to the session. */
  injectedContext?: Record<string, unknown>
  timeoutMs?: number
}

export interface ExecuteBlockOptions extends Omit<RunOptions, 'failurePolicy' | 'runId'> {
  /** Refuse to run a block whose source does not parse. */
  strictAnalysis?: boolean
}

export interface WorkflowExecutorOptions {
  graphService: ProjectGraphService
  sessions: ExecutionSessionManager
  events?: NotebookEventBus
  failurePolicy?: FailurePolicy
  now?: () => Date
}

interface RunContext {
  runId: string
  projectId: string
  sessionId: string
  order: string[]
  graph: DependencyGraph
  blocks: Map<string, NotebookBlock>
  options: RunOptions
  startedAt: Date
}

function emptyDelta(): BlockExecutionResult['delta'] {
  return { variables: [], imports: [] }
}

function skippedResult(
  blockId: string,
  sessionId: string,
  skipReason: SkipReason,
  executedAt: Date
): BlockExecutionResult {
  return {
    blockId,
    sessionId,
    status: 'skipped',
    stdout: '',
    stderr: '',
    outputs: [],
    durationMs: 0,
    executedAt,
    delta: emptyDelta(),
    skipReason,
  }
}

/**
 * Runs a project's blocks in dependency order against one long-lived session.
 *
 * A run snapshots the graph and every block's source when it starts, so edits
 * made while it is in progress only affect the next run. Dispatch is strictly
 * sequential.
 */
export class WorkflowExecutor {
  private readonly graphService: ProjectGraphService
  private readonly sessions: ExecutionSessionManager
  private readonly events?: NotebookEventBus
  private readonly failurePolicy: FailurePolicy
  private readonly now: () => Date
  private readonly runs = new RunRegistry()
  private readonly projectSessions = new Map<string, string>()

  constructor(options: WorkflowExecutorOptions) {
    this.graphService = options.graphService
    this.sessions = options.sessions
    this.events = options.events
    this.failurePolicy = options.failurePolicy ?? 'skip-dependents'
    this.now = options.now ?? (() => new Date())
  }

  /** Runs every block of the project in plan order. */
  async executeWorkflow(projectId: string, options: RunOptions = {}): Promise<WorkflowResult> {
    return this.run(projectId, undefined, options)
  }

  /**
   * Runs the given blocks, in plan order, in the given session. Blocks not
   * listed are not run, even when the listed ones depend on them.
   */
  async executeBlocks(
    blockIds: string[],
    sessionId: string,
    options: Omit<RunOptions, 'sessionId'> = {}
  ): Promise<WorkflowResult> {
    if (blockIds.length === 0) {
      throw new Error('executeBlocks needs at least one block id')
    }
    const first = await this.graphService.getBlock(blockIds[0])
    return this.run(first.projectId, new Set(blockIds), { ...options, sessionId })
  }

  /** Runs one block against the project's session without touching the others. */
  async executeBlock(
    projectId: string,
    blockId: string,
    options: ExecuteBlockOptions = {}
  ): Promise<BlockExecutionResult> {
    const block = await this.graphService.getBlock(blockId)
    if (block.projectId !== projectId) {
      throw new BlockNotFoundError(blockId, `Block ${blockId} not found in project ${projectId}`)
    }

    if (options.strictAnalysis) {
      const analysis = this.graphService.getAnalysis(block)
      if (!analysis.ok) throw new AnalysisFailedError(blockId, analysis)
    }

    const sessionId = options.sessionId ?? this.getProjectSession(projectId)
    await this.graphService.setStatus(blockId, 'running')

    let result: BlockExecutionResult
    try {
      result = await this.runBlock(block, sessionId, options)
    } catch (error) {
      await this.graphService.setStatus(blockId, block.status)
      throw error
    }

    await this.graphService.recordExecution(block, result)
    await this.events?.emit({
      type: 'block_executed',
      runId: uuidv4(),
      projectId,
      result,
      timestamp: this.now(),
    })
    return result
  }

  /** Stops dispatching further blocks of a run. Returns false for unknown or finished runs. */
  cancel(runId: string): boolean {
    const requested = this.runs.requestCancellation(runId)
    if (requested) logger.info(`Cancellation requested for run ${runId}`)
    return requested
  }

  getRun(runId: string): ActiveRun | undefined {
    return this.runs.get(runId)
  }

  listActiveRuns(projectId?: string): ActiveRun[] {
    return this.runs.list(projectId)
  }

  /** A finished run, while it is within the kept history. */
  getRunRecord(runId: string): RunRecord | undefined {
    return this.runs.getRecord(runId)
  }

  listRunHistory(projectId?: string): RunRecord[] {
    return this.runs.listRecords(projectId)
  }

  getRunLog(runId: string): RunLogEntry[] {
    return this.runs.getLog(runId)
  }

  getExecutionStatistics(projectId?: string): ExecutionStatistics {
    return this.runs.statistics(projectId)
  }

  /** State of the project's session, or undefined when it has none. */
  async getSessionState(projectId: string): Promise<SessionState | undefined> {
    const sessionId = this.projectSessions.get(projectId)
    if (!sessionId || !this.sessions.has(sessionId)) return undefined
    return this.sessions.getState(sessionId)
  }

  async stopSession(projectId: string): Promise<boolean> {
    const sessionId = this.projectSessions.get(projectId)
    this.projectSessions.delete(projectId)
    if (!sessionId || !this.sessions.has(sessionId)) return false
    await this.sessions.stop(sessionId)
    return true
  }

  /** The project's session id, registering a new session when it has none. */
  getProjectSession(projectId: string): string {
    const existing = this.projectSessions.get(projectId)
    if (existing && this.sessions.has(existing)) return existing

    const sessionId = this.sessions.start()
    this.projectSessions.set(projectId, sessionId)
    logger.debug(`Assigned session ${sessionId} to project ${projectId}`)
    return sessionId
  }

  private async run(
    projectId: string,
    only: Set<string> | undefined,
    options: RunOptions
  ): Promise<WorkflowResult> {
    const runId = options.runId ?? uuidv4()
    const startedAt = this.now()

    const graph = await this.graphService.getGraph(projectId)
    const blocks = new Map(
      (await this.graphService.listBlocks(projectId)).map((block) => [block.id, block])
    )
    for (const blockId of only ?? []) {
      if (!blocks.has(blockId)) {
        throw new BlockNotFoundError(blockId, `Block ${blockId} not found in project ${projectId}`)
      }
    }

    const plan = validate(graph)
    if (!plan.isValid) {
      logger.warn(`Refusing to run project ${projectId}: ${plan.reason}`, { runId })
      return this.complete(
        { runId, projectId, startedAt },
        'failed',
        [],
        [],
        { type: 'cycle', reason: plan.reason, cycleNodes: plan.cycleNodes }
      )
    }

    const order = plan.order.filter((id) => blocks.has(id) && (!only || only.has(id)))
    const sessionId = options.sessionId ?? this.getProjectSession(projectId)

    const context: RunContext = {
      runId,
      projectId,
      sessionId,
      order,
      graph,
      blocks,
      options,
      startedAt,
    }

    this.runs.begin({ runId, projectId, sessionId, order, startedAt })
    logger.info(`Starting run ${runId}`, { projectId, sessionId, blocks: order.length })
    await this.events?.emit({
      type: 'execution_started',
      runId,
      projectId,
      sessionId,
      order,
      timestamp: this.now(),
    })

    try {
      return await this.dispatch(context)
    } catch (error) {
      this.runs.abandon(runId, error, this.now())
      throw error
    }
  }

  private async dispatch(context: RunContext): Promise<WorkflowResult> {
    const { runId, sessionId, order, options } = context
    const policy = options.failurePolicy ?? this.failurePolicy
    const results: BlockExecutionResult[] = []
    const blocked = new Set<string>()

    for (const [index, blockId] of order.entries()) {
      const block = context.blocks.get(blockId)
      if (!block) continue

      if (this.runs.isCancellationRequested(runId)) {
        for (const remaining of order.slice(index)) {
          const skipped = skippedResult(remaining, sessionId, { kind: 'cancelled' }, this.now())
          await this.finishBlock(context, results, skipped)
        }
        logger.info(`Run ${runId} cancelled`, { skipped: order.length - index })
        return this.complete(context, 'cancelled', order, results)
      }

      const upstream =
        policy === 'skip-dependents'
          ? this.failedUpstream(context.graph, blockId, blocked)
          : undefined
      if (upstream) {
        blocked.add(blockId)
        await this.finishBlock(
          context,
          results,
          skippedResult(blockId, sessionId, { kind: 'upstream-failed', blockId: upstream }, this.now())
        )
        continue
      }

      this.runs.blockStarted(runId, blockId)
      await this.graphService.setStatus(blockId, 'running')

      let result: BlockExecutionResult
      try {
        result = await this.runBlock(block, sessionId, options)
      } catch (error) {
        if (!(error instanceof SessionUnavailableError)) {
          await this.graphService.setStatus(blockId, block.status)
          throw error
        }
        throw await this.abort(context, results, index, error)
      }

      if (result.status !== 'completed') blocked.add(blockId)
      await this.finishBlock(context, results, result)
    }

    const failed = results.some((result) => result.status !== 'completed')
    return this.complete(context, failed ? 'completed_with_errors' : 'completed', order, results)
  }

  /** Skips what is left of the run and returns the error to throw. */
  private async abort(
    context: RunContext,
    results: BlockExecutionResult[],
    index: number,
    error: SessionUnavailableError
  ): Promise<WorkflowAbortedError> {
    logger.error(`Run ${context.runId} aborted: ${error.message}`, { sessionId: context.sessionId })
    this.projectSessions.delete(context.projectId)

    for (const remaining of context.order.slice(index)) {
      await this.finishBlock(
        context,
        results,
        skippedResult(remaining, context.sessionId, { kind: 'session-unavailable' }, this.now())
      )
    }

    const result = await this.complete(context, 'failed', context.order, results, {
      type: 'session-unavailable',
      message: error.message,
    })
    return new WorkflowAbortedError(result, { cause: error })
  }

  /** First data or explicit predecessor, in notebook order, that failed or was skipped. */
  private failedUpstream(
    graph: DependencyGraph,
    blockId: string,
    blocked: Set<string>
  ): string | undefined {
    const predecessors = new Set(
      graph.edges
        .filter((edge) => edge.target === blockId && DATA_EDGE_KINDS.includes(edge.kind))
        .map((edge) => edge.source)
    )
    return graph.nodes.find((node) => predecessors.has(node.id) && blocked.has(node.id))?.id
  }

  private async runBlock(
    block: NotebookBlock,
    sessionId: string,
    options: Pick<RunOptions, 'injectedContext' | 'timeoutMs'>
  ): Promise<BlockExecutionResult> {
    const executedAt = this.now()

    if (DOCUMENT_KINDS.has(block.kind)) {
      return {
        blockId: block.id,
        sessionId,
        status: 'completed',
        stdout: '',
        stderr: '',
        outputs: [],
        durationMs: 0,
        executedAt,
        delta: emptyDelta(),
      }
    }

    const language = normalizeLanguage(block.language)
    if (block.kind !== 'code' || !ANALYZED_LANGUAGES.has(language)) {
      const message = `Blocks of kind ${block.kind} in ${language} cannot be executed`
      return {
        blockId: block.id,
        sessionId,
        status: 'failed',
        stdout: '',
        stderr: '',
        outputs: [{ type: 'error', errorType: 'unsupported', message }],
        error: { type: 'unsupported', name: 'UnsupportedBlockError', message },
        durationMs: 0,
        executedAt,
        delta: emptyDelta(),
      }
    }

    return this.sessions.execute(sessionId, block.id, block.source, options.injectedContext, {
      timeoutMs: options.timeoutMs,
    })
  }

  private async finishBlock(
    context: RunContext,
    results: BlockExecutionResult[],
    result: BlockExecutionResult
  ): Promise<void> {
    const block = context.blocks.get(result.blockId)
    if (block) {
      const upstream = getUpstreamBlocks(context.graph, block.id, { kinds: DATA_EDGE_KINDS }).flatMap(
        (id) => context.blocks.get(id) ?? []
      )
      await this.graphService.recordExecution(block, result, upstream)
    }
    results.push(result)
    this.runs.blockFinished(context.runId, result)

    await this.events?.emit({
      type: 'block_executed',
      runId: context.runId,
      projectId: context.projectId,
      result,
      timestamp: this.now(),
    })
  }

  private async complete(
    context: Pick<RunContext, 'runId' | 'projectId' | 'startedAt'> & { sessionId?: string },
    overallStatus: WorkflowStatus,
    order: string[],
    results: BlockExecutionResult[],
    error?: WorkflowError
  ): Promise<WorkflowResult> {
    const completedAt = this.now()
    const result: WorkflowResult = {
      runId: context.runId,
      projectId: context.projectId,
      sessionId: context.sessionId,
      overallStatus,
      order,
      results,
      error,
      startedAt: context.startedAt,
      completedAt,
      durationMs: completedAt.getTime() - context.startedAt.getTime(),
    }
    this.runs.finish(result)

    logger.info(`Run ${context.runId} finished with status ${overallStatus}`, {
      projectId: context.projectId,
      blocks: results.length,
      durationMs: result.durationMs,
    })
    await this.events?.emit({
      type: 'execution_completed',
      runId: context.runId,
      projectId: context.projectId,
      overallStatus,
      durationMs: result.durationMs,
      timestamp: completedAt,
    })
    return result
  }
}

import { DEFAULTS } from '@/executor/constants'
import type { BlockExecutionResult, WorkflowResult, WorkflowStatus } from '@/executor/types'

export interface RunLogEntry {
  timestamp: Date
  level: 'info' | 'warn' | 'error'
  message: string
  blockId?: string
}

export interface ActiveRun {
  runId: string
  projectId: string
  sessionId: string
  order: string[]
  /** Blocks already dispatched, in order. */
  finished: string[]
  currentBlockId?: string
  cancellationRequested: boolean
  startedAt: Date
}

export interface BlockRunSummary {
  blockId: string
  status: BlockExecutionResult['status']
  durationMs: number
}

export interface RunRecord {
  runId: string
  projectId: string
  sessionId?: string
  status: WorkflowStatus
  order: string[]
  blocks: BlockRunSummary[]
  startedAt: Date
  completedAt: Date
  durationMs: number
  log: RunLogEntry[]
}

export interface ExecutionStatistics {
  activeRuns: number
  runs: Record<WorkflowStatus, number> & { total: number }
  blocks: Record<BlockExecutionResult['status'], number> & { total: number }
  averageRunDurationMs: number
  /** Mean over blocks that ran; skipped blocks are left out. */
  averageBlockDurationMs: number
  /** Percentage of finished runs that completed without errors. */
  successRate: number
}

interface RunState extends ActiveRun {
  blocks: BlockRunSummary[]
  log: RunLogEntry[]
}

function copyRun(run: RunState): ActiveRun {
  return {
    runId: run.runId,
    projectId: run.projectId,
    sessionId: run.sessionId,
    order: [...run.order],
    finished: [...run.finished],
    currentBlockId: run.currentBlockId,
    cancellationRequested: run.cancellationRequested,
    startedAt: run.startedAt,
  }
}

function describeBlock(result: BlockExecutionResult): Omit<RunLogEntry, 'timestamp'> {
  const { blockId } = result
  if (result.status === 'failed') {
    const reason = result.error?.message ?? 'unknown error'
    return { level: 'error', blockId, message: `Block ${blockId} failed: ${reason}` }
  }
  if (result.status === 'skipped') {
    const reason =
      result.skipReason?.kind === 'upstream-failed'
        ? `upstream block ${result.skipReason.blockId} did not complete`
        : (result.skipReason?.kind ?? 'no reason given')
    return { level: 'warn', blockId, message: `Block ${blockId} skipped: ${reason}` }
  }
  return { level: 'info', blockId, message: `Block ${blockId} completed in ${result.durationMs}ms` }
}

function count<T extends string>(values: T[], value: T): number {
  return values.filter((entry) => entry === value).length
}

function average(values: number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0
}

/**
 * Workflow runs in progress, plus a bounded history of finished ones with their
 * log. Cancellation is cooperative: the executor checks the flag between
 * blocks, so the block in flight always finishes.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunState>()
  private readonly history: RunRecord[] = []

  constructor(private readonly historyLimit: number = DEFAULTS.RUN_HISTORY_LIMIT) {}

  begin(run: Omit<ActiveRun, 'finished' | 'cancellationRequested'>): void {
    this.runs.set(run.runId, {
      ...run,
      finished: [],
      cancellationRequested: false,
      blocks: [],
      log: [
        {
          timestamp: run.startedAt,
          level: 'info',
          message: `Run started with ${run.order.length} blocks`,
        },
      ],
    })
  }

  blockStarted(runId: string, blockId: string): void {
    const run = this.runs.get(runId)
    if (run) run.currentBlockId = blockId
  }

  blockFinished(runId: string, result: BlockExecutionResult): void {
    const run = this.runs.get(runId)
    if (!run) return
    run.finished.push(result.blockId)
    run.currentBlockId = undefined
    run.blocks.push({ blockId: result.blockId, status: result.status, durationMs: result.durationMs })
    run.log.push({ timestamp: result.executedAt, ...describeBlock(result) })
  }

  /** Moves the run into the history. Runs refused before they began are recorded too. */
  finish(result: WorkflowResult): void {
    const run = this.runs.get(result.runId)
    this.runs.delete(result.runId)

    const log = run?.log ?? []
    if (result.error) {
      const message = result.error.type === 'cycle' ? result.error.reason : result.error.message
      log.push({ timestamp: result.completedAt, level: 'error', message })
    }
    log.push({
      timestamp: result.completedAt,
      level: result.overallStatus === 'completed' ? 'info' : 'warn',
      message: `Run finished with status ${result.overallStatus}`,
    })

    this.remember({
      runId: result.runId,
      projectId: result.projectId,
      sessionId: result.sessionId,
      status: result.overallStatus,
      order: [...result.order],
      blocks: run?.blocks ?? [],
      startedAt: result.startedAt,
      completedAt: result.completedAt,
      durationMs: result.durationMs,
      log,
    })
  }

  /** Records a run that ended by an unexpected error, if it is still active. */
  abandon(runId: string, error: unknown, completedAt: Date): void {
    const run = this.runs.get(runId)
    if (!run) return
    this.runs.delete(runId)

    const message = error instanceof Error ? error.message : String(error)
    this.remember({
      runId,
      projectId: run.projectId,
      sessionId: run.sessionId,
      status: 'failed',
      order: run.order,
      blocks: run.blocks,
      startedAt: run.startedAt,
      completedAt,
      durationMs: completedAt.getTime() - run.startedAt.getTime(),
      log: [
        ...run.log,
        { timestamp: completedAt, level: 'error', message: `Run ended unexpectedly: ${message}` },
      ],
    })
  }

  /** False when no such run is in progress. */
  requestCancellation(runId: string): boolean {
    const run = this.runs.get(runId)
    if (!run) return false
    run.cancellationRequested = true
    return true
  }

  isCancellationRequested(runId: string): boolean {
    return this.runs.get(runId)?.cancellationRequested ?? false
  }

  get(runId: string): ActiveRun | undefined {
    const run = this.runs.get(runId)
    return run ? copyRun(run) : undefined
  }

  list(projectId?: string): ActiveRun[] {
    return [...this.runs.values()]
      .filter((run) => projectId === undefined || run.projectId === projectId)
      .map(copyRun)
  }

  getRecord(runId: string): RunRecord | undefined {
    return this.history.find((record) => record.runId === runId)
  }

  /** Log of an active or remembered run; empty when the run is unknown. */
  getLog(runId: string): RunLogEntry[] {
    const log = this.runs.get(runId)?.log ?? this.getRecord(runId)?.log ?? []
    return log.map((entry) => ({ ...entry }))
  }

  /** Finished runs, most recent first. */
  listRecords(projectId?: string): RunRecord[] {
    return this.history.filter((record) => projectId === undefined || record.projectId === projectId)
  }

  statistics(projectId?: string): ExecutionStatistics {
    const records = this.listRecords(projectId)
    const blocks = records.flatMap((record) => record.blocks)
    const statuses = records.map((record) => record.status)
    const blockStatuses = blocks.map((block) => block.status)
    const completedRuns = count(statuses, 'completed')

    return {
      activeRuns: this.list(projectId).length,
      runs: {
        total: records.length,
        completed: completedRuns,
        completed_with_errors: count(statuses, 'completed_with_errors'),
        failed: count(statuses, 'failed'),
        cancelled: count(statuses, 'cancelled'),
      },
      blocks: {
        total: blocks.length,
        completed: count(blockStatuses, 'completed'),
        failed: count(blockStatuses, 'failed'),
        skipped: count(blockStatuses, 'skipped'),
      },
      averageRunDurationMs: average(records.map((record) => record.durationMs)),
      averageBlockDurationMs: average(
        blocks.filter((block) => block.status !== 'skipped').map((block) => block.durationMs)
      ),
      successRate: records.length > 0 ? (completedRuns / records.length) * 100 : 0,
    }
  }

  private remember(record: RunRecord): void {
    this.history.unshift(record)
    if (this.history.length > this.historyLimit) this.history.length = this.historyLimit
  }
}

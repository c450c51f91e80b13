import type { AnalysisError, WorkflowResult } from '@/executor/types'

export class AnalysisFailedError extends Error {
  constructor(
    public readonly blockId: string,
    public readonly analysis: AnalysisError
  ) {
    super(
      `Block ${blockId} could not be parsed (line ${analysis.line}, column ${analysis.column}): ${analysis.message}`
    )
    this.name = 'AnalysisFailedError'
  }
}

export class CycleError extends Error {
  constructor(
    public readonly cycleNodes: string[],
    message = `Dependency cycle between blocks: ${cycleNodes.join(', ')}`
  ) {
    super(message)
    this.name = 'CycleError'
  }
}

export class ExecutionTimeoutError extends Error {
  constructor(
    public readonly timeoutMs: number,
    message = `Execution timed out after ${timeoutMs}ms`
  ) {
    super(message)
    this.name = 'ExecutionTimeoutError'
  }
}

export class ExecutionRuntimeError extends Error {
  constructor(
    message: string,
    public readonly traceback?: string
  ) {
    super(message)
    this.name = 'ExecutionRuntimeError'
  }
}

/**
 * The execution backend could not start or stopped responding. The session's
 * state is unknown afterwards, so callers abort rather than continue.
 */
export class SessionUnavailableError extends Error {
  constructor(
    public readonly sessionId: string,
    message = `Execution session ${sessionId} is unavailable`,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'SessionUnavailableError'
  }
}

export class SessionNotFoundError extends Error {
  constructor(
    public readonly sessionId: string,
    message = `Execution session ${sessionId} not found`
  ) {
    super(message)
    this.name = 'SessionNotFoundError'
  }
}

export class BlockNotFoundError extends Error {
  constructor(
    public readonly blockId: string,
    message = `Block ${blockId} not found`
  ) {
    super(message)
    this.name = 'BlockNotFoundError'
  }
}

export class InvalidEdgeError extends Error {
  constructor(
    public readonly source: string,
    public readonly target: string,
    reason: string
  ) {
    super(`Invalid edge ${source} -> ${target}: ${reason}`)
    this.name = 'InvalidEdgeError'
  }
}

/**
 * Raised when infrastructure failure ends a workflow run. Carries the results
 * gathered before the abort.
 */
export class WorkflowAbortedError extends Error {
  constructor(
    public readonly result: WorkflowResult,
    options?: { cause?: unknown }
  ) {
    super(result.error?.type === 'session-unavailable' ? result.error.message : 'Workflow aborted', options)
    this.name = 'WorkflowAbortedError'
  }
}

import type {
  ExecutionError,
  OutputArtifact,
  StateDelta,
  VariableSnapshot,
} from '@/executor/types'

export interface SessionHandle {
  readonly sessionId: string
}

export interface ExecutionRequest {
  blockId: string
  source: string
  /** Extra bindings visible to this run only; never committed to the session. */
  injectedContext?: Record<string, unknown>
  timeoutMs: number
}

export interface ExecutionOutcome {
  status: 'completed' | 'failed'
  stdout: string
  stderr: string
  outputs: OutputArtifact[]
  error?: ExecutionError
  delta: StateDelta
  durationMs: number
}

export interface BackendStateSnapshot {
  variables: Record<string, VariableSnapshot>
  imports: string[]
}

/**
 * Where block code actually runs. User-code failures come back as failed
 * outcomes; a backend throws only `SessionUnavailableError`, when the session
 * can no longer be trusted.
 */
export interface ExecutionBackend {
  start(sessionId: string): Promise<SessionHandle>
  execute(handle: SessionHandle, request: ExecutionRequest): Promise<ExecutionOutcome>
  inspect(handle: SessionHandle): Promise<BackendStateSnapshot>
  stop(handle: SessionHandle): Promise<void>
}

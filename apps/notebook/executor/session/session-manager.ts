import { createLogger } from '@dagbook/logger'
import { v4 as uuidv4 } from 'uuid'
import { DEFAULTS } from '@/executor/constants'
import { SessionNotFoundError, SessionUnavailableError } from '@/executor/errors'
import type { ExecutionBackend, ExecutionOutcome, SessionHandle } from '@/executor/session/backend'
import type {
  BlockExecutionResult,
  SessionHistoryEntry,
  SessionState,
  SessionStatus,
} from '@/executor/types'

const logger = createLogger('ExecutionSessionManager')

export interface SessionManagerOptions {
  backend: ExecutionBackend
  /** Default wall-clock limit of one block execution. */
  timeoutMs?: number
  idleTimeoutMs?: number
  maxHistoryEntries?: number
  now?: () => Date
}

export interface ExecuteOptions {
  timeoutMs?: number
}

interface ManagedSession {
  sessionId: string
  status: SessionStatus
  handle?: SessionHandle
  lock: Promise<void>
  /** Operations queued on or holding the lock. */
  pending: number
  history: SessionHistoryEntry[]
  executionCount: number
  createdAt: Date
  lastActivityAt: Date
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Owns the lifecycle of execution sessions on top of an `ExecutionBackend`.
 *
 * Sessions move `created → idle ⇄ running` and end in `stopped`. Work on one
 * session is serialized through a promise chain, so a stop request waits for
 * the execution in flight. Different sessions run independently.
 */
export class ExecutionSessionManager {
  private readonly sessions = new Map<string, ManagedSession>()
  private readonly backend: ExecutionBackend
  private readonly timeoutMs: number
  private readonly idleTimeoutMs: number
  private readonly maxHistoryEntries: number
  private readonly now: () => Date
  private sweepTimer?: ReturnType<typeof setInterval>

  constructor(options: SessionManagerOptions) {
    this.backend = options.backend
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.EXECUTION_TIMEOUT_MS
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULTS.SESSION_IDLE_TIMEOUT_MS
    this.maxHistoryEntries = options.maxHistoryEntries ?? DEFAULTS.MAX_HISTORY_ENTRIES
    this.now = options.now ?? (() => new Date())
  }

  /** Registers a session. The backend starts it on its first execution. */
  start(sessionId: string = uuidv4()): string {
    if (!this.sessions.has(sessionId)) {
      const createdAt = this.now()
      this.sessions.set(sessionId, {
        sessionId,
        status: 'created',
        lock: Promise.resolve(),
        pending: 0,
        history: [],
        executionCount: 0,
        createdAt,
        lastActivityAt: createdAt,
      })
      logger.debug('Registered session', { sessionId })
    }
    return sessionId
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  /**
   * Runs one block in the session, creating the session if it does not exist.
   * User-code failures and timeouts come back as a failed result; only an
   * unusable backend throws.
   */
  async execute(
    sessionId: string,
    blockId: string,
    source: string,
    injectedContext?: Record<string, unknown>,
    options: ExecuteOptions = {}
  ): Promise<BlockExecutionResult> {
    this.start(sessionId)
    const session = this.getSession(sessionId)

    return this.withSessionLock(session, async () => {
      if (session.status === 'stopped') {
        throw new SessionUnavailableError(sessionId, `Execution session ${sessionId} was stopped`)
      }

      const handle = await this.ensureStarted(session)
      session.status = 'running'
      session.lastActivityAt = this.now()
      const executedAt = this.now()

      let outcome: ExecutionOutcome
      try {
        outcome = await this.backend.execute(handle, {
          blockId,
          source,
          injectedContext,
          timeoutMs: options.timeoutMs ?? this.timeoutMs,
        })
      } catch (error) {
        await this.discard(session)
        throw error instanceof SessionUnavailableError
          ? error
          : new SessionUnavailableError(sessionId, errorMessage(error), { cause: error })
      }

      if (outcome.status === 'completed') session.executionCount++
      session.status = 'idle'
      session.lastActivityAt = this.now()
      this.appendHistory(session, {
        blockId,
        status: outcome.status,
        executedAt,
        durationMs: outcome.durationMs,
        error: outcome.error?.message,
      })

      logger.info(`Executed block ${blockId}`, {
        sessionId,
        status: outcome.status,
        durationMs: outcome.durationMs,
      })

      return {
        blockId,
        sessionId,
        status: outcome.status,
        stdout: outcome.stdout,
        stderr: outcome.stderr,
        outputs: outcome.outputs,
        error: outcome.error,
        durationMs: outcome.durationMs,
        executedAt,
        executionCount: outcome.status === 'completed' ? session.executionCount : undefined,
        delta: outcome.delta,
      }
    })
  }

  /** Stops a session once its in-flight execution, if any, has settled. */
  async stop(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId)
    await this.withSessionLock(session, async () => {
      if (session.status === 'stopped') return
      await this.discard(session)
      logger.info('Session stopped', { sessionId, executionCount: session.executionCount })
    })
  }

  async getState(sessionId: string): Promise<SessionState> {
    const session = this.getSession(sessionId)
    const snapshot = session.handle
      ? await this.backend.inspect(session.handle)
      : { variables: {}, imports: [] }

    return {
      sessionId,
      status: session.status,
      variables: snapshot.variables,
      imports: snapshot.imports,
      history: [...session.history],
      executionCount: session.executionCount,
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
    }
  }

  /** Most recent entries last. */
  getHistory(sessionId: string, limit?: number): SessionHistoryEntry[] {
    const { history } = this.getSession(sessionId)
    return limit === undefined ? [...history] : history.slice(Math.max(history.length - limit, 0))
  }

  listSessions(): Array<{ sessionId: string; status: SessionStatus; lastActivityAt: Date }> {
    return [...this.sessions.values()].map(({ sessionId, status, lastActivityAt }) => ({
      sessionId,
      status,
      lastActivityAt,
    }))
  }

  /** Stops sessions idle for longer than the idle timeout. Busy sessions are never collected. */
  async collectIdleSessions(): Promise<string[]> {
    const cutoff = this.now().getTime() - this.idleTimeoutMs
    const isIdle = (session: ManagedSession) =>
      session.status !== 'running' && session.lastActivityAt.getTime() <= cutoff
    const candidates = [...this.sessions.values()].filter(
      (session) => session.pending === 0 && isIdle(session)
    )

    const collected: string[] = []
    for (const session of candidates) {
      const stopped = await this.withSessionLock(session, async () => {
        // Work may have run or queued up since the candidates were picked.
        if (session.status === 'stopped' || session.pending > 1 || !isIdle(session)) return false
        await this.discard(session)
        return true
      })
      if (stopped) collected.push(session.sessionId)
    }
    if (collected.length > 0) {
      logger.info(`Collected ${collected.length} idle sessions`, { sessionIds: collected })
    }
    return collected
  }

  startIdleSweep(intervalMs: number = DEFAULTS.SESSION_SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) return
    this.sweepTimer = setInterval(() => {
      this.collectIdleSessions().catch((error) => {
        logger.error('Idle session sweep failed', { error: errorMessage(error) })
      })
    }, intervalMs)
    this.sweepTimer.unref()
  }

  /** Stops the idle sweep and every session. */
  async dispose(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = undefined
    }
    await Promise.all([...this.sessions.keys()].map((sessionId) => this.stop(sessionId)))
  }

  private getSession(sessionId: string): ManagedSession {
    const session = this.sessions.get(sessionId)
    if (!session) throw new SessionNotFoundError(sessionId)
    return session
  }

  private async ensureStarted(session: ManagedSession): Promise<SessionHandle> {
    if (session.handle) return session.handle
    try {
      session.handle = await this.backend.start(session.sessionId)
    } catch (error) {
      throw error instanceof SessionUnavailableError
        ? error
        : new SessionUnavailableError(session.sessionId, errorMessage(error), { cause: error })
    }
    session.status = 'idle'
    return session.handle
  }

  /** Marks the session stopped, forgets it and releases its backend resources. */
  private async discard(session: ManagedSession): Promise<void> {
    session.status = 'stopped'
    if (this.sessions.get(session.sessionId) === session) {
      this.sessions.delete(session.sessionId)
    }
    if (!session.handle) return

    const handle = session.handle
    session.handle = undefined
    try {
      await this.backend.stop(handle)
    } catch (error) {
      logger.warn('Backend failed to stop session cleanly', {
        sessionId: session.sessionId,
        error: errorMessage(error),
      })
    }
  }

  private appendHistory(session: ManagedSession, entry: SessionHistoryEntry): void {
    session.history.push(entry)
    if (session.history.length > this.maxHistoryEntries) {
      session.history.splice(0, session.history.length - this.maxHistoryEntries)
    }
  }

  private async withSessionLock<T>(session: ManagedSession, fn: () => Promise<T>): Promise<T> {
    const previous = session.lock
    let release: () => void = () => {}
    session.lock = new Promise<void>((resolve) => {
      release = () => resolve()
    })
    session.pending++
    await previous
    try {
      return await fn()
    } finally {
      session.pending--
      release()
    }
  }
}

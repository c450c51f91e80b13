import { mkdir, rm } from 'node:fs/promises'
import { createRequire } from 'node:module'
import { join } from 'node:path'
import { createLogger } from '@dagbook/logger'
import { analyze, type RewrittenScript, rewriteForSession } from '@/executor/analysis/static-analyzer'
import { IMPORT_BINDING_HELPER } from '@/executor/constants'
import { SessionUnavailableError } from '@/executor/errors'
import {
  collectFileArtifacts,
  type DirectorySnapshot,
  OutputCapture,
  snapshotDirectory,
} from '@/executor/session/artifacts'
import type {
  BackendStateSnapshot,
  ExecutionBackend,
  ExecutionOutcome,
  ExecutionRequest,
  SessionHandle,
} from '@/executor/session/backend'
import { describeVariable } from '@/executor/session/snapshot'
import { describeError, SessionContext } from '@/executor/session/vm-context'
import type { StateDelta } from '@/executor/types'

const logger = createLogger('VmExecutionBackend')

/** A block run that succeeded; replayed in order to rebuild the session after a failure. */
interface CommittedScript {
  code: string
  filename: string
  timeoutMs: number
  injected: Record<string, unknown>
}

interface VmSession {
  sessionId: string
  workingDir: string
  context: SessionContext
  committed: CommittedScript[]
  importLocals: Set<string>
  imports: Set<string>
  /** Set when the session state could not be rebuilt. */
  lostReason?: string
}

export interface VmBackendOptions {
  /** Parent directory of the per-session working directories. */
  workspaceDir: string
  /** Directory that `require` and imports resolve packages from. Defaults to the process cwd. */
  requireFrom?: string
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function'
}

function importBinding(load: (id: string) => unknown, specifier: string, imported: string): unknown {
  const loaded = load(specifier)
  if (imported === '*') return loaded
  if (!isObjectLike(loaded)) return imported === 'default' ? loaded : undefined
  if (imported === 'default') {
    return Reflect.get(loaded, '__esModule') === true ? Reflect.get(loaded, 'default') : loaded
  }
  return Reflect.get(loaded, imported)
}

function unique(names: string[]): string[] {
  return [...new Set(names)]
}

function captureGlobals(capture: OutputCapture): Record<string, unknown> {
  return { console: capture.createConsole(), display: capture.createDisplay() }
}

/**
 * Runs blocks in `vm` contexts inside this process.
 *
 * Each session keeps one context for its whole life, so later blocks see the
 * very objects and functions earlier blocks created. A failed run throws that
 * context away and rebuilds the session by replaying the blocks that
 * succeeded, in order, into a fresh one.
 */
export class VmExecutionBackend implements ExecutionBackend {
  private readonly sessions = new Map<string, VmSession>()
  private readonly load: ReturnType<typeof createRequire>

  constructor(private readonly options: VmBackendOptions) {
    this.load = createRequire(join(options.requireFrom ?? process.cwd(), 'index.js'))
  }

  async start(sessionId: string): Promise<SessionHandle> {
    const workingDir = join(this.options.workspaceDir, sessionId)
    try {
      await mkdir(workingDir, { recursive: true })
    } catch (error) {
      throw new SessionUnavailableError(
        sessionId,
        `Could not create working directory for session ${sessionId}`,
        { cause: error }
      )
    }

    this.sessions.set(sessionId, {
      sessionId,
      workingDir,
      context: this.createContext(sessionId, workingDir),
      committed: [],
      importLocals: new Set(),
      imports: new Set(),
    })
    logger.info('Started session', { sessionId, workingDir })
    return { sessionId }
  }

  async execute(handle: SessionHandle, request: ExecutionRequest): Promise<ExecutionOutcome> {
    const session = this.getSession(handle)
    const startTime = Date.now()
    const before = await this.snapshotWorkingDir(session)

    const capture = new OutputCapture()
    for (const error of session.context.takeLateErrors()) {
      capture.write('stderr', [`Background task of an earlier block failed: ${describeError(error)}`])
    }

    const rewritten = rewriteForSession(request.source)
    const script: CommittedScript = {
      code: rewritten.code,
      filename: `${request.blockId}.js`,
      timeoutMs: request.timeoutMs,
      injected: request.injectedContext ?? {},
    }
    const namesBefore = new Set(session.context.userNames())
    const result = await session.context.run({ ...script, globals: captureGlobals(capture) })
    let delta: StateDelta = { variables: [], imports: [] }

    if (result.ok) {
      if (result.completion !== undefined) capture.display(result.completion)
      delta = this.commit(session, script, rewritten, namesBefore, request.source)
    } else {
      capture.push({
        type: 'error',
        errorType: result.error.type,
        message: result.error.message,
        traceback: result.error.traceback,
      })
      logger.debug('Block execution failed', {
        sessionId: session.sessionId,
        blockId: request.blockId,
        error: result.error.message,
      })
    }

    const fileArtifacts = await this.collectFiles(session, before)
    if (!result.ok) await this.rebuild(session)

    return {
      status: result.ok ? 'completed' : 'failed',
      stdout: capture.stdout,
      stderr: capture.stderr,
      outputs: [...capture.toOutputs(), ...fileArtifacts],
      error: result.ok ? undefined : result.error,
      delta,
      durationMs: Date.now() - startTime,
    }
  }

  async inspect(handle: SessionHandle): Promise<BackendStateSnapshot> {
    const session = this.getSession(handle)
    const { sandbox } = session.context
    const variables = Object.fromEntries(
      session.context
        .userNames()
        .filter((name) => !session.importLocals.has(name))
        .map((name) => [name, describeVariable(name, sandbox[name])])
    )
    return { variables, imports: [...session.imports] }
  }

  async stop(handle: SessionHandle): Promise<void> {
    const session = this.sessions.get(handle.sessionId)
    if (!session) return
    this.sessions.delete(handle.sessionId)
    session.context.dispose()

    try {
      await rm(session.workingDir, { recursive: true, force: true })
    } catch (error) {
      logger.warn('Failed to remove session working directory', {
        sessionId: session.sessionId,
        error: error instanceof Error ? error.message : String(error),
      })
    }
    logger.info('Stopped session', { sessionId: session.sessionId })
  }

  private getSession(handle: SessionHandle): VmSession {
    const session = this.sessions.get(handle.sessionId)
    if (!session) {
      throw new SessionUnavailableError(
        handle.sessionId,
        `Execution session ${handle.sessionId} is not running in this backend`
      )
    }
    if (session.lostReason) {
      throw new SessionUnavailableError(session.sessionId, session.lostReason)
    }
    return session
  }

  private createContext(sessionId: string, workingDir: string): SessionContext {
    const load = this.load
    return new SessionContext(`session:${sessionId}`, {
      ...captureGlobals(new OutputCapture()),
      require: load,
      workdir: workingDir,
      [IMPORT_BINDING_HELPER]: (specifier: string, imported: string) =>
        importBinding(load, specifier, imported),
    })
  }

  private commit(
    session: VmSession,
    script: CommittedScript,
    rewritten: RewrittenScript,
    namesBefore: ReadonlySet<string>,
    source: string
  ): StateDelta {
    const analysis = analyze(source)
    const defined = analysis.ok ? [...analysis.variablesDefined, ...analysis.functionsDefined] : []
    const importLocals = rewritten.bindings.map((binding) => binding.local)
    const created = session.context.userNames().filter((name) => !namesBefore.has(name))

    session.committed.push(script)
    for (const local of importLocals) session.importLocals.add(local)
    for (const module of rewritten.imports) session.imports.add(module)

    return {
      variables: unique([...defined, ...created]).filter(
        (name) => !importLocals.includes(name) && !session.context.reservedNames.has(name)
      ),
      imports: rewritten.imports,
    }
  }

  /** Replaces the context with one rebuilt from the committed blocks. */
  private async rebuild(session: VmSession): Promise<void> {
    session.context.dispose()
    const context = this.createContext(session.sessionId, session.workingDir)
    session.context = context

    const discarded = new OutputCapture()
    for (const script of session.committed) {
      const replayed = await context.run({ ...script, globals: captureGlobals(discarded) })
      if (replayed.ok) continue

      context.dispose()
      session.lostReason = `Session ${session.sessionId} could not restore its state: ${replayed.error.message}`
      logger.error('Failed to rebuild session state', {
        sessionId: session.sessionId,
        script: script.filename,
        error: replayed.error.message,
      })
      return
    }
    context.takeLateErrors()
    logger.debug('Rebuilt session state', {
      sessionId: session.sessionId,
      blocks: session.committed.length,
    })
  }

  private async snapshotWorkingDir(session: VmSession): Promise<DirectorySnapshot> {
    try {
      return await snapshotDirectory(session.workingDir)
    } catch (error) {
      throw new SessionUnavailableError(
        session.sessionId,
        `Working directory of session ${session.sessionId} is not readable`,
        { cause: error }
      )
    }
  }

  private async collectFiles(session: VmSession, before: DirectorySnapshot) {
    try {
      return await collectFileArtifacts(session.workingDir, before)
    } catch (error) {
      throw new SessionUnavailableError(
        session.sessionId,
        `Working directory of session ${session.sessionId} is not readable`,
        { cause: error }
      )
    }
  }
}

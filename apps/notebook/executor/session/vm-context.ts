import { setImmediate as nextTurn, setTimeout as sleep } from 'node:timers/promises'
import { inspect, types } from 'node:util'
import { type Context, createContext, Script } from 'vm'
import { createLogger } from '@dagbook/logger'
import { ExecutionRuntimeError, ExecutionTimeoutError } from '@/executor/errors'
import type { ExecutionError } from '@/executor/types'

const logger = createLogger('SessionContext')

const TIMEOUT_ERROR_CODE = 'ERR_SCRIPT_EXECUTION_TIMEOUT'

const SETTLE_POLL_MS = 5

const TIMED_OUT = Symbol('timed-out')

/** Host values a plain vm context lacks. Timers are wrapped per context. */
const HOST_GLOBALS = {
  structuredClone,
  Buffer,
  URL,
  URLSearchParams,
  TextEncoder,
  TextDecoder,
  AbortController,
  AbortSignal,
  atob,
  btoa,
}

export type ScriptResult = { ok: true; completion: unknown } | { ok: false; error: ExecutionError }

export interface ScriptRun {
  code: string
  filename: string
  timeoutMs: number
  /** Assigned on the global object and left there, e.g. the run's console. */
  globals?: Record<string, unknown>
  /** Visible to this run only; previous values are restored afterwards. */
  injected?: Record<string, unknown>
}

interface ActiveRun {
  errors: unknown[]
}

interface TrackedTimer {
  repeats: boolean
  clear: () => void
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function locate(stack: string | undefined, filename: string): { line?: number; column?: number } {
  if (!stack) return {}
  const match = new RegExp(`${escapeRegExp(filename)}:(\\d+)(?::(\\d+))?`).exec(stack)
  if (!match) return {}
  return { line: Number(match[1]), column: match[2] ? Number(match[2]) : undefined }
}

/** Drops host frames; keeps the message and frames inside the block. */
function cleanTraceback(stack: string, filename: string): string {
  return stack
    .split('\n')
    .filter((line) => !line.trimStart().startsWith('at ') || line.includes(filename))
    .join('\n')
}

function isTimeout(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === TIMEOUT_ERROR_CODE
}

function timeoutError(timeoutMs: number): ExecutionError {
  const timeout = new ExecutionTimeoutError(timeoutMs)
  return { type: 'timeout', name: timeout.name, message: timeout.message }
}

export function toExecutionError(
  error: unknown,
  phase: 'compile' | 'run',
  filename: string,
  timeoutMs: number
): ExecutionError {
  if (isTimeout(error)) return timeoutError(timeoutMs)

  const thrown = types.isNativeError(error) ? error : new ExecutionRuntimeError(`Uncaught ${inspect(error)}`)
  const traceback = types.isNativeError(error) && error.stack ? cleanTraceback(error.stack, filename) : undefined
  return {
    type: phase === 'compile' ? 'syntax' : 'runtime',
    name: thrown.name,
    message: thrown.message,
    ...locate(thrown.stack, filename),
    traceback,
  }
}

export function describeError(error: unknown): string {
  return types.isNativeError(error) ? `${error.name}: ${error.message}` : `Uncaught ${inspect(error)}`
}

const liveContexts = new Set<SessionContext>()
const retiredPrototypes = new WeakSet<object>()
let rejectionGuardInstalled = false

/**
 * Routes unhandled rejections of promises made inside a session context to
 * that context. Other rejections are rethrown when nothing else listens.
 */
function onUnhandledRejection(reason: unknown, promise: Promise<unknown>): void {
  const prototype: unknown = Object.getPrototypeOf(promise)
  for (const context of liveContexts) {
    if (context.ownsPromisePrototype(prototype)) {
      context.reportUncaught(reason)
      return
    }
  }
  if (typeof prototype === 'object' && prototype !== null && retiredPrototypes.has(prototype)) {
    logger.warn('Rejection from a discarded session context', { error: describeError(reason) })
    return
  }
  if (process.listenerCount('unhandledRejection') === 1) {
    process.nextTick(() => {
      throw reason
    })
  }
}

function installRejectionGuard(): void {
  if (rejectionGuardInstalled) return
  process.on('unhandledRejection', onUnhandledRejection)
  rejectionGuardInstalled = true
}

/**
 * One long-lived `vm` context of a session. Every block of the session runs
 * against the same global object, so values keep their identity, closures and
 * private fields from one block to the next.
 *
 * Timers and microtasks handed to user code are wrapped: their errors, and
 * rejections of promises made in the context, go to the run that is active,
 * or are kept for the next run when none is. A run waits for its one-shot
 * timers and its completion promise within its timeout.
 */
export class SessionContext {
  readonly sandbox: Record<string, unknown>
  /** Names on the global object that belong to the host rather than to user code. */
  readonly reservedNames: ReadonlySet<string>
  private readonly context: Context
  private readonly promisePrototype: unknown
  private readonly timers = new Map<unknown, TrackedTimer>()
  private active: ActiveRun | undefined
  private lateErrors: unknown[] = []

  constructor(name: string, helpers: Record<string, unknown>) {
    this.sandbox = { ...HOST_GLOBALS, ...this.createTimers(), ...helpers }
    this.reservedNames = new Set(Object.keys(this.sandbox))
    this.context = createContext(this.sandbox, { name })
    this.promisePrototype = new Script('Promise.prototype').runInContext(this.context)
    liveContexts.add(this)
    installRejectionGuard()
  }

  ownsPromisePrototype(prototype: unknown): boolean {
    return prototype === this.promisePrototype
  }

  reportUncaught(error: unknown): void {
    if (this.active) {
      this.active.errors.push(error)
      return
    }
    this.lateErrors.push(error)
    logger.warn('Background task failed after its block finished', { error: describeError(error) })
  }

  /** Errors raised by background work since the last run; clears them. */
  takeLateErrors(): unknown[] {
    return this.lateErrors.splice(0)
  }

  /** Global names created by user code. */
  userNames(): string[] {
    return Object.getOwnPropertyNames(this.sandbox).filter((name) => !this.reservedNames.has(name))
  }

  async run(request: ScriptRun): Promise<ScriptResult> {
    const { code, filename, timeoutMs } = request
    let script: Script
    try {
      script = new Script(code, { filename })
    } catch (error) {
      return { ok: false, error: toExecutionError(error, 'compile', filename, timeoutMs) }
    }

    Object.assign(this.sandbox, request.globals)
    const restore = this.inject(request.injected ?? {})
    const active: ActiveRun = { errors: [] }
    this.active = active
    const deadline = Date.now() + timeoutMs

    try {
      let completion: unknown
      try {
        completion = script.runInContext(this.context, { timeout: timeoutMs, displayErrors: false })
      } catch (error) {
        return { ok: false, error: toExecutionError(error, 'run', filename, timeoutMs) }
      }

      if (types.isPromise(completion)) {
        const settled = await this.awaitCompletion(completion, deadline)
        if (settled === TIMED_OUT) return this.timedOut(timeoutMs)
        if (!settled.ok) return { ok: false, error: toExecutionError(settled.error, 'run', filename, timeoutMs) }
        completion = settled.value
      }

      const idle = await this.settle(active, deadline)
      const [first] = active.errors
      if (active.errors.length > 0) {
        return { ok: false, error: toExecutionError(first, 'run', filename, timeoutMs) }
      }
      if (!idle) return this.timedOut(timeoutMs)
      return { ok: true, completion }
    } finally {
      this.active = undefined
      restore()
    }
  }

  /** Clears every timer and forgets the context. */
  dispose(): void {
    for (const timer of this.timers.values()) timer.clear()
    this.timers.clear()
    liveContexts.delete(this)
    if (typeof this.promisePrototype === 'object' && this.promisePrototype !== null) {
      retiredPrototypes.add(this.promisePrototype)
    }
  }

  private timedOut(timeoutMs: number): ScriptResult {
    this.clearPending()
    return { ok: false, error: timeoutError(timeoutMs) }
  }

  private async awaitCompletion(
    completion: Promise<unknown>,
    deadline: number
  ): Promise<{ ok: true; value: unknown } | { ok: false; error: unknown } | typeof TIMED_OUT> {
    let timer: NodeJS.Timeout | undefined
    const expired = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), Math.max(0, deadline - Date.now()))
    })
    try {
      const value = await Promise.race([completion, expired])
      return value === TIMED_OUT ? TIMED_OUT : { ok: true, value }
    } catch (error) {
      return { ok: false, error }
    } finally {
      clearTimeout(timer)
    }
  }

  /** Waits for pending one-shot timers; false when the deadline passes first. */
  private async settle(active: ActiveRun, deadline: number): Promise<boolean> {
    await nextTurn()
    while (this.pendingCount() > 0 && active.errors.length === 0) {
      const remaining = deadline - Date.now()
      if (remaining <= 0) return false
      await sleep(Math.min(SETTLE_POLL_MS, remaining))
    }
    return true
  }

  private pendingCount(): number {
    let count = 0
    for (const timer of this.timers.values()) {
      if (!timer.repeats) count++
    }
    return count
  }

  private clearPending(): void {
    for (const [handle, timer] of this.timers) {
      if (timer.repeats) continue
      timer.clear()
      this.timers.delete(handle)
    }
  }

  private inject(values: Record<string, unknown>): () => void {
    const previous = new Map<string, PropertyDescriptor | undefined>()
    for (const [name, value] of Object.entries(values)) {
      previous.set(name, Reflect.getOwnPropertyDescriptor(this.sandbox, name))
      this.sandbox[name] = value
    }
    return () => {
      for (const [name, descriptor] of previous) {
        if (descriptor) Reflect.defineProperty(this.sandbox, name, descriptor)
        else Reflect.deleteProperty(this.sandbox, name)
      }
    }
  }

  /** Calls user callbacks so that a throw or a rejection is reported instead of escaping. */
  private guard(callback: unknown): (args: unknown[]) => void {
    if (typeof callback !== 'function') {
      throw new TypeError('The "callback" argument must be of type function')
    }
    return (args) => {
      try {
        const result: unknown = Reflect.apply(callback, undefined, args)
        if (types.isPromise(result)) {
          void result.catch((error: unknown) => this.reportUncaught(error))
        }
      } catch (error) {
        this.reportUncaught(error)
      }
    }
  }

  private cancel(handle: unknown): void {
    const timer = this.timers.get(handle)
    if (!timer) return
    timer.clear()
    this.timers.delete(handle)
  }

  private createTimers() {
    return {
      setTimeout: (callback: unknown, delay?: number, ...args: unknown[]) => {
        const invoke = this.guard(callback)
        const handle = setTimeout(() => {
          this.timers.delete(handle)
          invoke(args)
        }, delay)
        this.timers.set(handle, { repeats: false, clear: () => clearTimeout(handle) })
        return handle
      },
      clearTimeout: (handle: unknown) => this.cancel(handle),
      setInterval: (callback: unknown, delay?: number, ...args: unknown[]) => {
        const invoke = this.guard(callback)
        const handle = setInterval(() => invoke(args), delay)
        this.timers.set(handle, { repeats: true, clear: () => clearInterval(handle) })
        return handle
      },
      clearInterval: (handle: unknown) => this.cancel(handle),
      setImmediate: (callback: unknown, ...args: unknown[]) => {
        const invoke = this.guard(callback)
        const handle = setImmediate(() => {
          this.timers.delete(handle)
          invoke(args)
        })
        this.timers.set(handle, { repeats: false, clear: () => clearImmediate(handle) })
        return handle
      },
      clearImmediate: (handle: unknown) => this.cancel(handle),
      queueMicrotask: (callback: unknown) => {
        const invoke = this.guard(callback)
        queueMicrotask(() => invoke([]))
      },
    }
  }
}

import {
  AnalysisFailedError,
  BlockNotFoundError,
  CycleError,
  InvalidEdgeError,
  SessionNotFoundError,
  SessionUnavailableError,
  WorkflowAbortedError,
} from '@/executor/errors'

export class InvalidIntentError extends Error {
  constructor(message = 'Intent is not valid') {
    super(message)
    this.name = 'InvalidIntentError'
  }
}

/** HTTP status a transport layer should answer with for an error raised by the engine. */
export function getErrorStatus(error: unknown): number {
  if (error instanceof BlockNotFoundError || error instanceof SessionNotFoundError) return 404
  if (error instanceof CycleError) return 409
  if (error instanceof AnalysisFailedError) return 422
  if (error instanceof InvalidEdgeError || error instanceof InvalidIntentError) return 400
  if (error instanceof SessionUnavailableError || error instanceof WorkflowAbortedError) return 503
  return 500
}

/** Body for an error response. Unexpected errors keep their message out of the payload. */
export function toErrorResponse(error: unknown): { status: number; error: string; message: string } {
  const status = getErrorStatus(error)
  if (status === 500 || !(error instanceof Error)) {
    return { status, error: 'InternalError', message: 'Internal server error' }
  }
  return { status, error: error.name, message: error.message }
}

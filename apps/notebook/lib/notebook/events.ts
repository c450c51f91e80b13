import { createLogger } from '@dagbook/logger'
import type { BlockExecutionResult, WorkflowStatus } from '@/executor/types'

const logger = createLogger('NotebookEvents')

export type DagUpdateReason =
  | 'block_created'
  | 'block_edited'
  | 'block_deleted'
  | 'edge_added'
  | 'edge_removed'

export type NotebookEvent =
  | {
      type: 'execution_started'
      runId: string
      projectId: string
      sessionId: string
      order: string[]
      timestamp: Date
    }
  | {
      type: 'block_executed'
      runId: string
      projectId: string
      result: BlockExecutionResult
      timestamp: Date
    }
  | {
      type: 'execution_completed'
      runId: string
      projectId: string
      overallStatus: WorkflowStatus
      durationMs: number
      timestamp: Date
    }
  | {
      type: 'dag_updated'
      projectId: string
      reason: DagUpdateReason
      blockId?: string
      /** Blocks that became stale with this change. */
      staleBlocks: string[]
      timestamp: Date
    }

export type NotebookEventType = NotebookEvent['type']

export type NotebookEventHandler = (event: NotebookEvent) => void | Promise<void>

/**
 * Fans events out to subscribers such as a WebSocket broadcaster. Handlers run
 * in subscription order; a failing handler is logged and skipped.
 */
export class NotebookEventBus {
  private readonly handlers = new Set<NotebookEventHandler>()

  subscribe(handler: NotebookEventHandler): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }

  async emit(event: NotebookEvent): Promise<void> {
    for (const handler of [...this.handlers]) {
      try {
        await handler(event)
      } catch (error) {
        logger.error(`Event handler failed for ${event.type}`, {
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
  }
}

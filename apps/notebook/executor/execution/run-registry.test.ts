import { describe, expect, it } from 'vitest'
import { RunRegistry } from '@/executor/execution/run-registry'
import type { BlockExecutionResult, WorkflowResult } from '@/executor/types'

/**
 * Helper to create a finished workflow result for testing
 */
function workflowResult(runId: string, overrides: Partial<WorkflowResult> = {}): WorkflowResult {
  return {
    runId,
    projectId: 'project-1',
    sessionId: 'session-1',
    overallStatus: 'completed',
    order: [],
    results: [],
    startedAt: new Date(1000),
    completedAt: new Date(1500),
    durationMs: 500,
    ...overrides,
  }
}

/**
 * Helper to create a block result for testing
 */
function blockResult(blockId: string, overrides: Partial<BlockExecutionResult> = {}): BlockExecutionResult {
  return {
    blockId,
    sessionId: 'session-1',
    status: 'completed',
    stdout: '',
    stderr: '',
    outputs: [],
    durationMs: 20,
    executedAt: new Date(1200),
    delta: { variables: [], imports: [] },
    ...overrides,
  }
}

describe('RunRegistry', () => {
  it('logs each block of an active run and keeps the log once it finishes', () => {
    const registry = new RunRegistry()
    registry.begin({
      runId: 'run-1',
      projectId: 'project-1',
      sessionId: 'session-1',
      order: ['a', 'b'],
      startedAt: new Date(1000),
    })
    registry.blockFinished(
      'run-1',
      blockResult('a', {
        status: 'failed',
        error: { type: 'runtime', name: 'Error', message: 'boom' },
      })
    )
    registry.blockFinished(
      'run-1',
      blockResult('b', {
        status: 'skipped',
        durationMs: 0,
        skipReason: { kind: 'upstream-failed', blockId: 'a' },
      })
    )

    expect(registry.getLog('run-1').map((entry) => entry.message)).toEqual([
      'Run started with 2 blocks',
      'Block a failed: boom',
      'Block b skipped: upstream block a did not complete',
    ])

    registry.finish(workflowResult('run-1', { overallStatus: 'completed_with_errors', order: ['a', 'b'] }))

    expect(registry.get('run-1')).toBeUndefined()
    expect(registry.getRecord('run-1')?.blocks).toEqual([
      { blockId: 'a', status: 'failed', durationMs: 20 },
      { blockId: 'b', status: 'skipped', durationMs: 0 },
    ])
    expect(registry.getLog('run-1').at(-1)).toEqual({
      timestamp: new Date(1500),
      level: 'warn',
      message: 'Run finished with status completed_with_errors',
    })
  })

  it('records a run refused for a cycle with the reason', () => {
    const registry = new RunRegistry()

    registry.finish(
      workflowResult('run-2', {
        overallStatus: 'failed',
        error: {
          type: 'cycle',
          reason: 'Dependency cycle detected among blocks: {a, b}',
          cycleNodes: ['a', 'b'],
        },
      })
    )

    expect(registry.getLog('run-2').map((entry) => [entry.level, entry.message])).toEqual([
      ['error', 'Dependency cycle detected among blocks: {a, b}'],
      ['warn', 'Run finished with status failed'],
    ])
  })

  it('records an abandoned run as failed', () => {
    const registry = new RunRegistry()
    registry.begin({
      runId: 'run-3',
      projectId: 'project-1',
      sessionId: 'session-1',
      order: ['a'],
      startedAt: new Date(1000),
    })

    registry.abandon('run-3', new Error('repository offline'), new Date(1250))

    expect(registry.getRecord('run-3')).toMatchObject({ status: 'failed', durationMs: 250 })
    expect(registry.getLog('run-3').at(-1)?.message).toBe('Run ended unexpectedly: repository offline')
  })

  it('keeps only the most recent finished runs', () => {
    const registry = new RunRegistry(2)

    for (const runId of ['run-1', 'run-2', 'run-3']) registry.finish(workflowResult(runId))

    expect(registry.listRecords().map((record) => record.runId)).toEqual(['run-3', 'run-2'])
    expect(registry.getRecord('run-1')).toBeUndefined()
    expect(registry.getLog('run-1')).toEqual([])
  })

  it('summarizes finished runs per project', () => {
    const registry = new RunRegistry()
    registry.finish(workflowResult('run-1', { durationMs: 300 }))
    registry.finish(workflowResult('run-2', { overallStatus: 'cancelled', durationMs: 100 }))
    registry.finish(workflowResult('run-3', { projectId: 'project-2' }))

    expect(registry.statistics('project-1')).toEqual({
      activeRuns: 0,
      runs: { total: 2, completed: 1, completed_with_errors: 0, failed: 0, cancelled: 1 },
      blocks: { total: 0, completed: 0, failed: 0, skipped: 0 },
      averageRunDurationMs: 200,
      averageBlockDurationMs: 0,
      successRate: 50,
    })
  })
})

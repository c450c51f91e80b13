import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { parseEnv } from '@/lib/core/config/env'
import { createNotebookEngine } from '@/lib/notebook/engine'
import type { NotebookEvent } from '@/lib/notebook/events'
import { InvalidIntentError } from '@/lib/notebook/errors'

describe('createNotebookEngine', () => {
  let workspaceDir: string

  beforeAll(async () => {
    workspaceDir = await mkdtemp(join(tmpdir(), 'notebook-engine-'))
  })

  afterAll(async () => {
    await rm(workspaceDir, { recursive: true, force: true })
  })

  it('runs intents end to end against in-memory storage', async () => {
    const engine = createNotebookEngine({
      env: parseEnv({ NODE_ENV: 'test', NOTEBOOK_WORKSPACE_DIR: workspaceDir }),
    })
    const seen: NotebookEvent['type'][] = []
    engine.events.subscribe((event) => {
      seen.push(event.type)
    })

    await engine.handleIntent({ type: 'add_block', projectId: 'project-1', source: 'const x = 20' })
    await engine.handleIntent({ type: 'add_block', projectId: 'project-1', source: 'console.log(x + 1)' })
    const outcome = await engine.handleIntent({ type: 'execute', projectId: 'project-1' })

    if (outcome.type !== 'executed') throw new Error(`Unexpected outcome ${outcome.type}`)
    expect(outcome.result.results.map((result) => result.stdout)).toEqual(['', '21\n'])
    expect(seen).toEqual([
      'dag_updated',
      'dag_updated',
      'execution_started',
      'block_executed',
      'block_executed',
      'execution_completed',
    ])

    await engine.dispose()
    expect(engine.sessions.listSessions()).toEqual([])
  })

  it('rejects malformed intents before touching the graph', async () => {
    const engine = createNotebookEngine({
      env: parseEnv({ NODE_ENV: 'test', NOTEBOOK_WORKSPACE_DIR: workspaceDir }),
    })

    await expect(engine.handleIntent({ type: 'add_block' })).rejects.toBeInstanceOf(InvalidIntentError)
    expect(await engine.graphService.listBlocks('project-1')).toEqual([])
  })
})

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import { WorkflowExecutor } from '@/executor/execution/workflow-executor'
import { ExecutionSessionManager } from '@/executor/session/session-manager'
import { VmExecutionBackend } from '@/executor/session/vm-backend'
import { InvalidIntentError } from '@/lib/notebook/errors'
import { ProjectGraphService } from '@/lib/notebook/graph-service'
import {
  applyIntent,
  cleanDataTemplate,
  type CodeGenerator,
  type IntentDependencies,
  parseIntent,
} from '@/lib/notebook/intents'
import { MemoryBlockRepository, MemoryEdgeRepository } from '@/lib/notebook/repositories/memory'

const PROJECT = 'project-1'

describe('parseIntent', () => {
  it('fills in the default variable name', () => {
    expect(parseIntent({ type: 'import_data', projectId: PROJECT, dataset: 'sales.csv' })).toEqual({
      type: 'import_data',
      projectId: PROJECT,
      dataset: 'sales.csv',
      variable: 'data',
    })
  })

  it('rejects variable names that are not identifiers', () => {
    expect(() => parseIntent({ type: 'clean_data', projectId: PROJECT, variable: '1rows' })).toThrow(
      new InvalidIntentError('Invalid intent: variable: Must be a valid JavaScript identifier')
    )
  })

  it('rejects unknown intent types', () => {
    expect(() => parseIntent({ type: 'drop_database', projectId: PROJECT })).toThrow(InvalidIntentError)
  })
})

describe('cleanDataTemplate', () => {
  it('derives the cleaned variable from the input name', () => {
    expect(cleanDataTemplate('rows').split('\n')[0]).toBe(
      "const rowsClean = rows.filter((row) => Object.values(row).every((value) => value !== null && value !== undefined && value !== ''))"
    )
  })
})

describe('applyIntent', () => {
  let workspaceDir: string
  let datasetPath: string
  let sessions: ExecutionSessionManager
  let deps: IntentDependencies

  beforeAll(async () => {
    workspaceDir = await mkdtemp(join(tmpdir(), 'notebook-intents-'))
    datasetPath = join(workspaceDir, 'people.csv')
    await writeFile(datasetPath, 'name,age\nann,31\nbob,\n')
  })

  afterAll(async () => {
    await rm(workspaceDir, { recursive: true, force: true })
  })

  beforeEach(() => {
    const graphService = new ProjectGraphService({
      blocks: new MemoryBlockRepository(),
      edges: new MemoryEdgeRepository(),
    })
    sessions = new ExecutionSessionManager({
      backend: new VmExecutionBackend({ workspaceDir: join(workspaceDir, 'sessions') }),
    })
    deps = { graphService, executor: new WorkflowExecutor({ graphService, sessions }) }
  })

  afterEach(async () => {
    await sessions.dispose()
  })

  it('imports, cleans and runs a dataset from templates', async () => {
    await applyIntent(parseIntent({ type: 'import_data', projectId: PROJECT, dataset: datasetPath }), deps)
    const clean = await applyIntent(parseIntent({ type: 'clean_data', projectId: PROJECT }), deps)
    expect(clean).toMatchObject({ type: 'block_created', block: { title: 'Clean data', position: 1 } })

    const outcome = await applyIntent({ type: 'execute', projectId: PROJECT }, deps)

    if (outcome.type !== 'executed') throw new Error(`Unexpected outcome ${outcome.type}`)
    expect(outcome.result.overallStatus).toBe('completed')
    expect(outcome.result.results.map((result) => result.stdout)).toEqual([
      'Loaded 2 rows with columns name, age\n',
      'Kept 1 of 2 rows\n',
    ])
  })

  it('asks the generator for code with the session contents', async () => {
    const generate = vi.fn(async () => 'const doubled = total * 2')
    const generator: CodeGenerator = { generate }
    deps = { ...deps, generator }

    const first = await applyIntent(
      { type: 'add_block', projectId: PROJECT, kind: 'code', source: 'const total = 21' },
      deps
    )
    if (first.type !== 'block_created') throw new Error(`Unexpected outcome ${first.type}`)
    await applyIntent({ type: 'execute', projectId: PROJECT, blockIds: [first.block.id] }, deps)

    const second = await applyIntent(
      { type: 'add_block', projectId: PROJECT, kind: 'code', prompt: 'double the total' },
      deps
    )

    expect(generate).toHaveBeenCalledWith({
      intent: 'add_block',
      projectId: PROJECT,
      prompt: 'double the total',
      variables: ['total'],
      imports: [],
    })
    expect(second).toMatchObject({ type: 'block_created', block: { source: 'const doubled = total * 2' } })
  })

  it('refuses prompt edits without a generator', async () => {
    const created = await applyIntent(
      { type: 'add_block', projectId: PROJECT, kind: 'code', source: 'const x = 1' },
      deps
    )
    if (created.type !== 'block_created') throw new Error(`Unexpected outcome ${created.type}`)

    await expect(
      applyIntent({ type: 'edit_block', blockId: created.block.id, prompt: 'make it 2' }, deps)
    ).rejects.toThrow(new InvalidIntentError('Editing from a prompt needs a code generator'))
    await expect(applyIntent({ type: 'edit_block', blockId: created.block.id }, deps)).rejects.toThrow(
      InvalidIntentError
    )
  })

  it('renames a block without making it stale', async () => {
    const created = await applyIntent(
      { type: 'add_block', projectId: PROJECT, kind: 'code', source: 'const x = 1' },
      deps
    )
    if (created.type !== 'block_created') throw new Error(`Unexpected outcome ${created.type}`)

    const edited = await applyIntent(
      { type: 'edit_block', blockId: created.block.id, title: 'Setup' },
      deps
    )

    expect(edited).toMatchObject({ type: 'block_edited', block: { title: 'Setup' }, staleBlocks: [] })
  })

  it('reports the blocks left stale by a delete', async () => {
    const load = await applyIntent(
      { type: 'add_block', projectId: PROJECT, kind: 'code', source: 'const x = 1' },
      deps
    )
    const use = await applyIntent(
      { type: 'add_block', projectId: PROJECT, kind: 'code', source: 'console.log(x)' },
      deps
    )
    if (load.type !== 'block_created' || use.type !== 'block_created') {
      throw new Error('Expected both blocks to be created')
    }
    await applyIntent({ type: 'execute', projectId: PROJECT }, deps)

    const deleted = await applyIntent({ type: 'delete_block', blockId: load.block.id }, deps)

    expect(deleted).toEqual({ type: 'block_deleted', blockId: load.block.id, staleBlocks: [use.block.id] })
  })
})

import { describe, expect, it } from 'vitest'
import type { NotebookBlock } from '@/executor/types'
import { MemoryBlockRepository, MemoryEdgeRepository } from '@/lib/notebook/repositories/memory'

/**
 * Helper to create a block for testing
 */
function createBlock(id: string, position: number, projectId = 'project-1'): NotebookBlock {
  return {
    id,
    projectId,
    kind: 'code',
    language: 'javascript',
    source: '',
    position,
    status: 'idle',
    executionCount: 0,
    updatedAt: new Date(0),
  }
}

describe('MemoryBlockRepository', () => {
  it('lists a project by position', async () => {
    const repository = new MemoryBlockRepository()
    await repository.put(createBlock('b', 1))
    await repository.put(createBlock('a', 0))
    await repository.put(createBlock('z', 0, 'project-2'))

    const listed = await repository.listByProject('project-1')

    expect(listed.map((block) => block.id)).toEqual(['a', 'b'])
  })

  it('hands out copies of stored blocks', async () => {
    const repository = new MemoryBlockRepository()
    await repository.put(createBlock('a', 0))

    const block = await repository.get('a')
    if (block) block.source = 'mutated'

    expect((await repository.get('a'))?.source).toBe('')
  })

  it('reports whether a delete removed anything', async () => {
    const repository = new MemoryBlockRepository()
    await repository.put(createBlock('a', 0))

    expect(await repository.delete('a')).toBe(true)
    expect(await repository.delete('a')).toBe(false)
    expect(await repository.get('a')).toBeUndefined()
  })
})

describe('MemoryEdgeRepository', () => {
  it('keeps one edge per source and target', async () => {
    const repository = new MemoryEdgeRepository()
    const first = await repository.put({
      id: 'edge-1',
      projectId: 'project-1',
      source: 'a',
      target: 'b',
      createdAt: new Date(0),
    })
    const second = await repository.put({ ...first, id: 'edge-2' })

    expect(second.id).toBe('edge-1')
    expect(await repository.listByProject('project-1')).toHaveLength(1)
  })

  it('removes every edge touching a block', async () => {
    const repository = new MemoryEdgeRepository()
    for (const [id, source, target] of [
      ['edge-1', 'a', 'b'],
      ['edge-2', 'b', 'c'],
      ['edge-3', 'a', 'c'],
    ]) {
      await repository.put({ id, projectId: 'project-1', source, target, createdAt: new Date(0) })
    }

    expect(await repository.deleteForBlock('b')).toBe(2)
    expect((await repository.listByProject('project-1')).map((edge) => edge.id)).toEqual(['edge-3'])
  })
})

import { describe, expect, it } from 'vitest'
import { validate } from '@/executor/dag/validator'
import type { DependencyGraph, EdgeKind } from '@/executor/types'

/**
 * Helper to create a graph for testing; nodes take ordinals from their position
 */
function createGraph(
  ids: string[],
  edges: Array<[string, string, EdgeKind?]> = []
): DependencyGraph {
  return {
    nodes: ids.map((id, ordinal) => ({ id, ordinal })),
    edges: edges.map(([source, target, kind = 'variable-dependency']) => ({
      source,
      target,
      kind,
      symbols: [],
    })),
  }
}

describe('validate', () => {
  it('orders independent blocks by ordinal', () => {
    expect(validate(createGraph(['n0', 'n1', 'n2']))).toEqual({
      isValid: true,
      order: ['n0', 'n1', 'n2'],
    })
  })

  it('breaks ties by ascending ordinal as blocks become ready', () => {
    const graph = createGraph(['n0', 'n1', 'n2', 'n3'], [['n2', 'n1']])

    expect(validate(graph)).toEqual({ isValid: true, order: ['n0', 'n2', 'n1', 'n3'] })
  })

  it('treats parallel edges of different kinds as one dependency', () => {
    const graph = createGraph(
      ['a', 'b'],
      [
        ['a', 'b', 'variable-dependency'],
        ['a', 'b', 'explicit'],
      ]
    )

    expect(validate(graph)).toEqual({ isValid: true, order: ['a', 'b'] })
  })

  it('reports every node on a cycle, including self-loops', () => {
    const graph = createGraph(
      ['a', 'b', 'c', 'd', 'e'],
      [
        ['a', 'b'],
        ['b', 'a'],
        ['c', 'c', 'explicit'],
        ['a', 'd'],
      ]
    )

    expect(validate(graph)).toEqual({
      isValid: false,
      reason: '2 dependency cycles detected among blocks: {a, b}; c depends on itself',
      cycleNodes: ['a', 'b', 'c'],
      cycles: [['a', 'b'], ['c']],
    })
  })

  it('describes a single cycle', () => {
    const plan = validate(createGraph(['x', 'y', 'z'], [['x', 'y'], ['y', 'z'], ['z', 'y']]))

    expect(plan).toMatchObject({
      isValid: false,
      reason: 'Dependency cycle detected among blocks: {y, z}',
      cycleNodes: ['y', 'z'],
    })
  })

  it('returns the same plan on repeated calls', () => {
    const graph = createGraph(['a', 'b', 'c', 'd'], [['c', 'a'], ['d', 'b']])

    const first = validate(graph)
    expect(validate(graph)).toEqual(first)
    expect(first).toEqual({ isValid: true, order: ['c', 'a', 'd', 'b'] })
  })
})

import { describe, expect, it } from 'vitest'
import { analyze, emptyAnalysis } from '@/executor/analysis/static-analyzer'
import { buildGraph } from '@/executor/dag/builder'
import { validate } from '@/executor/dag/validator'
import type { AnalysisRecord, ExplicitEdge, GraphBuildInput } from '@/executor/types'

/**
 * Helper to create an analysis record for testing
 */
function record(partial: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return { ...emptyAnalysis('javascript'), ...partial }
}

/**
 * Helper to create graph input from block sources
 */
function fromSources(sources: Record<string, string>, explicitEdges: ExplicitEdge[] = []): GraphBuildInput[] {
  return Object.entries(sources).map(([id, source], index) => ({
    id,
    analysis: analyze(source, 'javascript'),
    explicitEdges: index === 0 ? explicitEdges : [],
  }))
}

describe('buildGraph', () => {
  it('links the load, clean and print chain by variable', () => {
    const blocks = fromSources({
      load: "import fs from 'fs'\nconst df = JSON.parse(fs.readFileSync('x.json', 'utf8'))",
      clean: 'const dfClean = df.filter((row) => row.value !== null)',
      print: 'console.log(dfClean.length)',
    })

    const graph = buildGraph(blocks)

    expect(graph.nodes).toEqual([
      { id: 'load', ordinal: 0 },
      { id: 'clean', ordinal: 1 },
      { id: 'print', ordinal: 2 },
    ])
    expect(graph.edges).toEqual([
      { source: 'load', target: 'clean', kind: 'variable-dependency', symbols: ['df'] },
      { source: 'clean', target: 'print', kind: 'variable-dependency', symbols: ['dfClean'] },
    ])
    expect(validate(graph)).toEqual({ isValid: true, order: ['load', 'clean', 'print'] })
  })

  it('tags imported names as import dependencies even when also assigned', () => {
    const graph = buildGraph([
      {
        id: 'b1',
        analysis: record({
          imports: ['lodash'],
          importBindings: [{ local: '_', module: 'lodash', imported: 'default' }],
          variablesDefined: ['_'],
        }),
      },
      { id: 'b2', analysis: record({ referenced: ['_'] }) },
    ])

    expect(graph.edges).toEqual([
      { source: 'b1', target: 'b2', kind: 'import-dependency', symbols: ['_'] },
    ])
  })

  it('tags function and class definitions as function dependencies', () => {
    const graph = buildGraph([
      { id: 'b1', analysis: record({ functionsDefined: ['clean'], variablesDefined: ['rows'] }) },
      { id: 'b2', analysis: record({ referenced: ['clean', 'rows'] }) },
    ])

    expect(graph.edges).toEqual([
      { source: 'b1', target: 'b2', kind: 'function-dependency', symbols: ['clean'] },
      { source: 'b1', target: 'b2', kind: 'variable-dependency', symbols: ['rows'] },
    ])
  })

  it('links from the nearest earlier definer only', () => {
    const graph = buildGraph([
      { id: 'b1', analysis: record({ variablesDefined: ['x'] }) },
      { id: 'b2', analysis: record({ variablesDefined: ['x'] }) },
      { id: 'b3', analysis: record({ referenced: ['x'] }) },
    ])

    expect(graph.edges).toEqual([
      { source: 'b2', target: 'b3', kind: 'variable-dependency', symbols: ['x'] },
    ])
  })

  it('chains unparseable and unlinked blocks to their predecessor', () => {
    const graph = buildGraph([
      { id: 'b1', analysis: record({ variablesDefined: ['a'] }) },
      { id: 'b2', analysis: analyze('const = 1') },
      { id: 'b3', analysis: record() },
    ])

    expect(graph.edges).toEqual([
      { source: 'b1', target: 'b2', kind: 'execution-order-fallback', symbols: [] },
      { source: 'b2', target: 'b3', kind: 'execution-order-fallback', symbols: [] },
    ])
  })

  it('adds explicit edges once and keeps them beside inferred ones', () => {
    const graph = buildGraph([
      {
        id: 'b1',
        analysis: record({ variablesDefined: ['a'] }),
        explicitEdges: [
          { source: 'b1', target: 'b2' },
          { source: 'b1', target: 'b2' },
          { source: 'b1', target: 'missing' },
        ],
      },
      { id: 'b2', analysis: record({ referenced: ['a'] }) },
    ])

    expect(graph.edges).toEqual([
      { source: 'b1', target: 'b2', kind: 'variable-dependency', symbols: ['a'] },
      { source: 'b1', target: 'b2', kind: 'explicit', symbols: [] },
    ])
  })

  it('keeps a fallback edge next to an explicit edge into an unparseable block', () => {
    const graph = buildGraph([
      { id: 'b1', analysis: record(), explicitEdges: [{ source: 'b1', target: 'b2' }] },
      { id: 'b2', analysis: analyze('let (') },
    ])

    expect(graph.edges.map((edge) => edge.kind)).toEqual(['explicit', 'execution-order-fallback'])
  })

  it('reports a cycle when blocks read each other', () => {
    const blocks = fromSources(
      {
        b1: 'const x = y + 1',
        b2: 'const y = x * 2',
      },
      [{ source: 'b1', target: 'b2' }]
    )

    const graph = buildGraph(blocks)
    const plan = validate(graph)

    expect(graph.edges).toEqual([
      { source: 'b2', target: 'b1', kind: 'variable-dependency', symbols: ['y'] },
      { source: 'b1', target: 'b2', kind: 'variable-dependency', symbols: ['x'] },
      { source: 'b1', target: 'b2', kind: 'explicit', symbols: [] },
    ])
    expect(plan.isValid).toBe(false)
    if (!plan.isValid) {
      expect(plan.cycleNodes).toEqual(['b1', 'b2'])
    }
  })

  it('flips a valid plan to a cycle when a block starts reading a later name', () => {
    const before = fromSources({
      b1: 'const data = [1, 2, 3]',
      b2: 'const total = data.length',
      b3: 'const report = `${total}`',
    })
    expect(validate(buildGraph(before)).isValid).toBe(true)

    const after = fromSources({
      b1: 'const data = [1, 2, 3]',
      b2: 'const total = data.length + report.length',
      b3: 'const report = `${total}`',
    })
    const plan = validate(buildGraph(after))

    expect(plan.isValid).toBe(false)
    if (!plan.isValid) {
      expect(plan.cycleNodes).toEqual(['b2', 'b3'])
    }
  })

  it('drops only the edge for a name an edit stopped reading', () => {
    const sources = {
      b1: 'const a = 1',
      b2: 'const b = 2',
      b3: 'const c = a + b',
      b4: 'console.log(c)',
    }
    const before = buildGraph(fromSources(sources))
    const after = buildGraph(fromSources({ ...sources, b3: 'const c = b * 2' }))

    expect(before.edges).toEqual([
      { source: 'b1', target: 'b3', kind: 'variable-dependency', symbols: ['a'] },
      { source: 'b2', target: 'b3', kind: 'variable-dependency', symbols: ['b'] },
      { source: 'b3', target: 'b4', kind: 'variable-dependency', symbols: ['c'] },
    ])
    expect(after.edges).toEqual([
      { source: 'b2', target: 'b3', kind: 'variable-dependency', symbols: ['b'] },
      { source: 'b3', target: 'b4', kind: 'variable-dependency', symbols: ['c'] },
    ])
  })

  it('is deterministic and respects every edge in the order', () => {
    const sources: Record<string, string> = {}
    for (let i = 0; i < 12; i++) {
      const reads = i === 0 ? '0' : `v${i - 1} + v${Math.floor(i / 2)}`
      sources[`b${i}`] = i % 5 === 4 ? '// notes only' : `const v${i} = ${reads}`
    }

    const first = buildGraph(fromSources(sources))
    const second = buildGraph(fromSources(sources))
    const plan = validate(first)

    expect(second).toEqual(first)
    expect(validate(second)).toEqual(plan)
    expect(plan.isValid).toBe(true)
    if (plan.isValid) {
      const position = new Map(plan.order.map((id, index) => [id, index]))
      for (const edge of first.edges) {
        expect(position.get(edge.source) ?? -1).toBeLessThan(position.get(edge.target) ?? -1)
      }
    }
  })
})

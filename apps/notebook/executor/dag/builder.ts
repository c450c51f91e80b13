/**
 * DependencyGraphBuilder
 *
 * Derives the dependency graph of a notebook from its blocks in ordinal order.
 *
 * Steps:
 * 1. Inferred edges - link each referenced name to the block that defines it
 * 2. Explicit edges - copy user and agent edges verbatim
 * 3. Fallback edges - chain unparseable or unlinked blocks to their predecessor
 */

import { createLogger } from '@dagbook/logger'
import type {
  AnalysisResult,
  DependencyEdge,
  DependencyGraph,
  EdgeKind,
  GraphBuildInput,
} from '@/executor/types'

const logger = createLogger('DependencyGraphBuilder')

type DefinitionKind = 'import' | 'function' | 'variable'

const EDGE_KIND_BY_DEFINITION: Record<DefinitionKind, EdgeKind> = {
  import: 'import-dependency',
  function: 'function-dependency',
  variable: 'variable-dependency',
}

/** Names a block provides to later blocks. Imports win over other definitions of the same name. */
function definitionsOf(analysis: AnalysisResult): Map<string, DefinitionKind> {
  const definitions = new Map<string, DefinitionKind>()
  if (!analysis.ok) return definitions

  for (const binding of analysis.importBindings) {
    definitions.set(binding.local, 'import')
  }
  for (const name of analysis.functionsDefined) {
    if (!definitions.has(name)) definitions.set(name, 'function')
  }
  for (const name of analysis.variablesDefined) {
    if (!definitions.has(name)) definitions.set(name, 'variable')
  }
  return definitions
}

class EdgeSet {
  private readonly edges = new Map<string, DependencyEdge>()

  add(source: string, target: string, kind: EdgeKind, symbol?: string): void {
    const key = `${source}\u0000${target}\u0000${kind}`
    const existing = this.edges.get(key)
    if (existing) {
      if (symbol && !existing.symbols.includes(symbol)) existing.symbols.push(symbol)
      return
    }
    this.edges.set(key, { source, target, kind, symbols: symbol ? [symbol] : [] })
  }

  touches(blockId: string): boolean {
    for (const edge of this.edges.values()) {
      if (edge.source === blockId || edge.target === blockId) return true
    }
    return false
  }

  toArray(): DependencyEdge[] {
    return [...this.edges.values()]
  }
}

export class DependencyGraphBuilder {
  build(blocks: GraphBuildInput[]): DependencyGraph {
    const nodes = blocks.map((block, ordinal) => ({ id: block.id, ordinal }))
    const knownIds = new Set(nodes.map((node) => node.id))
    const edges = new EdgeSet()

    this.addInferredEdges(blocks, edges)
    this.addExplicitEdges(blocks, knownIds, edges)
    this.addFallbackEdges(blocks, edges)

    const graph = { nodes, edges: edges.toArray() }
    logger.debug('Built dependency graph', {
      nodes: graph.nodes.length,
      edges: graph.edges.length,
    })
    return graph
  }

  /**
   * Each referenced name links from the nearest earlier block defining it. A name
   * only defined later links from the nearest later definer, which the validator
   * then reports as a cycle.
   */
  private addInferredEdges(blocks: GraphBuildInput[], edges: EdgeSet): void {
    const definitions = blocks.map((block) => definitionsOf(block.analysis))

    blocks.forEach((block, index) => {
      if (!block.analysis.ok) return

      for (const name of block.analysis.referenced) {
        const definer = this.findDefiner(definitions, index, name)
        if (definer === undefined) continue
        const kind = definitions[definer].get(name)
        if (!kind) continue
        edges.add(blocks[definer].id, block.id, EDGE_KIND_BY_DEFINITION[kind], name)
      }
    })
  }

  private findDefiner(
    definitions: Map<string, DefinitionKind>[],
    index: number,
    name: string
  ): number | undefined {
    for (let earlier = index - 1; earlier >= 0; earlier--) {
      if (definitions[earlier].has(name)) return earlier
    }
    for (let later = index + 1; later < definitions.length; later++) {
      if (definitions[later].has(name)) return later
    }
    return undefined
  }

  private addExplicitEdges(blocks: GraphBuildInput[], knownIds: Set<string>, edges: EdgeSet): void {
    for (const block of blocks) {
      for (const edge of block.explicitEdges ?? []) {
        if (!knownIds.has(edge.source) || !knownIds.has(edge.target)) {
          logger.warn('Dropping explicit edge with unknown endpoint', edge)
          continue
        }
        edges.add(edge.source, edge.target, 'explicit')
      }
    }
  }

  private addFallbackEdges(blocks: GraphBuildInput[], edges: EdgeSet): void {
    const needsFallback = blocks.map(
      (block, index) => index > 0 && (!block.analysis.ok || !edges.touches(block.id))
    )

    needsFallback.forEach((needed, index) => {
      if (needed) edges.add(blocks[index - 1].id, blocks[index].id, 'execution-order-fallback')
    })
  }
}

export function buildGraph(blocks: GraphBuildInput[]): DependencyGraph {
  return new DependencyGraphBuilder().build(blocks)
}

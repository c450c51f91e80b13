import { CycleError } from '@/executor/errors'
import { buildAdjacency, validate } from '@/executor/dag/validator'
import type { DependencyEdge, DependencyGraph, EdgeKind } from '@/executor/types'

/** Edges that carry data or a user's intent; fallback edges only fix an order. */
export const DATA_EDGE_KINDS: readonly EdgeKind[] = [
  'variable-dependency',
  'import-dependency',
  'function-dependency',
  'explicit',
]

export interface TraversalOptions {
  /** Edge kinds to follow. Defaults to every kind. */
  kinds?: readonly EdgeKind[]
}

function followedEdges(graph: DependencyGraph, options: TraversalOptions): DependencyEdge[] {
  const { kinds } = options
  return kinds ? graph.edges.filter((edge) => kinds.includes(edge.kind)) : graph.edges
}

function sortByOrdinal(graph: DependencyGraph, ids: Iterable<string>): string[] {
  const ordinals = new Map(graph.nodes.map((node) => [node.id, node.ordinal]))
  return [...ids].sort((a, b) => (ordinals.get(a) ?? 0) - (ordinals.get(b) ?? 0))
}

function reachable(
  edges: DependencyEdge[],
  starts: string[],
  direction: 'downstream' | 'upstream'
): Set<string> {
  const neighbours = new Map<string, string[]>()
  for (const edge of edges) {
    const [from, to] = direction === 'downstream' ? [edge.source, edge.target] : [edge.target, edge.source]
    const list = neighbours.get(from) ?? []
    list.push(to)
    neighbours.set(from, list)
  }

  const visited = new Set<string>()
  const queue = [...starts]
  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined) break
    for (const next of neighbours.get(current) ?? []) {
      if (visited.has(next)) continue
      visited.add(next)
      queue.push(next)
    }
  }
  return visited
}

/** Blocks that transitively depend on `blockId`, in ordinal order. */
export function getDownstreamBlocks(
  graph: DependencyGraph,
  blockId: string,
  options: TraversalOptions = {}
): string[] {
  const found = reachable(followedEdges(graph, options), [blockId], 'downstream')
  found.delete(blockId)
  return sortByOrdinal(graph, found)
}

/** Blocks that `blockId` transitively depends on, in ordinal order. */
export function getUpstreamBlocks(
  graph: DependencyGraph,
  blockId: string,
  options: TraversalOptions = {}
): string[] {
  const found = reachable(followedEdges(graph, options), [blockId], 'upstream')
  found.delete(blockId)
  return sortByOrdinal(graph, found)
}

/** The changed blocks plus everything downstream of them. */
export function getAffectedBlocks(
  graph: DependencyGraph,
  changed: string[],
  options: TraversalOptions = {}
): string[] {
  const known = new Set(graph.nodes.map((node) => node.id))
  const starts = changed.filter((id) => known.has(id))
  const affected = reachable(followedEdges(graph, options), starts, 'downstream')
  for (const id of starts) affected.add(id)
  return sortByOrdinal(graph, affected)
}

/**
 * Groups blocks into levels; every block in a level depends only on blocks in
 * earlier levels. Throws {@link CycleError} when the graph has a cycle.
 */
export function getParallelGroups(graph: DependencyGraph): string[][] {
  const plan = validate(graph)
  if (!plan.isValid) {
    throw new CycleError(plan.cycleNodes, plan.reason)
  }

  const { successors } = buildAdjacency(graph)
  const level = new Map<string, number>()
  for (const id of plan.order) {
    const current = level.get(id) ?? 0
    level.set(id, current)
    for (const next of successors.get(id) ?? []) {
      level.set(next, Math.max(level.get(next) ?? 0, current + 1))
    }
  }

  const groups: string[][] = []
  for (const id of plan.order) {
    const index = level.get(id) ?? 0
    groups[index] ??= []
    groups[index].push(id)
  }
  return groups.map((group) => sortByOrdinal(graph, group))
}

export type EdgeAdditionCheck =
  | { valid: true }
  | { valid: false; reason: 'unknown-node' | 'self-loop' | 'duplicate' | 'cycle'; message: string }

/** Whether adding an explicit edge `source -> target` keeps the graph a valid DAG. */
export function validateEdgeAddition(
  graph: DependencyGraph,
  source: string,
  target: string
): EdgeAdditionCheck {
  const known = new Set(graph.nodes.map((node) => node.id))
  const missing = [source, target].filter((id) => !known.has(id))
  if (missing.length > 0) {
    return { valid: false, reason: 'unknown-node', message: `Unknown block: ${missing.join(', ')}` }
  }
  if (source === target) {
    return { valid: false, reason: 'self-loop', message: `Block ${source} cannot depend on itself` }
  }
  if (graph.edges.some((edge) => edge.kind === 'explicit' && edge.source === source && edge.target === target)) {
    return { valid: false, reason: 'duplicate', message: `Edge ${source} -> ${target} already exists` }
  }
  if (reachable(graph.edges, [target], 'downstream').has(source)) {
    return {
      valid: false,
      reason: 'cycle',
      message: `Edge ${source} -> ${target} would create a cycle`,
    }
  }
  return { valid: true }
}

export interface GraphStatistics {
  nodeCount: number
  edgeCount: number
  edgesByKind: Record<EdgeKind, number>
  roots: string[]
  leaves: string[]
  /** Number of levels on the longest path; null when the graph has a cycle. */
  maxDepth: number | null
  averageInDegree: number
  averageOutDegree: number
}

export function getGraphStatistics(graph: DependencyGraph): GraphStatistics {
  const { successors, inDegree } = buildAdjacency(graph)
  const edgesByKind: Record<EdgeKind, number> = {
    'variable-dependency': 0,
    'import-dependency': 0,
    'function-dependency': 0,
    explicit: 0,
    'execution-order-fallback': 0,
  }
  for (const edge of graph.edges) edgesByKind[edge.kind]++

  const ids = graph.nodes.map((node) => node.id)
  const totalIn = ids.reduce((sum, id) => sum + (inDegree.get(id) ?? 0), 0)
  const totalOut = ids.reduce((sum, id) => sum + (successors.get(id)?.length ?? 0), 0)
  const nodeCount = ids.length

  return {
    nodeCount,
    edgeCount: graph.edges.length,
    edgesByKind,
    roots: ids.filter((id) => (inDegree.get(id) ?? 0) === 0),
    leaves: ids.filter((id) => (successors.get(id)?.length ?? 0) === 0),
    maxDepth: validate(graph).isValid ? getParallelGroups(graph).length : null,
    averageInDegree: nodeCount > 0 ? totalIn / nodeCount : 0,
    averageOutDegree: nodeCount > 0 ? totalOut / nodeCount : 0,
  }
}

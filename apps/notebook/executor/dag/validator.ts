import { createLogger } from '@dagbook/logger'
import type { DependencyGraph, ExecutionPlan } from '@/executor/types'

const logger = createLogger('GraphValidator')

interface Adjacency {
  ordinals: Map<string, number>
  successors: Map<string, string[]>
  inDegree: Map<string, number>
}

/** Edge kinds are irrelevant for ordering; parallel edges between one pair count once. */
export function buildAdjacency(graph: DependencyGraph): Adjacency {
  const ordinals = new Map(graph.nodes.map((node) => [node.id, node.ordinal]))
  const successors = new Map<string, string[]>(graph.nodes.map((node) => [node.id, []]))
  const inDegree = new Map<string, number>(graph.nodes.map((node) => [node.id, 0]))

  for (const edge of graph.edges) {
    const targets = successors.get(edge.source)
    if (!targets || !ordinals.has(edge.target) || targets.includes(edge.target)) continue
    targets.push(edge.target)
    inDegree.set(edge.target, (inDegree.get(edge.target) ?? 0) + 1)
  }

  return { ordinals, successors, inDegree }
}

function insertByOrdinal(queue: string[], id: string, ordinals: Map<string, number>): void {
  const ordinal = ordinals.get(id) ?? 0
  let index = queue.length
  while (index > 0 && (ordinals.get(queue[index - 1]) ?? 0) > ordinal) index--
  queue.splice(index, 0, id)
}

/**
 * Tarjan's strongly connected components over the given nodes. Returns only
 * components that contain a cycle: more than one node, or a node with a self-loop.
 */
function findCycles(nodes: string[], adjacency: Adjacency): string[][] {
  const inScope = new Set(nodes)
  const indexOf = new Map<string, number>()
  const lowLink = new Map<string, number>()
  const stack: string[] = []
  const onStack = new Set<string>()
  const cycles: string[][] = []
  let counter = 0

  const visit = (id: string) => {
    indexOf.set(id, counter)
    lowLink.set(id, counter)
    counter++
    stack.push(id)
    onStack.add(id)

    for (const next of adjacency.successors.get(id) ?? []) {
      if (!inScope.has(next)) continue
      if (!indexOf.has(next)) {
        visit(next)
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, lowLink.get(next) ?? 0))
      } else if (onStack.has(next)) {
        lowLink.set(id, Math.min(lowLink.get(id) ?? 0, indexOf.get(next) ?? 0))
      }
    }

    if (lowLink.get(id) !== indexOf.get(id)) return

    const component: string[] = []
    let member: string | undefined
    do {
      member = stack.pop()
      if (member === undefined) break
      onStack.delete(member)
      component.push(member)
    } while (member !== id)

    const selfLoop = component.length === 1 && (adjacency.successors.get(id) ?? []).includes(id)
    if (component.length > 1 || selfLoop) cycles.push(component)
  }

  for (const id of nodes) {
    if (!indexOf.has(id)) visit(id)
  }

  const byOrdinal = (a: string, b: string) =>
    (adjacency.ordinals.get(a) ?? 0) - (adjacency.ordinals.get(b) ?? 0)
  return cycles
    .map((cycle) => [...cycle].sort(byOrdinal))
    .sort((a, b) => byOrdinal(a[0], b[0]))
}

function describeCycles(cycles: string[][]): string {
  const parts = cycles.map((cycle) =>
    cycle.length === 1 ? `${cycle[0]} depends on itself` : `{${cycle.join(', ')}}`
  )
  return cycles.length === 1
    ? `Dependency cycle detected among blocks: ${parts[0]}`
    : `${cycles.length} dependency cycles detected among blocks: ${parts.join('; ')}`
}

/**
 * Orders the graph with Kahn's algorithm, breaking ties by ascending ordinal.
 * A graph with cycles yields a rejected plan naming every node on a cycle.
 */
export function validate(graph: DependencyGraph): ExecutionPlan {
  const adjacency = buildAdjacency(graph)
  const remainingInDegree = new Map(adjacency.inDegree)
  const ready: string[] = []

  for (const node of graph.nodes) {
    if ((remainingInDegree.get(node.id) ?? 0) === 0) insertByOrdinal(ready, node.id, adjacency.ordinals)
  }

  const order: string[] = []
  while (ready.length > 0) {
    const id = ready.shift()
    if (id === undefined) break
    order.push(id)
    for (const next of adjacency.successors.get(id) ?? []) {
      const degree = (remainingInDegree.get(next) ?? 0) - 1
      remainingInDegree.set(next, degree)
      if (degree === 0) insertByOrdinal(ready, next, adjacency.ordinals)
    }
  }

  if (order.length === graph.nodes.length) {
    return { isValid: true, order }
  }

  const ordered = new Set(order)
  const unresolved = graph.nodes.map((node) => node.id).filter((id) => !ordered.has(id))
  const cycles = findCycles(unresolved, adjacency)
  const cycleNodes = cycles.flat().sort(
    (a, b) => (adjacency.ordinals.get(a) ?? 0) - (adjacency.ordinals.get(b) ?? 0)
  )
  const reason = describeCycles(cycles)

  logger.warn('Dependency graph is not acyclic', { cycleNodes })
  return { isValid: false, reason, cycleNodes, cycles }
}

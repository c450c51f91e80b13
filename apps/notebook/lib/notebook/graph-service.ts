import { createLogger } from '@dagbook/logger'
import { v4 as uuidv4 } from 'uuid'
import { type AnalysisCache, createAnalysisCache } from '@/executor/analysis/analysis-cache'
import { DEFAULT_LANGUAGE_BY_KIND } from '@/executor/constants'
import { buildGraph } from '@/executor/dag/builder'
import {
  DATA_EDGE_KINDS,
  type GraphStatistics,
  getDownstreamBlocks,
  getGraphStatistics,
  validateEdgeAddition,
} from '@/executor/dag/traversal'
import { validate } from '@/executor/dag/validator'
import { BlockNotFoundError, CycleError, InvalidEdgeError } from '@/executor/errors'
import type {
  AnalysisResult,
  BlockExecutionResult,
  BlockKind,
  BlockStatus,
  DependencyGraph,
  ExecutionPlan,
  GraphBuildInput,
  NotebookBlock,
} from '@/executor/types'
import type { DagUpdateReason, NotebookEventBus } from '@/lib/notebook/events'
import type { BlockRepository, EdgeRepository, StoredEdge } from '@/lib/notebook/repositories/types'

const logger = createLogger('ProjectGraphService')

/** Statuses that describe a past run, and so can go out of date. */
const EXECUTED_STATUSES: ReadonlySet<BlockStatus> = new Set<BlockStatus>([
  'running',
  'completed',
  'failed',
  'skipped',
])

export interface NewBlockInput {
  id?: string
  projectId: string
  kind?: BlockKind
  language?: string
  title?: string
  source?: string
  /** Insert position; later blocks shift down. Appends when omitted. */
  position?: number
}

export interface BlockChange {
  block: NotebookBlock
  /** Blocks marked stale by the change, in notebook order. */
  staleBlocks: string[]
}

export type DagReport = ExecutionPlan & { statistics: GraphStatistics }

export interface GraphServiceOptions {
  blocks: BlockRepository
  edges: EdgeRepository
  events?: NotebookEventBus
  analysisCache?: AnalysisCache
  now?: () => Date
}

/**
 * Keeps each project's dependency graph in step with its blocks and explicit
 * edges. Every mutation re-analyses what changed, drops the cached graph, marks
 * affected blocks stale and emits `dag_updated`.
 */
export class ProjectGraphService {
  private readonly blocks: BlockRepository
  private readonly edges: EdgeRepository
  private readonly events?: NotebookEventBus
  private readonly analysisCache: AnalysisCache
  private readonly now: () => Date
  private readonly graphs = new Map<string, DependencyGraph>()
  /** Bumped whenever a project's graph is invalidated; a build only caches if it is unchanged. */
  private readonly generations = new Map<string, number>()

  constructor(options: GraphServiceOptions) {
    this.blocks = options.blocks
    this.edges = options.edges
    this.events = options.events
    this.analysisCache = options.analysisCache ?? createAnalysisCache()
    this.now = options.now ?? (() => new Date())
  }

  async onBlockCreated(input: NewBlockInput): Promise<NotebookBlock> {
    const kind = input.kind ?? 'code'
    const existing = await this.blocks.listByProject(input.projectId)
    const end = existing.length > 0 ? Math.max(...existing.map((block) => block.position)) + 1 : 0
    const position = input.position === undefined ? end : Math.min(Math.max(input.position, 0), end)

    for (const block of existing) {
      if (block.position >= position) {
        await this.blocks.put({ ...block, position: block.position + 1 })
      }
    }

    const block: NotebookBlock = {
      id: input.id ?? uuidv4(),
      projectId: input.projectId,
      kind,
      language: input.language ?? DEFAULT_LANGUAGE_BY_KIND[kind],
      title: input.title,
      source: input.source ?? '',
      position,
      status: 'idle',
      executionCount: 0,
      updatedAt: this.now(),
    }
    await this.blocks.put(block)
    this.analyze(block)
    this.invalidate(block.projectId)

    // Readers of a name the new block redefines now read it from the new block.
    const after = await this.getGraph(block.projectId)
    const staleBlocks = await this.markStale(
      after,
      new Set(getDownstreamBlocks(after, block.id, { kinds: DATA_EDGE_KINDS }))
    )

    logger.info(`Created block ${block.id}`, { projectId: block.projectId, kind, position, staleBlocks })
    await this.dagChanged(block.projectId, 'block_created', block.id, staleBlocks)
    return block
  }

  async onBlockEdited(
    blockId: string,
    newSource: string,
    changes: { title?: string; language?: string } = {}
  ): Promise<BlockChange> {
    const block = await this.requireBlock(blockId)
    const sourceChanged = block.source !== newSource
    const languageChanged = changes.language !== undefined && changes.language !== block.language

    if (!sourceChanged && !languageChanged) {
      if (changes.title !== undefined && changes.title !== block.title) {
        const renamed = { ...block, title: changes.title, updatedAt: this.now() }
        await this.blocks.put(renamed)
        return { block: renamed, staleBlocks: [] }
      }
      return { block, staleBlocks: [] }
    }

    const before = await this.getGraph(block.projectId)
    const edited: NotebookBlock = {
      ...block,
      source: newSource,
      language: changes.language ?? block.language,
      title: changes.title ?? block.title,
      status: EXECUTED_STATUSES.has(block.status) ? 'stale' : block.status,
      updatedAt: this.now(),
    }
    await this.blocks.put(edited)
    this.analyze(edited)
    this.invalidate(block.projectId)
    const after = await this.getGraph(block.projectId)

    const downstream = new Set([
      ...getDownstreamBlocks(before, blockId, { kinds: DATA_EDGE_KINDS }),
      ...getDownstreamBlocks(after, blockId, { kinds: DATA_EDGE_KINDS }),
    ])
    const staleDownstream = await this.markStale(after, downstream)
    const staleBlocks = edited.status === 'stale' ? [blockId, ...staleDownstream] : staleDownstream

    logger.info(`Edited block ${blockId}`, { projectId: block.projectId, staleBlocks })
    await this.dagChanged(block.projectId, 'block_edited', blockId, staleBlocks)
    return { block: edited, staleBlocks }
  }

  async onBlockDeleted(blockId: string): Promise<string[]> {
    const block = await this.requireBlock(blockId)
    const before = await this.getGraph(block.projectId)
    const dependents = new Set(getDownstreamBlocks(before, blockId, { kinds: DATA_EDGE_KINDS }))

    await this.edges.deleteForBlock(blockId)
    await this.blocks.delete(blockId)
    this.analysisCache.invalidate(blockId)
    this.invalidate(block.projectId)

    const staleBlocks = await this.markStale(await this.getGraph(block.projectId), dependents)
    logger.info(`Deleted block ${blockId}`, { projectId: block.projectId, staleBlocks })
    await this.dagChanged(block.projectId, 'block_deleted', blockId, staleBlocks)
    return staleBlocks
  }

  /**
   * Stores an explicit edge. Unknown blocks and self-loops are rejected; an edge
   * that closes a cycle is kept, and the plan reports the cycle.
   */
  async onExplicitEdgeAdded(projectId: string, source: string, target: string): Promise<StoredEdge> {
    const graph = await this.getGraph(projectId)
    const check = validateEdgeAddition(graph, source, target)

    if (!check.valid) {
      if (check.reason === 'unknown-node' || check.reason === 'self-loop') {
        throw new InvalidEdgeError(source, target, check.message)
      }
      if (check.reason === 'cycle') {
        logger.warn(check.message, { projectId })
      }
    }

    const edge = await this.edges.put({
      id: uuidv4(),
      projectId,
      source,
      target,
      createdAt: this.now(),
    })
    this.invalidate(projectId)
    await this.dagChanged(projectId, 'edge_added', target, [])
    return edge
  }

  async onExplicitEdgeRemoved(projectId: string, source: string, target: string): Promise<boolean> {
    const removed = await this.edges.delete(projectId, source, target)
    if (removed) {
      this.invalidate(projectId)
      await this.dagChanged(projectId, 'edge_removed', target, [])
    }
    return removed
  }

  async getBlock(blockId: string): Promise<NotebookBlock> {
    return this.requireBlock(blockId)
  }

  async listBlocks(projectId: string): Promise<NotebookBlock[]> {
    return this.blocks.listByProject(projectId)
  }

  getAnalysis(block: NotebookBlock): AnalysisResult {
    return this.analyze(block)
  }

  async getGraph(projectId: string): Promise<DependencyGraph> {
    const cached = this.graphs.get(projectId)
    if (cached) return cached

    const generation = this.generations.get(projectId) ?? 0
    const [blocks, edges] = await Promise.all([
      this.blocks.listByProject(projectId),
      this.edges.listByProject(projectId),
    ])
    const graph = buildGraph(this.toBuildInputs(blocks, edges))
    if ((this.generations.get(projectId) ?? 0) === generation) {
      this.graphs.set(projectId, graph)
    }
    return graph
  }

  async getExecutionPlan(projectId: string): Promise<ExecutionPlan> {
    const plan = validate(await this.getGraph(projectId))
    if (!plan.isValid) {
      logger.warn(`Execution plan rejected for project ${projectId}`, { reason: plan.reason })
    }
    return plan
  }

  async validateDag(projectId: string): Promise<DagReport> {
    const graph = await this.getGraph(projectId)
    return { ...validate(graph), statistics: getGraphStatistics(graph) }
  }

  /** Topological order of the project's blocks; throws `CycleError` for a cyclic graph. */
  async getExecutionOrder(projectId: string): Promise<string[]> {
    const plan = await this.getExecutionPlan(projectId)
    if (!plan.isValid) throw new CycleError(plan.cycleNodes, plan.reason)
    return plan.order
  }

  async setStatus(blockId: string, status: BlockStatus): Promise<void> {
    const block = await this.blocks.get(blockId)
    if (!block) return
    await this.blocks.put({ ...block, status })
  }

  /**
   * Writes a run's result onto the block. `executed` is the block as it was when
   * the run was planned, and `upstream` the blocks it depended on, as they were
   * then. If any of their sources has changed since, the block stays stale.
   * Returns undefined when the block was deleted meanwhile.
   */
  async recordExecution(
    executed: NotebookBlock,
    result: BlockExecutionResult,
    upstream: NotebookBlock[] = []
  ): Promise<NotebookBlock | undefined> {
    const current = await this.blocks.get(executed.id)
    if (!current) {
      logger.debug(`Block ${executed.id} was deleted before its result was recorded`)
      return undefined
    }

    const outdated = current.source !== executed.source || (await this.anyEdited(upstream))
    const updated: NotebookBlock = {
      ...current,
      status: outdated ? 'stale' : result.status,
      lastResult: result,
      lastError: result.error?.message,
      lastDurationMs: result.durationMs,
      executionCount:
        result.status === 'skipped' ? current.executionCount : current.executionCount + 1,
    }
    await this.blocks.put(updated)
    return updated
  }

  private async anyEdited(blocks: NotebookBlock[]): Promise<boolean> {
    for (const block of blocks) {
      const current = await this.blocks.get(block.id)
      if (current?.source !== block.source) return true
    }
    return false
  }

  private invalidate(projectId: string): void {
    this.graphs.delete(projectId)
    this.generations.set(projectId, (this.generations.get(projectId) ?? 0) + 1)
  }

  private analyze(block: NotebookBlock): AnalysisResult {
    return this.analysisCache.get(block.id, block.source, block.language)
  }

  private toBuildInputs(blocks: NotebookBlock[], edges: StoredEdge[]): GraphBuildInput[] {
    return blocks.map((block) => ({
      id: block.id,
      analysis: this.analyze(block),
      explicitEdges: edges
        .filter((edge) => edge.target === block.id)
        .map(({ source, target }) => ({ source, target })),
    }))
  }

  private async markStale(graph: DependencyGraph, blockIds: Set<string>): Promise<string[]> {
    const ordered = graph.nodes.map((node) => node.id).filter((id) => blockIds.has(id))
    const marked: string[] = []
    for (const blockId of ordered) {
      const block = await this.blocks.get(blockId)
      if (!block || !EXECUTED_STATUSES.has(block.status)) continue
      await this.blocks.put({ ...block, status: 'stale' })
      marked.push(blockId)
    }
    return marked
  }

  private async requireBlock(blockId: string): Promise<NotebookBlock> {
    const block = await this.blocks.get(blockId)
    if (!block) throw new BlockNotFoundError(blockId)
    return block
  }

  private async dagChanged(
    projectId: string,
    reason: DagUpdateReason,
    blockId: string | undefined,
    staleBlocks: string[]
  ): Promise<void> {
    this.invalidate(projectId)
    await this.events?.emit({
      type: 'dag_updated',
      projectId,
      reason,
      blockId,
      staleBlocks,
      timestamp: this.now(),
    })
  }
}

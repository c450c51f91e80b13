import type { NotebookBlock } from '@/executor/types'
import type { BlockRepository, EdgeRepository, StoredEdge } from '@/lib/notebook/repositories/types'

/** Blocks kept in a map; callers get copies so they cannot mutate stored records. */
export class MemoryBlockRepository implements BlockRepository {
  private readonly blocks = new Map<string, NotebookBlock>()

  async get(blockId: string): Promise<NotebookBlock | undefined> {
    const block = this.blocks.get(blockId)
    return block ? { ...block } : undefined
  }

  async put(block: NotebookBlock): Promise<void> {
    this.blocks.set(block.id, { ...block })
  }

  async delete(blockId: string): Promise<boolean> {
    return this.blocks.delete(blockId)
  }

  async listByProject(projectId: string): Promise<NotebookBlock[]> {
    return [...this.blocks.values()]
      .filter((block) => block.projectId === projectId)
      .sort((a, b) => a.position - b.position)
      .map((block) => ({ ...block }))
  }
}

export class MemoryEdgeRepository implements EdgeRepository {
  private readonly edges: StoredEdge[] = []

  async listByProject(projectId: string): Promise<StoredEdge[]> {
    return this.edges.filter((edge) => edge.projectId === projectId).map((edge) => ({ ...edge }))
  }

  async put(edge: StoredEdge): Promise<StoredEdge> {
    const existing = this.edges.find(
      (stored) =>
        stored.projectId === edge.projectId &&
        stored.source === edge.source &&
        stored.target === edge.target
    )
    if (existing) return { ...existing }

    this.edges.push({ ...edge })
    return { ...edge }
  }

  async delete(projectId: string, source: string, target: string): Promise<boolean> {
    const index = this.edges.findIndex(
      (edge) => edge.projectId === projectId && edge.source === source && edge.target === target
    )
    if (index === -1) return false
    this.edges.splice(index, 1)
    return true
  }

  async deleteForBlock(blockId: string): Promise<number> {
    const before = this.edges.length
    const kept = this.edges.filter((edge) => edge.source !== blockId && edge.target !== blockId)
    this.edges.splice(0, this.edges.length, ...kept)
    return before - kept.length
  }
}

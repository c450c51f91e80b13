import { type Database, notebookBlocks, notebookEdges } from '@dagbook/db'
import { and, asc, eq, or } from 'drizzle-orm'
import type { NotebookBlock } from '@/executor/types'
import {
  toBlockValues,
  toNotebookBlock,
  toStoredEdge,
} from '@/lib/notebook/repositories/serialization'
import type { BlockRepository, EdgeRepository, StoredEdge } from '@/lib/notebook/repositories/types'

export class DrizzleBlockRepository implements BlockRepository {
  constructor(private readonly db: Database) {}

  async get(blockId: string): Promise<NotebookBlock | undefined> {
    const [row] = await this.db
      .select()
      .from(notebookBlocks)
      .where(eq(notebookBlocks.id, blockId))
      .limit(1)
    return row ? toNotebookBlock(row) : undefined
  }

  async put(block: NotebookBlock): Promise<void> {
    const values = toBlockValues(block)
    const { id: _id, projectId: _projectId, ...changes } = values
    await this.db
      .insert(notebookBlocks)
      .values(values)
      .onConflictDoUpdate({ target: notebookBlocks.id, set: changes })
  }

  async delete(blockId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(notebookBlocks)
      .where(eq(notebookBlocks.id, blockId))
      .returning({ id: notebookBlocks.id })
    return deleted.length > 0
  }

  async listByProject(projectId: string): Promise<NotebookBlock[]> {
    const rows = await this.db
      .select()
      .from(notebookBlocks)
      .where(eq(notebookBlocks.projectId, projectId))
      .orderBy(asc(notebookBlocks.position), asc(notebookBlocks.createdAt))
    return rows.map(toNotebookBlock)
  }
}

export class DrizzleEdgeRepository implements EdgeRepository {
  constructor(private readonly db: Database) {}

  async listByProject(projectId: string): Promise<StoredEdge[]> {
    const rows = await this.db
      .select()
      .from(notebookEdges)
      .where(eq(notebookEdges.projectId, projectId))
      .orderBy(asc(notebookEdges.createdAt))
    return rows.map(toStoredEdge)
  }

  async put(edge: StoredEdge): Promise<StoredEdge> {
    const [inserted] = await this.db
      .insert(notebookEdges)
      .values({
        id: edge.id,
        projectId: edge.projectId,
        sourceBlockId: edge.source,
        targetBlockId: edge.target,
        createdAt: edge.createdAt,
      })
      .onConflictDoNothing({
        target: [notebookEdges.projectId, notebookEdges.sourceBlockId, notebookEdges.targetBlockId],
      })
      .returning()
    if (inserted) return toStoredEdge(inserted)

    const [existing] = await this.db
      .select()
      .from(notebookEdges)
      .where(
        and(
          eq(notebookEdges.projectId, edge.projectId),
          eq(notebookEdges.sourceBlockId, edge.source),
          eq(notebookEdges.targetBlockId, edge.target)
        )
      )
      .limit(1)
    return existing ? toStoredEdge(existing) : edge
  }

  async delete(projectId: string, source: string, target: string): Promise<boolean> {
    const deleted = await this.db
      .delete(notebookEdges)
      .where(
        and(
          eq(notebookEdges.projectId, projectId),
          eq(notebookEdges.sourceBlockId, source),
          eq(notebookEdges.targetBlockId, target)
        )
      )
      .returning({ id: notebookEdges.id })
    return deleted.length > 0
  }

  async deleteForBlock(blockId: string): Promise<number> {
    const deleted = await this.db
      .delete(notebookEdges)
      .where(or(eq(notebookEdges.sourceBlockId, blockId), eq(notebookEdges.targetBlockId, blockId)))
      .returning({ id: notebookEdges.id })
    return deleted.length
  }
}

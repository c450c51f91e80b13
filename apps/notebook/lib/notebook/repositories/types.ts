import type { NotebookBlock } from '@/executor/types'

/** A user-drawn dependency between two blocks of one project. */
export interface StoredEdge {
  id: string
  projectId: string
  source: string
  target: string
  createdAt: Date
}

export interface BlockRepository {
  get(blockId: string): Promise<NotebookBlock | undefined>
  /** Inserts or replaces the block. */
  put(block: NotebookBlock): Promise<void>
  delete(blockId: string): Promise<boolean>
  /** Blocks of the project ordered by position. */
  listByProject(projectId: string): Promise<NotebookBlock[]>
}

export interface EdgeRepository {
  listByProject(projectId: string): Promise<StoredEdge[]>
  /** Inserts the edge unless the project already has one between the same blocks. */
  put(edge: StoredEdge): Promise<StoredEdge>
  delete(projectId: string, source: string, target: string): Promise<boolean>
  /** Removes every edge touching the block; returns how many were removed. */
  deleteForBlock(blockId: string): Promise<number>
}

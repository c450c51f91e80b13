import { sql } from 'drizzle-orm'
import { index, integer, jsonb, pgTable, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core'

const timestampWithDefault = (name: string) => timestamp(name).notNull().default(sql`now()`)

/**
 * Notebook blocks. Execution fields are written back by the engine after every run;
 * analysis records are never stored since they derive from `source`.
 */
export const notebookBlocks = pgTable(
  'notebook_blocks',
  {
    id: text('id').primaryKey(),
    projectId: text('project_id').notNull(),

    kind: text('kind').notNull(), // 'code', 'markdown', 'sql', 'text'
    language: text('language'),
    title: text('title'),
    source: text('source').notNull().default(''),
    position: integer('position').notNull().default(0),

    status: text('status').notNull().default('idle'),
    lastResult: jsonb('last_result'),
    lastError: text('last_error'),
    lastDurationMs: integer('last_duration_ms'),
    executionCount: integer('execution_count').notNull().default(0),

    createdAt: timestampWithDefault('created_at'),
    updatedAt: timestampWithDefault('updated_at'),
  },
  (table) => ({
    projectIdIdx: index('notebook_blocks_project_id_idx').on(table.projectId),
    projectPositionIdx: index('notebook_blocks_project_position_idx').on(
      table.projectId,
      table.position
    ),
  })
)

/**
 * Explicit edges drawn by users or the agent. Inferred edges are recomputed and
 * never persisted.
 */
export const notebookEdges = pgTable(
  'notebook_edges',
  {
    id: text('id').primaryKey(),
    projectId: text('project_id').notNull(),

    sourceBlockId: text('source_block_id')
      .notNull()
      .references(() => notebookBlocks.id, { onDelete: 'cascade' }),
    targetBlockId: text('target_block_id')
      .notNull()
      .references(() => notebookBlocks.id, { onDelete: 'cascade' }),

    createdAt: timestampWithDefault('created_at'),
  },
  (table) => ({
    projectIdIdx: index('notebook_edges_project_id_idx').on(table.projectId),
    projectPairIdx: uniqueIndex('notebook_edges_project_pair_idx').on(
      table.projectId,
      table.sourceBlockId,
      table.targetBlockId
    ),
  })
)

export type NotebookBlockRow = typeof notebookBlocks.$inferSelect
export type NotebookBlockInsert = typeof notebookBlocks.$inferInsert
export type NotebookEdgeRow = typeof notebookEdges.$inferSelect

import type { NotebookBlockInsert, NotebookBlockRow, NotebookEdgeRow } from '@dagbook/db'
import { createLogger } from '@dagbook/logger'
import { z } from 'zod'
import { DEFAULT_LANGUAGE_BY_KIND } from '@/executor/constants'
import type { BlockExecutionResult, NotebookBlock } from '@/executor/types'
import type { StoredEdge } from '@/lib/notebook/repositories/types'

const logger = createLogger('NotebookSerialization')

const blockKindSchema = z.enum(['code', 'markdown', 'sql', 'text'])

const blockStatusSchema = z.enum(['idle', 'running', 'completed', 'failed', 'stale', 'skipped'])

const errorTypeSchema = z.enum(['syntax', 'runtime', 'timeout', 'unsupported'])

const outputArtifactSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('stream'), name: z.enum(['stdout', 'stderr']), text: z.string() }),
  z.object({ type: z.literal('display'), text: z.string() }),
  z.object({ type: z.literal('html'), html: z.string(), filename: z.string().optional() }),
  z.object({ type: z.literal('png'), data: z.string(), filename: z.string().optional() }),
  z.object({
    type: z.literal('table'),
    filename: z.string().optional(),
    columns: z.array(z.string()),
    rows: z.array(z.array(z.unknown())),
    totalRows: z.number(),
  }),
  z.object({
    type: z.literal('error'),
    errorType: errorTypeSchema,
    message: z.string(),
    traceback: z.string().optional(),
  }),
])

const skipReasonSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('upstream-failed'), blockId: z.string() }),
  z.object({ kind: z.literal('session-unavailable') }),
  z.object({ kind: z.literal('cancelled') }),
])

/** Shape of `last_result` as read back from jsonb, where dates arrive as ISO strings. */
export const storedResultSchema = z.object({
  blockId: z.string(),
  sessionId: z.string(),
  status: z.enum(['completed', 'failed', 'skipped']),
  stdout: z.string(),
  stderr: z.string(),
  outputs: z.array(outputArtifactSchema),
  error: z
    .object({
      type: errorTypeSchema,
      name: z.string(),
      message: z.string(),
      line: z.number().optional(),
      column: z.number().optional(),
      traceback: z.string().optional(),
    })
    .optional(),
  durationMs: z.number(),
  executedAt: z.coerce.date(),
  executionCount: z.number().optional(),
  delta: z.object({ variables: z.array(z.string()), imports: z.array(z.string()) }),
  skipReason: skipReasonSchema.optional(),
})

function parseLastResult(blockId: string, value: unknown): BlockExecutionResult | undefined {
  if (value === null || value === undefined) return undefined
  const parsed = storedResultSchema.safeParse(value)
  if (!parsed.success) {
    logger.warn(`Discarding unreadable last result of block ${blockId}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    })
    return undefined
  }
  return parsed.data
}

export function toNotebookBlock(row: NotebookBlockRow): NotebookBlock {
  const kind = blockKindSchema.parse(row.kind)
  return {
    id: row.id,
    projectId: row.projectId,
    kind,
    language: row.language ?? DEFAULT_LANGUAGE_BY_KIND[kind],
    title: row.title ?? undefined,
    source: row.source,
    position: row.position,
    status: blockStatusSchema.catch('idle').parse(row.status),
    lastResult: parseLastResult(row.id, row.lastResult),
    lastError: row.lastError ?? undefined,
    lastDurationMs: row.lastDurationMs ?? undefined,
    executionCount: row.executionCount,
    updatedAt: row.updatedAt,
  }
}

export function toBlockValues(block: NotebookBlock): NotebookBlockInsert {
  return {
    id: block.id,
    projectId: block.projectId,
    kind: block.kind,
    language: block.language,
    title: block.title ?? null,
    source: block.source,
    position: block.position,
    status: block.status,
    lastResult: block.lastResult ?? null,
    lastError: block.lastError ?? null,
    lastDurationMs: block.lastDurationMs === undefined ? null : Math.round(block.lastDurationMs),
    executionCount: block.executionCount,
    updatedAt: block.updatedAt,
  }
}

export function toStoredEdge(row: NotebookEdgeRow): StoredEdge {
  return {
    id: row.id,
    projectId: row.projectId,
    source: row.sourceBlockId,
    target: row.targetBlockId,
    createdAt: row.createdAt,
  }
}

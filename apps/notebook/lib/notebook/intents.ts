import { createLogger } from '@dagbook/logger'
import { z } from 'zod'
import type { WorkflowExecutor } from '@/executor/execution/workflow-executor'
import type { NotebookBlock, WorkflowResult } from '@/executor/types'
import { InvalidIntentError } from '@/lib/notebook/errors'
import type { ProjectGraphService } from '@/lib/notebook/graph-service'

const logger = createLogger('NotebookIntents')

const identifier = z
  .string()
  .regex(/^[A-Za-z_$][\w$]*$/, 'Must be a valid JavaScript identifier')

const projectId = z.string().min(1, 'Project ID is required')

const blockId = z.string().min(1, 'Block ID is required')

/**
 * The closed set of actions a chat parser or agent may ask for. Free text never
 * reaches the engine; it is carried only as a `prompt` for the code generator.
 */
export const notebookIntentSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('import_data'),
    projectId,
    dataset: z.string().min(1, 'Dataset path is required'),
    variable: identifier.default('data'),
    source: z.string().optional(),
  }),
  z.object({
    type: z.literal('clean_data'),
    projectId,
    variable: identifier.default('data'),
    source: z.string().optional(),
  }),
  z.object({
    type: z.literal('add_block'),
    projectId,
    kind: z.enum(['code', 'markdown', 'sql', 'text']).default('code'),
    title: z.string().optional(),
    source: z.string().optional(),
    prompt: z.string().optional(),
    position: z.number().int().min(0).optional(),
  }),
  z.object({
    type: z.literal('delete_block'),
    blockId,
  }),
  z.object({
    type: z.literal('edit_block'),
    blockId,
    title: z.string().optional(),
    source: z.string().optional(),
    prompt: z.string().optional(),
  }),
  z.object({
    type: z.literal('execute'),
    projectId,
    blockIds: z.array(blockId).optional(),
  }),
])

export type NotebookIntent = z.infer<typeof notebookIntentSchema>

export type IntentType = NotebookIntent['type']

export interface CodeGenerationRequest {
  intent: Exclude<IntentType, 'delete_block' | 'execute'>
  projectId: string
  prompt?: string
  dataset?: string
  variable?: string
  /** Source being replaced, for edits. */
  currentSource?: string
  /** Names and modules already defined in the project's session. */
  variables: string[]
  imports: string[]
}

/** Source of code for intents that arrive without it, typically an AI provider. */
export interface CodeGenerator {
  generate(request: CodeGenerationRequest): Promise<string>
}

export type IntentOutcome =
  | { type: 'block_created'; block: NotebookBlock }
  | { type: 'block_edited'; block: NotebookBlock; staleBlocks: string[] }
  | { type: 'block_deleted'; blockId: string; staleBlocks: string[] }
  | { type: 'executed'; result: WorkflowResult }

export interface IntentDependencies {
  graphService: ProjectGraphService
  executor: WorkflowExecutor
  generator?: CodeGenerator
}

export function parseIntent(value: unknown): NotebookIntent {
  const parsed = notebookIntentSchema.safeParse(value)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'intent'}: ${issue.message}`)
      .join('; ')
    throw new InvalidIntentError(`Invalid intent: ${details}`)
  }
  return parsed.data
}

export function importDataTemplate(dataset: string, variable: string): string {
  return [
    "const fs = require('fs')",
    `const ${variable}Path = require('path').resolve(workdir, ${JSON.stringify(dataset)})`,
    `const ${variable}Text = fs.readFileSync(${variable}Path, 'utf8').trim()`,
    `const [${variable}Columns, ...${variable}Lines] = ${variable}Text.split('\\n').map((line) => line.split(','))`,
    `const ${variable} = ${variable}Lines.map((cells) => Object.fromEntries(${variable}Columns.map((column, i) => [column, cells[i]])))`,
    `console.log(\`Loaded \${${variable}.length} rows with columns \${${variable}Columns.join(', ')}\`)`,
  ].join('\n')
}

export function cleanDataTemplate(variable: string): string {
  return [
    `const ${variable}Clean = ${variable}.filter((row) => Object.values(row).every((value) => value !== null && value !== undefined && value !== ''))`,
    `console.log(\`Kept \${${variable}Clean.length} of \${${variable}.length} rows\`)`,
  ].join('\n')
}

async function generate(
  deps: IntentDependencies,
  request: Omit<CodeGenerationRequest, 'variables' | 'imports'>
): Promise<string | undefined> {
  if (!deps.generator) return undefined
  const state = await deps.executor.getSessionState(request.projectId)
  return deps.generator.generate({
    ...request,
    variables: state ? Object.keys(state.variables) : [],
    imports: state?.imports ?? [],
  })
}

/** Carries out one intent against the graph service and executor. */
export async function applyIntent(
  intent: NotebookIntent,
  deps: IntentDependencies
): Promise<IntentOutcome> {
  const { graphService, executor } = deps
  logger.info(`Applying intent ${intent.type}`)

  switch (intent.type) {
    case 'import_data': {
      const source =
        intent.source ??
        (await generate(deps, {
          intent: intent.type,
          projectId: intent.projectId,
          dataset: intent.dataset,
          variable: intent.variable,
        })) ??
        importDataTemplate(intent.dataset, intent.variable)
      const block = await graphService.onBlockCreated({
        projectId: intent.projectId,
        title: `Import ${intent.dataset}`,
        source,
      })
      return { type: 'block_created', block }
    }

    case 'clean_data': {
      const source =
        intent.source ??
        (await generate(deps, {
          intent: intent.type,
          projectId: intent.projectId,
          variable: intent.variable,
        })) ??
        cleanDataTemplate(intent.variable)
      const block = await graphService.onBlockCreated({
        projectId: intent.projectId,
        title: `Clean ${intent.variable}`,
        source,
      })
      return { type: 'block_created', block }
    }

    case 'add_block': {
      const generated =
        intent.source === undefined && intent.prompt !== undefined && intent.kind === 'code'
          ? await generate(deps, {
              intent: intent.type,
              projectId: intent.projectId,
              prompt: intent.prompt,
            })
          : undefined
      const block = await graphService.onBlockCreated({
        projectId: intent.projectId,
        kind: intent.kind,
        title: intent.title,
        source: intent.source ?? generated ?? '',
        position: intent.position,
      })
      return { type: 'block_created', block }
    }

    case 'delete_block': {
      const staleBlocks = await graphService.onBlockDeleted(intent.blockId)
      return { type: 'block_deleted', blockId: intent.blockId, staleBlocks }
    }

    case 'edit_block': {
      const current = await graphService.getBlock(intent.blockId)
      let source = intent.source
      if (source === undefined && intent.prompt !== undefined) {
        source = await generate(deps, {
          intent: intent.type,
          projectId: current.projectId,
          prompt: intent.prompt,
          currentSource: current.source,
        })
        if (source === undefined) {
          throw new InvalidIntentError('Editing from a prompt needs a code generator')
        }
      }
      if (source === undefined && intent.title === undefined) {
        throw new InvalidIntentError('edit_block needs a source, a prompt or a title')
      }

      const { block, staleBlocks } = await graphService.onBlockEdited(
        intent.blockId,
        source ?? current.source,
        { title: intent.title }
      )
      return { type: 'block_edited', block, staleBlocks }
    }

    case 'execute': {
      const result = intent.blockIds?.length
        ? await executor.executeBlocks(intent.blockIds, executor.getProjectSession(intent.projectId))
        : await executor.executeWorkflow(intent.projectId)
      return { type: 'executed', result }
    }
  }
}

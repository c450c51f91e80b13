import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  DATABASE_URL: z.string().url().optional(),

  NOTEBOOK_EXECUTION_TIMEOUT_MS: positiveInt(300_000),
  NOTEBOOK_SESSION_IDLE_TIMEOUT_MS: positiveInt(3_600_000),
  NOTEBOOK_SESSION_SWEEP_INTERVAL_MS: positiveInt(60_000),
  NOTEBOOK_WORKSPACE_DIR: z.string().min(1).default(join(tmpdir(), 'dagbook-sessions')),
})

export type Env = z.infer<typeof envSchema>

export class InvalidEnvironmentError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`)
    this.name = 'InvalidEnvironmentError'
  }
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  const emptyAsMissing = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  )
  const result = envSchema.safeParse(emptyAsMissing)
  if (!result.success) {
    throw new InvalidEnvironmentError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }
  return result.data
}

let cached: Env | undefined

/**
 * Environment for the running process, parsed once.
 */
export function getEnv(): Env {
  cached ??= parseEnv(process.env)
  return cached
}

export function resetEnvCache(): void {
  cached = undefined
}

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js'
import postgres from 'postgres'
import * as schema from './schema'

export * from './schema'

export type Database = PostgresJsDatabase<typeof schema>

export interface DbOptions {
  poolMax?: number
}

/**
 * Creates a Drizzle client over a postgres.js pool. The connection is opened lazily
 * on the first query.
 */
export function createDb(connectionString: string, options: DbOptions = {}): Database {
  if (!connectionString) {
    throw new Error('Missing database connection string')
  }

  const poolMax = options.poolMax ?? Number.parseInt(process.env.DATABASE_POOL_MAX ?? '10', 10)

  const client = postgres(connectionString, {
    prepare: false,
    idle_timeout: 20,
    connect_timeout: 30,
    max: Number.isNaN(poolMax) ? 10 : poolMax,
    onnotice: () => {},
  })

  return drizzle(client, { schema })
}

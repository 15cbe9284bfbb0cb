import { Pool } from 'pg'
import { drizzle } from 'drizzle-orm/node-postgres'
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres'
import type { PgDatabase } from 'drizzle-orm/pg-core'
import * as schema from './db/schema'
import { getConfig } from './config'

// ---------------------------------------------------------------------------
// Database singleton
//
// One pg Pool per Lambda cold start, created on first use. The instance is
// kept on `globalThis` so hot reloads do not open a new pool each time.
// ---------------------------------------------------------------------------

/** A drizzle handle: the pool-backed database or an open transaction. */
export type Database = PgDatabase<NodePgQueryResultHKT, typeof schema>

const globalForDb = globalThis as unknown as { crewbookDb: Database | undefined }

export function getDb(): Database {
  if (globalForDb.crewbookDb) return globalForDb.crewbookDb

  const config = getConfig()
  const pool = new Pool({ connectionString: config.DATABASE_URL, max: config.DB_POOL_MAX })
  pool.on('error', (err) => {
    console.error('[db] idle client error', { message: err.message })
  })
  const db = drizzle(pool, { schema, logger: config.NODE_ENV === 'development' })
  globalForDb.crewbookDb = db
  return db
}

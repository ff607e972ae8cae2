import { Pool } from 'pg'
import { MemoryStore } from './memory-store'
import { PgStore } from './pg-store'
import type { Store } from './store'

const globalForDb = globalThis as unknown as {
  store: Store | undefined
  pool: Pool | undefined
}

function createStore(): Store {
  if (process.env.DATA_STORE === 'memory') {
    return new MemoryStore()
  }

  const pool = globalForDb.pool ?? new Pool({
    connectionString: process.env.DATABASE_URL,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  })

  if (!globalForDb.pool) {
    globalForDb.pool = pool
  }

  pool.on('error', (error) => {
    console.error('Idle database client error:', error)
  })

  return new PgStore(pool)
}

export const store = globalForDb.store ?? createStore()

// Cache in all environments so hot reloads reuse the pool
globalForDb.store = store

export default store

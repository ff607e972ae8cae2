/**
 * Create the database tables.
 *
 * Reads DATABASE_URL from .env and applies db/schema.sql. Every statement is
 * IF NOT EXISTS, so running it again is harmless.
 *
 * Usage:
 *   npm run migrate
 */

import 'dotenv/config'
import * as fs from 'fs'
import * as path from 'path'
import { Pool } from 'pg'

async function main() {
  if (!process.env.DATABASE_URL) {
    throw new Error('DATABASE_URL is not set')
  }

  const sql = fs.readFileSync(path.join(__dirname, '..', 'db', 'schema.sql'), 'utf-8')
  const pool = new Pool({ connectionString: process.env.DATABASE_URL })

  try {
    await pool.query(sql)
    console.log('Schema applied')
  } finally {
    await pool.end()
  }
}

main().catch(error => {
  console.error('Migration failed:', error)
  process.exit(1)
})

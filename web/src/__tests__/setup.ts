import dotenv from 'dotenv'
import path from 'path'

// Load .env.test BEFORE any other imports that read the environment
dotenv.config({ path: path.resolve(__dirname, '../../.env.test') })

// Tests never touch a real database
if (process.env.DATA_STORE !== 'memory') {
  console.warn('\x1b[33m⚠ WARNING: DATA_STORE is not "memory"; forcing the in-memory store for tests.\x1b[0m')
  process.env.DATA_STORE = 'memory'
}

/**
 * Seed a few users, rooms and messages for local development.
 *
 * Every seeded account has the password "test-password".
 *
 * Usage:
 *   npm run seed
 */

import 'dotenv/config'
import { Pool } from 'pg'
import { PgStore } from '../src/lib/pg-store'
import { hashPassword } from '../src/lib/user'

const USERS = [
  { name: 'Ada', email: 'ada@example.com' },
  { name: 'Grace', email: 'grace@example.com' },
]

const ROOMS = [
  { topic: 'Games', name: 'Chess Club', description: 'Openings, endgames and the occasional blitz.' },
  { topic: 'Books', name: 'Reading Circle', description: null },
]

async function main() {
  const pool = new Pool({ connectionString: process.env.DATABASE_URL })
  const store = new PgStore(pool)

  try {
    const passwordHash = await hashPassword('test-password')
    const users = []
    for (const u of USERS) {
      const existing = await store.findUserByEmail(u.email)
      users.push(existing ?? await store.createUser({ ...u, passwordHash }))
    }

    const [host, guest] = users
    for (const r of ROOMS) {
      const topic = await store.upsertTopic(r.topic)
      const room = await store.createRoom({ hostId: host.id, topicId: topic.id, name: r.name, description: r.description })
      await store.postMessage({ roomId: room.id, userId: guest.id, body: `Hello from ${guest.name}` })
      console.log(`   Created room "${room.name}"`)
    }

    console.log(`Seeded ${users.length} users and ${ROOMS.length} rooms`)
  } finally {
    await pool.end()
  }
}

main().catch(error => {
  console.error('Seed failed:', error)
  process.exit(1)
})

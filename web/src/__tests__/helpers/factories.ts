import { identityOf, type UserIdentity } from '@/lib/identity'
import type { Room, Store, User } from '@/lib/store'

let counter = 0

export function uniqueName(prefix: string) {
  counter++
  return `${prefix}-${Date.now()}-${counter}`
}

/**
 * Create N test users with unique emails. Password hashes are placeholders;
 * use registerUser where a real sign-in is needed.
 */
export async function createTestUsers(store: Store, count: number, prefix = 'vt') {
  const users: User[] = []
  for (let i = 0; i < count; i++) {
    const user = await store.createUser({
      email: `${uniqueName(prefix)}@vitest.local`,
      name: `Test User ${prefix}-${i}`,
      passwordHash: 'placeholder-hash',
    })
    users.push(user)
  }
  return users
}

export async function createTestUser(store: Store, prefix = 'vt'): Promise<{ user: User; identity: UserIdentity }> {
  const [user] = await createTestUsers(store, 1, prefix)
  return { user, identity: identityOf(user) }
}

/**
 * Create a room hosted by `hostId` under the named topic
 */
export async function createTestRoom(
  store: Store,
  {
    hostId,
    topic = 'Testing',
    name = uniqueName('Room'),
    description = null,
  }: {
    hostId: string
    topic?: string
    name?: string
    description?: string | null
  }
): Promise<Room> {
  const t = await store.upsertTopic(topic)
  return store.createRoom({ hostId, topicId: t.id, name, description })
}

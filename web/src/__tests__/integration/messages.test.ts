import { describe, it, expect, beforeEach } from 'vitest'
import { ANONYMOUS } from '@/lib/identity'
import { MemoryStore } from '@/lib/memory-store'
import { deleteMessage, listActivity } from '@/lib/messages'
import { postMessage } from '@/lib/rooms'
import { listAllTopics, listTopics } from '@/lib/topics'
import { createTestRoom, createTestUser } from '../helpers/factories'

let store: MemoryStore

beforeEach(() => {
  store = new MemoryStore()
})

async function seedMessage() {
  const { user: host } = await createTestUser(store, 'host')
  const { user: author, identity } = await createTestUser(store, 'author')
  const room = await createTestRoom(store, { hostId: host.id, name: 'Chess Club' })
  const posted = await postMessage(store, identity, room.id, 'hello')
  if (!posted.ok) throw new Error('seed failed')
  return { host, author, identity, room, message: posted.value }
}

describe('deleteMessage', () => {
  it('lets the author delete their message', async () => {
    const { identity, message } = await seedMessage()

    const result = await deleteMessage(store, identity, message.id)
    expect(result.ok).toBe(true)
    expect(await store.findMessage(message.id)).toBeNull()
  })

  it('keeps the author listed as a participant', async () => {
    const { author, identity, room, message } = await seedMessage()

    await deleteMessage(store, identity, message.id)
    expect((await store.findParticipants(room.id)).map(p => p.id)).toEqual([author.id])
  })

  it('forbids the room host from deleting someone else\'s message', async () => {
    const { host, message } = await seedMessage()

    const result = await deleteMessage(store, { kind: 'user', id: host.id, email: host.email, name: host.name }, message.id)
    expect(result).toEqual({ ok: false, error: { kind: 'forbidden', message: 'You are not allowed to do that!' } })
    expect(await store.findMessage(message.id)).not.toBeNull()
  })

  it('requires sign-in', async () => {
    const { message } = await seedMessage()
    expect(await deleteMessage(store, ANONYMOUS, message.id)).toEqual({ ok: false, error: { kind: 'unauthorized' } })
  })

  it('reports a missing message', async () => {
    const { identity } = await createTestUser(store)
    expect(await deleteMessage(store, identity, 'missing')).toEqual({
      ok: false,
      error: { kind: 'not-found', entity: 'message' },
    })
  })
})

describe('listActivity', () => {
  it('lists every message newest first with author and room', async () => {
    const { author, identity, room } = await seedMessage()
    await postMessage(store, identity, room.id, 'second')

    const activity = await listActivity(store)
    expect(activity.map(m => m.body)).toEqual(['second', 'hello'])
    expect(activity[0].user.id).toBe(author.id)
    expect(activity[0].room).toEqual({ id: room.id, name: 'Chess Club' })
  })
})

describe('listTopics', () => {
  it('filters topics by name, ignoring case', async () => {
    const { user } = await createTestUser(store)
    await createTestRoom(store, { hostId: user.id, topic: 'Board Games' })
    await createTestRoom(store, { hostId: user.id, topic: 'Video Games' })
    await createTestRoom(store, { hostId: user.id, topic: 'Books' })

    expect((await listTopics(store, 'GAMES')).map(t => t.name)).toEqual(['Board Games', 'Video Games'])
    expect(await listTopics(store, '')).toHaveLength(3)
    expect((await listAllTopics(store)).map(t => t.roomCount)).toEqual([1, 1, 1])
  })
})

import { describe, it, expect, beforeEach } from 'vitest'
import { ANONYMOUS, identityOf } from '@/lib/identity'
import { MemoryStore } from '@/lib/memory-store'
import { createRoom, deleteRoom, getRoom, listHome, postMessage, updateRoom } from '@/lib/rooms'
import { createTestRoom, createTestUser } from '../helpers/factories'

let store: MemoryStore

beforeEach(() => {
  store = new MemoryStore()
})

describe('createRoom', () => {
  it('creates the room and its topic, hosted by the acting user', async () => {
    const { user, identity } = await createTestUser(store)

    const result = await createRoom(store, identity, { topic: 'Games', name: 'Chess Club', description: '' })
    expect(result.ok).toBe(true)
    if (!result.ok) return

    const room = await store.findRoom(result.value.id)
    expect(room?.hostId).toBe(user.id)
    expect(room?.topic.name).toBe('Games')
    expect(room?.description).toBeNull()
    expect(room?.participantIds).toEqual([])
  })

  it('reuses a topic with the exact same name', async () => {
    const { identity } = await createTestUser(store)

    await createRoom(store, identity, { topic: 'Games', name: 'Chess Club', description: '' })
    await createRoom(store, identity, { topic: 'Games', name: 'Go Club', description: '' })

    const topics = await store.findTopics()
    expect(topics).toHaveLength(1)
    expect(topics[0].roomCount).toBe(2)
  })

  it('treats a differently cased topic name as a new topic', async () => {
    const { identity } = await createTestUser(store)

    await createRoom(store, identity, { topic: 'Games', name: 'Chess Club', description: '' })
    await createRoom(store, identity, { topic: 'games', name: 'Go Club', description: '' })

    expect((await store.findTopics()).map(t => t.name)).toEqual(['Games', 'games'])
  })

  it('refuses anonymous callers', async () => {
    const result = await createRoom(store, ANONYMOUS, { topic: 'Games', name: 'Chess Club', description: '' })
    expect(result).toEqual({ ok: false, error: { kind: 'unauthorized' } })
    expect(await store.findTopics()).toEqual([])
  })

  it('writes nothing for an invalid form', async () => {
    const { identity } = await createTestUser(store)

    const result = await createRoom(store, identity, { topic: 'Games', name: '', description: '' })
    expect(result.ok).toBe(false)
    expect(await store.findTopics()).toEqual([])
  })
})

describe('postMessage', () => {
  it('adds the author as a participant once', async () => {
    const { user: host } = await createTestUser(store, 'host')
    const { user: guest, identity } = await createTestUser(store, 'guest')
    const room = await createTestRoom(store, { hostId: host.id })

    await postMessage(store, identity, room.id, 'hello')
    await postMessage(store, identity, room.id, 'again')

    const page = await getRoom(store, room.id)
    expect(page.ok).toBe(true)
    if (!page.ok) return
    expect(page.value.participants.map(p => p.id)).toEqual([guest.id])
    expect(page.value.messages.map(m => m.body)).toEqual(['again', 'hello'])
  })

  it('rejects an empty body without recording participation', async () => {
    const { user: host } = await createTestUser(store, 'host')
    const { identity } = await createTestUser(store, 'guest')
    const room = await createTestRoom(store, { hostId: host.id })

    const result = await postMessage(store, identity, room.id, '   ')
    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid', message: 'Message cannot be empty', fields: { body: 'Message cannot be empty' } },
    })
    expect(await store.findParticipants(room.id)).toEqual([])
  })

  it('requires sign-in', async () => {
    const { user: host } = await createTestUser(store, 'host')
    const room = await createTestRoom(store, { hostId: host.id })

    expect(await postMessage(store, ANONYMOUS, room.id, 'hi')).toEqual({ ok: false, error: { kind: 'unauthorized' } })
  })

  it('reports a missing room', async () => {
    const { identity } = await createTestUser(store)
    const result = await postMessage(store, identity, 'no-such-room', 'hi')
    expect(result).toEqual({ ok: false, error: { kind: 'not-found', entity: 'room' } })
  })
})

describe('updateRoom', () => {
  it('lets the host change topic, name and description', async () => {
    const { user: host, identity } = await createTestUser(store, 'host')
    const room = await createTestRoom(store, { hostId: host.id, topic: 'Games', name: 'Chess Club' })

    const result = await updateRoom(store, identity, room.id, {
      topic: 'Strategy',
      name: 'Chess Society',
      description: 'Weekly games',
    })
    expect(result.ok).toBe(true)

    const updated = await store.findRoom(room.id)
    expect(updated?.name).toBe('Chess Society')
    expect(updated?.topic.name).toBe('Strategy')
    expect(updated?.description).toBe('Weekly games')
    expect(updated?.hostId).toBe(host.id)
  })

  it('forbids anyone but the host', async () => {
    const { user: host } = await createTestUser(store, 'host')
    const { identity: other } = await createTestUser(store, 'other')
    const room = await createTestRoom(store, { hostId: host.id, name: 'Chess Club' })

    const result = await updateRoom(store, other, room.id, { topic: 'X', name: 'Hijacked', description: '' })
    expect(result).toEqual({ ok: false, error: { kind: 'forbidden', message: 'You are not allowed to do that!' } })
    expect((await store.findRoom(room.id))?.name).toBe('Chess Club')
  })

  it('asks anonymous callers to sign in before checking the room', async () => {
    const result = await updateRoom(store, ANONYMOUS, 'no-such-room', { topic: 'X', name: 'Y', description: '' })
    expect(result).toEqual({ ok: false, error: { kind: 'unauthorized' } })
  })
})

describe('deleteRoom', () => {
  it('removes the room with its messages', async () => {
    const { user: host, identity } = await createTestUser(store, 'host')
    const { identity: guest } = await createTestUser(store, 'guest')
    const room = await createTestRoom(store, { hostId: host.id })
    const posted = await postMessage(store, guest, room.id, 'hello')
    expect(posted.ok).toBe(true)

    const result = await deleteRoom(store, identity, room.id)
    expect(result.ok).toBe(true)

    expect(await store.findRoom(room.id)).toBeNull()
    if (posted.ok) expect(await store.findMessage(posted.value.id)).toBeNull()
    expect(await getRoom(store, room.id)).toEqual({ ok: false, error: { kind: 'not-found', entity: 'room' } })
  })

  it('keeps the room when a non-host asks', async () => {
    const { user: host } = await createTestUser(store, 'host')
    const { identity: other } = await createTestUser(store, 'other')
    const room = await createTestRoom(store, { hostId: host.id })

    const result = await deleteRoom(store, other, room.id)
    expect(result.ok).toBe(false)
    expect(await store.findRoom(room.id)).not.toBeNull()
  })
})

describe('listHome', () => {
  it('searches topic name, room name and description', async () => {
    const { user } = await createTestUser(store)
    await createTestRoom(store, { hostId: user.id, topic: 'Games', name: 'Chess Club' })
    await createTestRoom(store, { hostId: user.id, topic: 'Music', name: 'Jazz Nights', description: 'Board games after' })
    await createTestRoom(store, { hostId: user.id, topic: 'Books', name: 'Reading Circle' })

    const home = await listHome(store, 'games')
    expect(home.rooms.map(r => r.name)).toEqual(['Jazz Nights', 'Chess Club'])
    expect(home.roomCount).toBe(2)
  })

  it('lists everything for an empty query', async () => {
    const { user } = await createTestUser(store)
    await createTestRoom(store, { hostId: user.id, topic: 'Games', name: 'Chess Club' })
    await createTestRoom(store, { hostId: user.id, topic: 'Books', name: 'Reading Circle' })

    const home = await listHome(store, '')
    expect(home.roomCount).toBe(2)
    expect(home.rooms.map(r => r.name)).toEqual(['Reading Circle', 'Chess Club'])
  })

  it('shows at most five topics', async () => {
    const { user } = await createTestUser(store)
    for (const topic of ['A', 'B', 'C', 'D', 'E', 'F']) {
      await createTestRoom(store, { hostId: user.id, topic })
    }

    const home = await listHome(store, '')
    expect(home.topics.map(t => t.name)).toEqual(['A', 'B', 'C', 'D', 'E'])
  })

  it('narrows activity by topic name, not message body', async () => {
    const { user, identity } = await createTestUser(store)
    const games = await createTestRoom(store, { hostId: user.id, topic: 'Games' })
    const books = await createTestRoom(store, { hostId: user.id, topic: 'Books' })
    await postMessage(store, identity, games.id, 'anyone for chess?')
    await postMessage(store, identity, books.id, 'games are fun')

    const home = await listHome(store, 'games')
    expect(home.messages.map(m => m.body)).toEqual(['anyone for chess?'])
  })
})

describe('Chess Club scenario', () => {
  it('tracks the poster as the only participant under a single Games topic', async () => {
    const a = await store.createUser({ email: 'a@x.com', name: 'A', passwordHash: 'placeholder-hash' })
    const { identity: b } = await createTestUser(store, 'b')

    const created = await createRoom(store, identityOf(a), { topic: 'Games', name: 'Chess Club', description: '' })
    if (!created.ok) throw new Error('room not created')
    await postMessage(store, b, created.value.id, 'hi')

    const page = await getRoom(store, created.value.id)
    if (!page.ok) throw new Error('room not found')
    expect(page.value.participants.map(p => p.id)).toEqual([b.id])
    expect(page.value.messages).toHaveLength(1)
    expect((await store.findTopics()).filter(t => t.name === 'Games')).toHaveLength(1)
  })

  it('finds a room by any substring of its name', async () => {
    const { user } = await createTestUser(store)
    const room = await createTestRoom(store, { hostId: user.id, name: 'Chess Club' })
    await createTestRoom(store, { hostId: user.id, name: 'Go Club' })

    const home = await listHome(store, 'ss Cl')
    expect(home.rooms.map(r => r.id)).toContain(room.id)
  })
})

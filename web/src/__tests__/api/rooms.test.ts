import { describe, it, expect } from 'vitest'
import { NextRequest } from 'next/server'
import * as apiIndex from '@/app/api/route'
import { GET as listRoutes } from '@/app/api/route'
import { GET as listRooms } from '@/app/api/rooms/route'
import { GET as getRoom } from '@/app/api/rooms/[id]/route'
import { store } from '@/lib/db'
import type { SerializedRoom } from '@/lib/serializers'
import { createTestRoom, createTestUser } from '../helpers/factories'

function params(id: string) {
  return { params: Promise.resolve({ id }) }
}

describe('GET /api', () => {
  it('lists the endpoints', async () => {
    const res = await listRoutes()
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual(['GET /api', 'GET /api/rooms', 'GET /api/rooms/:id'])
  })

  it('keeps the endpoint list private to the route module', () => {
    expect('ROUTES' in apiIndex).toBe(false)
    expect(apiIndex.GET).toBe(listRoutes)
  })
})

describe('GET /api/rooms', () => {
  it('includes every room in wire form', async () => {
    const { user: host } = await createTestUser(store, 'api-host')
    const { identity } = await createTestUser(store, 'api-guest')
    const room = await createTestRoom(store, { hostId: host.id, topic: 'Games', name: 'API Chess Club' })
    await store.postMessage({ roomId: room.id, userId: identity.id, body: 'hi' })

    const res = await listRooms()
    expect(res.status).toBe(200)

    const body: SerializedRoom[] = await res.json()
    const listed = body.find(r => r.id === room.id)
    expect(listed).toEqual({
      id: room.id,
      host: host.id,
      topic: room.topicId,
      name: 'API Chess Club',
      description: null,
      participants: [identity.id],
      updated: room.updatedAt.toISOString(),
      created: room.createdAt.toISOString(),
    })
  })
})

describe('GET /api/rooms/[id]', () => {
  it('returns one room', async () => {
    const { user: host } = await createTestUser(store, 'api-host')
    const room = await createTestRoom(store, { hostId: host.id, name: 'API Single Room', description: 'Just one' })

    const res = await getRoom(new NextRequest(`http://localhost/api/rooms/${room.id}`), params(room.id))
    expect(res.status).toBe(200)

    const body: SerializedRoom = await res.json()
    expect(body.name).toBe('API Single Room')
    expect(body.description).toBe('Just one')
    expect(body.participants).toEqual([])
  })

  it('returns 404 for an unknown id', async () => {
    const res = await getRoom(new NextRequest('http://localhost/api/rooms/missing'), params('missing'))
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ error: 'Room not found' })
  })
})

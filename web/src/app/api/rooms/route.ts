import { NextResponse } from 'next/server'
import { store } from '@/lib/db'
import { matchAll } from '@/lib/search'
import { serializeRoom } from '@/lib/serializers'

export const dynamic = 'force-dynamic'

// GET /api/rooms - every room, newest activity first
export async function GET() {
  try {
    const rooms = await store.findRooms(matchAll())
    return NextResponse.json(rooms.map(serializeRoom))
  } catch (error) {
    console.error('List rooms error:', error)
    return NextResponse.json({ error: 'Failed to list rooms' }, { status: 500 })
  }
}

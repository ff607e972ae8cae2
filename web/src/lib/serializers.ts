import type { RoomListing } from './store'

// Wire shape of a room on the read API
export interface SerializedRoom {
  id: string
  host: string
  topic: string
  name: string
  description: string | null
  participants: string[]
  updated: string
  created: string
}

export function serializeRoom(room: RoomListing): SerializedRoom {
  return {
    id: room.id,
    host: room.hostId,
    topic: room.topicId,
    name: room.name,
    description: room.description,
    participants: room.participantIds,
    updated: room.updatedAt.toISOString(),
    created: room.createdAt.toISOString(),
  }
}

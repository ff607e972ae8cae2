import { authorizeRoomHost, requireUser } from './access'
import type { Identity } from './identity'
import { invalid, notFound, ok, type Result } from './result'
import { messageSearch, messagesInRoom, roomSearch } from './search'
import type {
  Message,
  MessageEntry,
  Room,
  RoomListing,
  Store,
  TopicWithCount,
  UserSummary,
} from './store'

export const HOME_TOPIC_LIMIT = 5
export const MAX_NAME_LENGTH = 200

export interface RoomForm {
  topic: string
  name: string
  description: string
}

export interface ValidRoomForm {
  topic: string
  name: string
  description: string | null
}

export interface HomeListing {
  rooms: RoomListing[]
  roomCount: number
  topics: TopicWithCount[]
  messages: MessageEntry[]
}

export interface RoomPage {
  room: RoomListing
  messages: MessageEntry[]
  participants: UserSummary[]
}

/**
 * Everything the home page shows for the search `q` ('' matches all).
 * Activity is narrowed by topic name only.
 */
export async function listHome(store: Store, q: string): Promise<HomeListing> {
  const filter = roomSearch(q)
  const [rooms, roomCount, topics, messages] = await Promise.all([
    store.findRooms(filter),
    store.countRooms(filter),
    store.findTopics({ limit: HOME_TOPIC_LIMIT }),
    store.findMessages(messageSearch(q)),
  ])
  return { rooms, roomCount, topics, messages }
}

export async function getRoom(store: Store, roomId: string): Promise<Result<RoomPage>> {
  const room = await store.findRoom(roomId)
  if (!room) return notFound('room')

  const [messages, participants] = await Promise.all([
    store.findMessages(messagesInRoom(room.id)),
    store.findParticipants(room.id),
  ])
  return ok({ room, messages, participants })
}

export function validateRoomForm(form: RoomForm): Result<ValidRoomForm> {
  const fields: Record<string, string> = {}

  if (!form.topic.trim()) fields.topic = 'Topic is required'
  else if (form.topic.length > MAX_NAME_LENGTH) fields.topic = `Topic must be at most ${MAX_NAME_LENGTH} characters`

  if (!form.name.trim()) fields.name = 'Name is required'
  else if (form.name.length > MAX_NAME_LENGTH) fields.name = `Name must be at most ${MAX_NAME_LENGTH} characters`

  if (Object.keys(fields).length > 0) {
    return invalid('Please correct the errors below', fields)
  }

  return ok({
    topic: form.topic,
    name: form.name,
    description: form.description.trim() ? form.description : null,
  })
}

/**
 * Creates a room hosted by the acting user, reusing the topic with the exact
 * same name or creating it.
 */
export async function createRoom(store: Store, identity: Identity, form: RoomForm): Promise<Result<Room>> {
  const auth = requireUser(identity)
  if (!auth.ok) return auth

  const valid = validateRoomForm(form)
  if (!valid.ok) return valid

  const topic = await store.upsertTopic(valid.value.topic)
  const room = await store.createRoom({
    hostId: auth.value.id,
    topicId: topic.id,
    name: valid.value.name,
    description: valid.value.description,
  })
  return ok(room)
}

/**
 * Replaces a room's topic, name and description. Host and participants stay.
 */
export async function updateRoom(
  store: Store,
  identity: Identity,
  roomId: string,
  form: RoomForm
): Promise<Result<Room>> {
  const access = await authorizeRoomHost(store, identity, roomId)
  if (!access.ok) return access

  const valid = validateRoomForm(form)
  if (!valid.ok) return valid

  const topic = await store.upsertTopic(valid.value.topic)
  const room = await store.updateRoom(access.value.room.id, {
    topicId: topic.id,
    name: valid.value.name,
    description: valid.value.description,
  })
  return ok(room)
}

export async function deleteRoom(store: Store, identity: Identity, roomId: string): Promise<Result<RoomListing>> {
  const access = await authorizeRoomHost(store, identity, roomId)
  if (!access.ok) return access

  await store.deleteRoom(access.value.room.id)
  return ok(access.value.room)
}

/**
 * Posts to a room and makes the author a participant. Anonymous posting is refused.
 */
export async function postMessage(
  store: Store,
  identity: Identity,
  roomId: string,
  body: string
): Promise<Result<Message>> {
  const auth = requireUser(identity)
  if (!auth.ok) return auth

  const room = await store.findRoom(roomId)
  if (!room) return notFound('room')

  if (!body.trim()) {
    return invalid('Message cannot be empty', { body: 'Message cannot be empty' })
  }

  const message = await store.postMessage({ roomId: room.id, userId: auth.value.id, body })
  return ok(message)
}

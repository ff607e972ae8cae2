import type { MessageFilter, RoomFilter, TopicFilter } from './search'

// ── Records ───────────────────────────────────────────────────

export interface User {
  id: string
  email: string
  name: string
  avatar: string | null
  bio: string | null
  passwordHash: string
  createdAt: Date
}

/** The public face of a user, safe to render anywhere */
export interface UserSummary {
  id: string
  name: string
  avatar: string | null
}

export interface Topic {
  id: string
  name: string
  createdAt: Date
}

export interface TopicWithCount extends Topic {
  roomCount: number
}

export interface Room {
  id: string
  hostId: string
  topicId: string
  name: string
  description: string | null
  createdAt: Date
  updatedAt: Date
}

export interface RoomListing extends Room {
  host: UserSummary
  topic: Topic
  participantIds: string[]
}

export interface Message {
  id: string
  roomId: string
  userId: string
  body: string
  createdAt: Date
  updatedAt: Date
}

export interface MessageEntry extends Message {
  user: UserSummary
  room: { id: string; name: string }
}

// ── Inputs ────────────────────────────────────────────────────

export interface NewUser {
  email: string
  name: string
  passwordHash: string
}

export interface UserChanges {
  email: string
  name: string
  bio: string | null
  avatar: string | null
}

export interface NewRoom {
  hostId: string
  topicId: string
  name: string
  description: string | null
}

export interface RoomChanges {
  topicId: string
  name: string
  description: string | null
}

export interface NewMessage {
  roomId: string
  userId: string
  body: string
}

export interface TopicQuery {
  filter?: TopicFilter
  limit?: number
}

/**
 * Persistence boundary. Rooms and messages come back newest first,
 * topics in creation order.
 */
export interface Store {
  findUserById(id: string): Promise<User | null>
  findUserByEmail(email: string): Promise<User | null>
  createUser(input: NewUser): Promise<User>
  updateUser(id: string, changes: UserChanges): Promise<User>

  /** Returns the topic with exactly this name, creating it when absent */
  upsertTopic(name: string): Promise<Topic>
  findTopics(query?: TopicQuery): Promise<TopicWithCount[]>

  findRooms(filter: RoomFilter): Promise<RoomListing[]>
  countRooms(filter: RoomFilter): Promise<number>
  findRoom(id: string): Promise<RoomListing | null>
  findParticipants(roomId: string): Promise<UserSummary[]>
  createRoom(input: NewRoom): Promise<Room>
  updateRoom(id: string, changes: RoomChanges): Promise<Room>
  /** Removes the room with its messages and participation */
  deleteRoom(id: string): Promise<void>

  findMessages(filter: MessageFilter): Promise<MessageEntry[]>
  findMessage(id: string): Promise<Message | null>
  /** Creates the message and records its author as a room participant */
  postMessage(input: NewMessage): Promise<Message>
  deleteMessage(id: string): Promise<void>
}

export function toSummary(user: Pick<User, 'id' | 'name' | 'avatar'>): UserSummary {
  return { id: user.id, name: user.name, avatar: user.avatar }
}

/** Raised when a write collides with a unique column, such as a user's email */
export class UniqueViolationError extends Error {
  field: string

  constructor(field: string) {
    super(`Duplicate value for ${field}`)
    this.name = 'UniqueViolationError'
    this.field = field
  }
}

import crypto from 'crypto'
import { matchesFilter, type MessageField, type MessageFilter, type RoomField, type RoomFilter } from './search'
import {
  toSummary,
  UniqueViolationError,
  type Message,
  type MessageEntry,
  type NewMessage,
  type NewRoom,
  type NewUser,
  type Room,
  type RoomChanges,
  type RoomListing,
  type Store,
  type Topic,
  type TopicQuery,
  type TopicWithCount,
  type User,
  type UserChanges,
  type UserSummary,
} from './store'

type Sequenced<T> = T & { seq: number }

function newestFirst(a: Sequenced<Room | Message>, b: Sequenced<Room | Message>): number {
  return (
    b.updatedAt.getTime() - a.updatedAt.getTime() ||
    b.createdAt.getTime() - a.createdAt.getTime() ||
    b.seq - a.seq
  )
}

/**
 * In-process store with the same semantics as PgStore. Backs the test suite
 * and `DATA_STORE=memory` demos; contents are lost when the process exits.
 */
export class MemoryStore implements Store {
  private users = new Map<string, User>()
  private topics: Topic[] = []
  private rooms = new Map<string, Sequenced<Room>>()
  private participants = new Map<string, Set<string>>()
  private messages = new Map<string, Sequenced<Message>>()
  private seq = 0

  // ── Users ──

  async findUserById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null
  }

  async findUserByEmail(email: string): Promise<User | null> {
    for (const user of this.users.values()) {
      if (user.email === email) return user
    }
    return null
  }

  async createUser(input: NewUser): Promise<User> {
    if (await this.findUserByEmail(input.email)) throw new UniqueViolationError('email')
    const user: User = {
      id: crypto.randomUUID(),
      email: input.email,
      name: input.name,
      avatar: null,
      bio: null,
      passwordHash: input.passwordHash,
      createdAt: new Date(),
    }
    this.users.set(user.id, user)
    return user
  }

  async updateUser(id: string, changes: UserChanges): Promise<User> {
    const user = this.requireUser(id)
    const holder = await this.findUserByEmail(changes.email)
    if (holder && holder.id !== id) throw new UniqueViolationError('email')
    const updated: User = { ...user, ...changes }
    this.users.set(id, updated)
    return updated
  }

  // ── Topics ──

  async upsertTopic(name: string): Promise<Topic> {
    const existing = this.topics.find(t => t.name === name)
    if (existing) return existing
    const topic: Topic = { id: crypto.randomUUID(), name, createdAt: new Date() }
    this.topics.push(topic)
    return topic
  }

  async findTopics(query: TopicQuery = {}): Promise<TopicWithCount[]> {
    const { filter, limit } = query
    const matching = filter
      ? this.topics.filter(t => matchesFilter(filter, () => t.name))
      : this.topics
    return matching.slice(0, limit).map(t => ({
      ...t,
      roomCount: [...this.rooms.values()].filter(r => r.topicId === t.id).length,
    }))
  }

  // ── Rooms ──

  async findRooms(filter: RoomFilter): Promise<RoomListing[]> {
    return this.matchRooms(filter).sort(newestFirst).map(r => this.toListing(r))
  }

  async countRooms(filter: RoomFilter): Promise<number> {
    return this.matchRooms(filter).length
  }

  async findRoom(id: string): Promise<RoomListing | null> {
    const room = this.rooms.get(id)
    return room ? this.toListing(room) : null
  }

  async findParticipants(roomId: string): Promise<UserSummary[]> {
    const ids = this.participants.get(roomId) ?? new Set<string>()
    return [...ids].map(id => toSummary(this.requireUser(id)))
  }

  async createRoom(input: NewRoom): Promise<Room> {
    this.requireUser(input.hostId)
    this.requireTopic(input.topicId)
    const now = new Date()
    const room: Sequenced<Room> = {
      id: crypto.randomUUID(),
      ...input,
      createdAt: now,
      updatedAt: now,
      seq: ++this.seq,
    }
    this.rooms.set(room.id, room)
    this.participants.set(room.id, new Set())
    return stripRoom(room)
  }

  async updateRoom(id: string, changes: RoomChanges): Promise<Room> {
    const room = this.requireRoom(id)
    this.requireTopic(changes.topicId)
    const updated: Sequenced<Room> = { ...room, ...changes, updatedAt: new Date() }
    this.rooms.set(id, updated)
    return stripRoom(updated)
  }

  async deleteRoom(id: string): Promise<void> {
    this.rooms.delete(id)
    this.participants.delete(id)
    for (const message of [...this.messages.values()]) {
      if (message.roomId === id) this.messages.delete(message.id)
    }
  }

  // ── Messages ──

  async findMessages(filter: MessageFilter): Promise<MessageEntry[]> {
    return [...this.messages.values()]
      .filter(m => matchesFilter(filter, field => this.readMessageField(m, field)))
      .sort(newestFirst)
      .map(m => {
        const room = this.requireRoom(m.roomId)
        return {
          ...stripMessage(m),
          user: toSummary(this.requireUser(m.userId)),
          room: { id: room.id, name: room.name },
        }
      })
  }

  async findMessage(id: string): Promise<Message | null> {
    const message = this.messages.get(id)
    return message ? stripMessage(message) : null
  }

  async postMessage(input: NewMessage): Promise<Message> {
    this.requireRoom(input.roomId)
    this.requireUser(input.userId)
    const now = new Date()
    const message: Sequenced<Message> = {
      id: crypto.randomUUID(),
      ...input,
      createdAt: now,
      updatedAt: now,
      seq: ++this.seq,
    }
    this.messages.set(message.id, message)
    this.participants.get(input.roomId)?.add(input.userId)
    return stripMessage(message)
  }

  async deleteMessage(id: string): Promise<void> {
    this.messages.delete(id)
  }

  // ── Internals ──

  private matchRooms(filter: RoomFilter): Sequenced<Room>[] {
    return [...this.rooms.values()].filter(r => matchesFilter(filter, field => this.readRoomField(r, field)))
  }

  private readRoomField(room: Room, field: RoomField): string | null {
    switch (field) {
      case 'room.name':
        return room.name
      case 'room.description':
        return room.description
      case 'room.hostId':
        return room.hostId
      case 'topic.name':
        return this.requireTopic(room.topicId).name
    }
  }

  private readMessageField(message: Message, field: MessageField): string | null {
    switch (field) {
      case 'message.roomId':
        return message.roomId
      case 'message.userId':
        return message.userId
      case 'topic.name':
        return this.requireTopic(this.requireRoom(message.roomId).topicId).name
    }
  }

  private toListing(room: Sequenced<Room>): RoomListing {
    return {
      ...stripRoom(room),
      host: toSummary(this.requireUser(room.hostId)),
      topic: this.requireTopic(room.topicId),
      participantIds: [...(this.participants.get(room.id) ?? [])],
    }
  }

  private requireUser(id: string): User {
    const user = this.users.get(id)
    if (!user) throw new Error(`Unknown user ${id}`)
    return user
  }

  private requireTopic(id: string): Topic {
    const topic = this.topics.find(t => t.id === id)
    if (!topic) throw new Error(`Unknown topic ${id}`)
    return topic
  }

  private requireRoom(id: string): Sequenced<Room> {
    const room = this.rooms.get(id)
    if (!room) throw new Error(`Unknown room ${id}`)
    return room
  }
}

function stripRoom({ seq: _seq, ...room }: Sequenced<Room>): Room {
  return room
}

function stripMessage({ seq: _seq, ...message }: Sequenced<Message>): Message {
  return message
}

import type { QueryResult } from 'pg'
import {
  compileFilter,
  type MessageField,
  type MessageFilter,
  type RoomField,
  type RoomFilter,
  type TopicField,
} from './search'
import {
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

const ROOM_COLUMNS: Record<RoomField, string> = {
  'room.name': 'r.name',
  'room.description': 'r.description',
  'room.hostId': 'r.host_id',
  'topic.name': 't.name',
}

const MESSAGE_COLUMNS: Record<MessageField, string> = {
  'message.roomId': 'm.room_id',
  'message.userId': 'm.user_id',
  'topic.name': 't.name',
}

const TOPIC_COLUMNS: Record<TopicField, string> = {
  'topic.name': 't.name',
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i

// Postgres rejects malformed uuids with a syntax error; treat them as missing rows
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value)
}

// The parts of pg's Pool and PoolClient the store talks to
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<QueryResult>
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(err?: Error | boolean): void }>
}

// ── Row shapes ────────────────────────────────────────────────

type UserRow = {
  id: string
  email: string
  name: string
  avatar: string | null
  bio: string | null
  password_hash: string
  created_at: Date
}

type TopicRow = {
  id: string
  name: string
  created_at: Date
  room_count: string
}

type RoomRow = {
  id: string
  host_id: string
  topic_id: string
  name: string
  description: string | null
  created_at: Date
  updated_at: Date
}

type RoomListingRow = RoomRow & {
  host_name: string
  host_avatar: string | null
  topic_name: string
  topic_created_at: Date
  participant_ids: string[]
}

type ParticipantRow = {
  id: string
  name: string
  avatar: string | null
}

type MessageRow = {
  id: string
  room_id: string
  user_id: string
  body: string
  created_at: Date
  updated_at: Date
}

type MessageEntryRow = MessageRow & {
  user_name: string
  user_avatar: string | null
  room_name: string
}

const USER_COLUMNS = 'id, email, name, avatar, bio, password_hash, created_at'
const ROOM_RETURNING = 'id, host_id, topic_id, name, description, created_at, updated_at'
const MESSAGE_RETURNING = 'id, room_id, user_id, body, created_at, updated_at'

const ROOM_LISTING_SQL = `
  SELECT r.id, r.host_id, r.topic_id, r.name, r.description, r.created_at, r.updated_at,
         u.name AS host_name, u.avatar AS host_avatar,
         t.name AS topic_name, t.created_at AS topic_created_at,
         ARRAY(
           SELECT p.user_id::text FROM room_participants p
           WHERE p.room_id = r.id
           ORDER BY p.joined_at, p.user_id
         ) AS participant_ids
  FROM rooms r
  JOIN users u ON u.id = r.host_id
  JOIN topics t ON t.id = r.topic_id`

const MESSAGE_ENTRY_SQL = `
  SELECT m.id, m.room_id, m.user_id, m.body, m.created_at, m.updated_at,
         u.name AS user_name, u.avatar AS user_avatar,
         r.name AS room_name
  FROM messages m
  JOIN users u ON u.id = m.user_id
  JOIN rooms r ON r.id = m.room_id
  JOIN topics t ON t.id = r.topic_id`

const NEWEST_FIRST = 'ORDER BY updated_at DESC, created_at DESC, id DESC'

// ── Mapping ───────────────────────────────────────────────────

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    avatar: row.avatar,
    bio: row.bio,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  }
}

function toRoom(row: RoomRow): Room {
  return {
    id: row.id,
    hostId: row.host_id,
    topicId: row.topic_id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function toRoomListing(row: RoomListingRow): RoomListing {
  return {
    ...toRoom(row),
    host: { id: row.host_id, name: row.host_name, avatar: row.host_avatar },
    topic: { id: row.topic_id, name: row.topic_name, createdAt: row.topic_created_at },
    participantIds: row.participant_ids,
  }
}

function toMessage(row: MessageRow): Message {
  return {
    id: row.id,
    roomId: row.room_id,
    userId: row.user_id,
    body: row.body,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

function toMessageEntry(row: MessageEntryRow): MessageEntry {
  return {
    ...toMessage(row),
    user: { id: row.user_id, name: row.user_name, avatar: row.user_avatar },
    room: { id: row.room_id, name: row.room_name },
  }
}

function sqlState(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined
  const code = Reflect.get(error, 'code')
  return typeof code === 'string' ? code : undefined
}

function rethrowUnique(error: unknown, field: string): never {
  if (sqlState(error) === '23505') {
    throw new UniqueViolationError(field)
  }
  throw error
}

/**
 * Store backed by PostgreSQL (see db/schema.sql).
 */
export class PgStore implements Store {
  constructor(private pool: SqlPool) {}

  // ── Users ──

  async findUserById(id: string): Promise<User | null> {
    if (!isUuid(id)) return null
    const { rows }: QueryResult<UserRow> = await this.pool.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    )
    return rows[0] ? toUser(rows[0]) : null
  }

  async findUserByEmail(email: string): Promise<User | null> {
    const { rows }: QueryResult<UserRow> = await this.pool.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    )
    return rows[0] ? toUser(rows[0]) : null
  }

  async createUser(input: NewUser): Promise<User> {
    try {
      const { rows }: QueryResult<UserRow> = await this.pool.query(
        `INSERT INTO users (email, name, password_hash) VALUES ($1, $2, $3) RETURNING ${USER_COLUMNS}`,
        [input.email, input.name, input.passwordHash]
      )
      return toUser(rows[0])
    } catch (error) {
      rethrowUnique(error, 'email')
    }
  }

  async updateUser(id: string, changes: UserChanges): Promise<User> {
    try {
      const { rows }: QueryResult<UserRow> = await this.pool.query(
        `UPDATE users SET email = $2, name = $3, bio = $4, avatar = $5 WHERE id = $1 RETURNING ${USER_COLUMNS}`,
        [id, changes.email, changes.name, changes.bio, changes.avatar]
      )
      if (!rows[0]) throw new Error(`Unknown user ${id}`)
      return toUser(rows[0])
    } catch (error) {
      rethrowUnique(error, 'email')
    }
  }

  // ── Topics ──

  async upsertTopic(name: string): Promise<Topic> {
    // The no-op update makes RETURNING yield the existing row on conflict
    const { rows }: QueryResult<Omit<TopicRow, 'room_count'>> = await this.pool.query(
      `INSERT INTO topics (name) VALUES ($1)
       ON CONFLICT (name) DO UPDATE SET name = EXCLUDED.name
       RETURNING id, name, created_at`,
      [name]
    )
    return { id: rows[0].id, name: rows[0].name, createdAt: rows[0].created_at }
  }

  async findTopics(query: TopicQuery = {}): Promise<TopicWithCount[]> {
    const where = query.filter ? compileFilter(query.filter, TOPIC_COLUMNS) : { text: 'TRUE', values: [] }
    const values: (string | number)[] = [...where.values]
    let limit = ''
    if (query.limit !== undefined) {
      values.push(query.limit)
      limit = `LIMIT $${values.length}`
    }
    const { rows }: QueryResult<TopicRow> = await this.pool.query(
      `SELECT t.id, t.name, t.created_at,
              (SELECT COUNT(*) FROM rooms r WHERE r.topic_id = t.id) AS room_count
       FROM topics t
       WHERE ${where.text}
       ORDER BY t.created_at, t.id
       ${limit}`,
      values
    )
    return rows.map(row => ({
      id: row.id,
      name: row.name,
      createdAt: row.created_at,
      roomCount: Number(row.room_count),
    }))
  }

  // ── Rooms ──

  async findRooms(filter: RoomFilter): Promise<RoomListing[]> {
    const where = compileFilter(filter, ROOM_COLUMNS)
    const { rows }: QueryResult<RoomListingRow> = await this.pool.query(
      `SELECT * FROM (${ROOM_LISTING_SQL} WHERE ${where.text}) listing ${NEWEST_FIRST}`,
      where.values
    )
    return rows.map(toRoomListing)
  }

  async countRooms(filter: RoomFilter): Promise<number> {
    const where = compileFilter(filter, ROOM_COLUMNS)
    const { rows }: QueryResult<{ count: string }> = await this.pool.query(
      `SELECT COUNT(*) AS count FROM rooms r JOIN topics t ON t.id = r.topic_id WHERE ${where.text}`,
      where.values
    )
    return Number(rows[0].count)
  }

  async findRoom(id: string): Promise<RoomListing | null> {
    if (!isUuid(id)) return null
    const { rows }: QueryResult<RoomListingRow> = await this.pool.query(`${ROOM_LISTING_SQL} WHERE r.id = $1`, [id])
    return rows[0] ? toRoomListing(rows[0]) : null
  }

  async findParticipants(roomId: string): Promise<UserSummary[]> {
    if (!isUuid(roomId)) return []
    const { rows }: QueryResult<ParticipantRow> = await this.pool.query(
      `SELECT u.id, u.name, u.avatar
       FROM room_participants p
       JOIN users u ON u.id = p.user_id
       WHERE p.room_id = $1
       ORDER BY p.joined_at, p.user_id`,
      [roomId]
    )
    return rows
  }

  async createRoom(input: NewRoom): Promise<Room> {
    const { rows }: QueryResult<RoomRow> = await this.pool.query(
      `INSERT INTO rooms (host_id, topic_id, name, description)
       VALUES ($1, $2, $3, $4)
       RETURNING ${ROOM_RETURNING}`,
      [input.hostId, input.topicId, input.name, input.description]
    )
    return toRoom(rows[0])
  }

  async updateRoom(id: string, changes: RoomChanges): Promise<Room> {
    const { rows }: QueryResult<RoomRow> = await this.pool.query(
      `UPDATE rooms SET topic_id = $2, name = $3, description = $4, updated_at = now()
       WHERE id = $1
       RETURNING ${ROOM_RETURNING}`,
      [id, changes.topicId, changes.name, changes.description]
    )
    if (!rows[0]) throw new Error(`Unknown room ${id}`)
    return toRoom(rows[0])
  }

  async deleteRoom(id: string): Promise<void> {
    if (!isUuid(id)) return
    // messages and room_participants cascade
    await this.pool.query('DELETE FROM rooms WHERE id = $1', [id])
  }

  // ── Messages ──

  async findMessages(filter: MessageFilter): Promise<MessageEntry[]> {
    const where = compileFilter(filter, MESSAGE_COLUMNS)
    const { rows }: QueryResult<MessageEntryRow> = await this.pool.query(
      `SELECT * FROM (${MESSAGE_ENTRY_SQL} WHERE ${where.text}) entry ${NEWEST_FIRST}`,
      where.values
    )
    return rows.map(toMessageEntry)
  }

  async findMessage(id: string): Promise<Message | null> {
    if (!isUuid(id)) return null
    const { rows }: QueryResult<MessageRow> = await this.pool.query(
      `SELECT ${MESSAGE_RETURNING} FROM messages WHERE id = $1`,
      [id]
    )
    return rows[0] ? toMessage(rows[0]) : null
  }

  async postMessage(input: NewMessage): Promise<Message> {
    const client = await this.pool.connect()
    let broken = false
    try {
      await client.query('BEGIN')
      const { rows }: QueryResult<MessageRow> = await client.query(
        `INSERT INTO messages (room_id, user_id, body) VALUES ($1, $2, $3) RETURNING ${MESSAGE_RETURNING}`,
        [input.roomId, input.userId, input.body]
      )
      await client.query(
        `INSERT INTO room_participants (room_id, user_id) VALUES ($1, $2)
         ON CONFLICT (room_id, user_id) DO NOTHING`,
        [input.roomId, input.userId]
      )
      await client.query('COMMIT')
      return toMessage(rows[0])
    } catch (error) {
      try {
        await client.query('ROLLBACK')
      } catch (rollbackError) {
        console.error('Rollback error:', rollbackError)
        broken = true
      }
      throw error
    } finally {
      // a truthy argument makes pg discard the connection
      client.release(broken)
    }
  }

  async deleteMessage(id: string): Promise<void> {
    if (!isUuid(id)) return
    await this.pool.query('DELETE FROM messages WHERE id = $1', [id])
  }
}

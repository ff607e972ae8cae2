// Search filters for room, message and topic listings.
//
// A filter is built once from the request and then either compiled to a SQL
// WHERE fragment (PgStore) or evaluated against in-memory rows (MemoryStore),
// so both stores agree on what "matches" means.

export type RoomField = 'room.name' | 'room.description' | 'room.hostId' | 'topic.name'
export type MessageField = 'message.roomId' | 'message.userId' | 'topic.name'
export type TopicField = 'topic.name'

export type Filter<F extends string> =
  | { op: 'contains'; field: F; value: string }
  | { op: 'equals'; field: F; value: string }
  | { op: 'or'; filters: Filter<F>[] }
  | { op: 'and'; filters: Filter<F>[] }

export type RoomFilter = Filter<RoomField>
export type MessageFilter = Filter<MessageField>
export type TopicFilter = Filter<TopicField>

export interface CompiledFilter {
  text: string
  values: string[]
}

// ── Builders ──────────────────────────────────────────────────

export function matchAll<F extends string>(): Filter<F> {
  return { op: 'and', filters: [] }
}

/**
 * Rooms whose topic name, name or description contains `q`, ignoring case.
 */
export function roomSearch(q: string): RoomFilter {
  return {
    op: 'or',
    filters: [
      { op: 'contains', field: 'topic.name', value: q },
      { op: 'contains', field: 'room.name', value: q },
      { op: 'contains', field: 'room.description', value: q },
    ],
  }
}

/**
 * Messages whose room's topic name contains `q`. The message body is not searched.
 */
export function messageSearch(q: string): MessageFilter {
  return { op: 'contains', field: 'topic.name', value: q }
}

export function topicSearch(q: string): TopicFilter {
  return { op: 'contains', field: 'topic.name', value: q }
}

export function roomsHostedBy(userId: string): RoomFilter {
  return { op: 'equals', field: 'room.hostId', value: userId }
}

export function messagesInRoom(roomId: string): MessageFilter {
  return { op: 'equals', field: 'message.roomId', value: roomId }
}

export function messagesBy(userId: string): MessageFilter {
  return { op: 'equals', field: 'message.userId', value: userId }
}

/**
 * Reads the `q` search parameter. Missing means "match everything";
 * a repeated parameter keeps its first value.
 */
export function normalizeQuery(value: string | string[] | null | undefined): string {
  if (Array.isArray(value)) return value[0] ?? ''
  return value ?? ''
}

// ── SQL ───────────────────────────────────────────────────────

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&')
}

/**
 * Compiles a filter into a parenthesised WHERE fragment with positional
 * parameters starting after `offset`.
 */
export function compileFilter<F extends string>(
  filter: Filter<F>,
  columns: Record<F, string>,
  offset = 0
): CompiledFilter {
  const values: string[] = []

  const visit = (node: Filter<F>): string => {
    switch (node.op) {
      case 'contains':
        values.push(`%${escapeLike(node.value)}%`)
        return `${columns[node.field]} ILIKE $${offset + values.length} ESCAPE '\\'`
      case 'equals':
        values.push(node.value)
        return `${columns[node.field]} = $${offset + values.length}`
      case 'or':
        if (node.filters.length === 0) return 'FALSE'
        return `(${node.filters.map(visit).join(' OR ')})`
      case 'and':
        if (node.filters.length === 0) return 'TRUE'
        return `(${node.filters.map(visit).join(' AND ')})`
    }
  }

  return { text: visit(filter), values }
}

// ── In memory ─────────────────────────────────────────────────

/**
 * Evaluates a filter against one row. `read` returns the field's value,
 * or null where the column is NULL (which never matches, as in SQL).
 */
export function matchesFilter<F extends string>(
  filter: Filter<F>,
  read: (field: F) => string | null
): boolean {
  switch (filter.op) {
    case 'contains': {
      const value = read(filter.field)
      return value !== null && value.toLowerCase().includes(filter.value.toLowerCase())
    }
    case 'equals':
      return read(filter.field) === filter.value
    case 'or':
      return filter.filters.some(f => matchesFilter(f, read))
    case 'and':
      return filter.filters.every(f => matchesFilter(f, read))
  }
}

import { describe, it, expect } from 'vitest'
import {
  compileFilter,
  escapeLike,
  matchAll,
  matchesFilter,
  messageSearch,
  normalizeQuery,
  roomSearch,
  type RoomField,
} from '@/lib/search'

const COLUMNS: Record<RoomField, string> = {
  'room.name': 'r.name',
  'room.description': 'r.description',
  'room.hostId': 'r.host_id',
  'topic.name': 't.name',
}

describe('normalizeQuery', () => {
  it('treats a missing q as empty', () => {
    expect(normalizeQuery(undefined)).toBe('')
    expect(normalizeQuery(null)).toBe('')
  })

  it('keeps the first of repeated values', () => {
    expect(normalizeQuery(['chess', 'go'])).toBe('chess')
    expect(normalizeQuery([])).toBe('')
  })
})

describe('escapeLike', () => {
  it('escapes LIKE wildcards and the escape character', () => {
    expect(escapeLike('100%_done\\')).toBe('100\\%\\_done\\\\')
  })
})

describe('compileFilter', () => {
  it('compiles a room search into an OR of ILIKE clauses', () => {
    const compiled = compileFilter(roomSearch('Go'), COLUMNS)
    expect(compiled.text).toBe(
      "(t.name ILIKE $1 ESCAPE '\\' OR r.name ILIKE $2 ESCAPE '\\' OR r.description ILIKE $3 ESCAPE '\\')"
    )
    expect(compiled.values).toEqual(['%Go%', '%Go%', '%Go%'])
  })

  it('numbers parameters after the offset', () => {
    const compiled = compileFilter({ op: 'equals', field: 'room.hostId', value: 'u1' }, COLUMNS, 2)
    expect(compiled).toEqual({ text: 'r.host_id = $3', values: ['u1'] })
  })

  it('compiles an empty AND to TRUE and an empty OR to FALSE', () => {
    expect(compileFilter(matchAll<RoomField>(), COLUMNS).text).toBe('TRUE')
    expect(compileFilter({ op: 'or', filters: [] }, COLUMNS).text).toBe('FALSE')
  })

  it('escapes wildcards inside the search value', () => {
    expect(compileFilter(roomSearch('50%'), COLUMNS).values[0]).toBe('%50\\%%')
  })
})

describe('matchesFilter', () => {
  const room: Record<RoomField, string | null> = {
    'room.name': 'Chess Club',
    'room.description': null,
    'room.hostId': 'u1',
    'topic.name': 'Games',
  }
  const read = (field: RoomField) => room[field]

  it('matches case-insensitive substrings of any searched field', () => {
    expect(matchesFilter(roomSearch('gam'), read)).toBe(true)
    expect(matchesFilter(roomSearch('CHESS'), read)).toBe(true)
    expect(matchesFilter(roomSearch('poker'), read)).toBe(false)
  })

  it('matches everything for an empty query', () => {
    expect(matchesFilter(roomSearch(''), read)).toBe(true)
  })

  it('never matches a null column', () => {
    expect(matchesFilter({ op: 'contains', field: 'room.description', value: '' }, read)).toBe(false)
  })

  it('matches everything with matchAll', () => {
    expect(matchesFilter(matchAll<RoomField>(), read)).toBe(true)
  })

  it('searches messages by topic name only', () => {
    expect(messageSearch('Games')).toEqual({ op: 'contains', field: 'topic.name', value: 'Games' })
  })
})

import { ApiError } from './errors'
import type { Room } from './types'

function fail(what: string): never {
  throw new ApiError(`Malformed response: ${what}`, 200, 'MALFORMED_RESPONSE')
}

function field(value: object, key: string): unknown {
  return Reflect.get(value, key)
}

function str(value: object, key: string): string {
  const v = field(value, key)
  return typeof v === 'string' ? v : fail(`expected string "${key}"`)
}

export function parseRoom(value: unknown): Room {
  if (typeof value !== 'object' || value === null) fail('expected a room object')

  const description = field(value, 'description')
  if (description !== null && typeof description !== 'string') fail('expected "description" to be a string or null')

  const participants = field(value, 'participants')
  if (!Array.isArray(participants)) fail('expected "participants" array')

  return {
    id: str(value, 'id'),
    host: str(value, 'host'),
    topic: str(value, 'topic'),
    name: str(value, 'name'),
    description,
    participants: participants.map(p => (typeof p === 'string' ? p : fail('expected participant id'))),
    updated: str(value, 'updated'),
    created: str(value, 'created'),
  }
}

export function parseStrings(value: unknown): string[] {
  if (!Array.isArray(value)) fail('expected an array')
  return value.map(v => (typeof v === 'string' ? v : fail('expected string entries')))
}

export function parseRooms(value: unknown): Room[] {
  if (!Array.isArray(value)) fail('expected an array of rooms')
  return value.map(parseRoom)
}

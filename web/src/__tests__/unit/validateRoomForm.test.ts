import { describe, it, expect } from 'vitest'
import { validateRoomForm } from '@/lib/rooms'

describe('validateRoomForm', () => {
  it('accepts a topic and name, with blank description as null', () => {
    expect(validateRoomForm({ topic: 'Games', name: 'Chess Club', description: '   ' })).toEqual({
      ok: true,
      value: { topic: 'Games', name: 'Chess Club', description: null },
    })
  })

  it('reports every missing field', () => {
    expect(validateRoomForm({ topic: ' ', name: '', description: '' })).toEqual({
      ok: false,
      error: {
        kind: 'invalid',
        message: 'Please correct the errors below',
        fields: { topic: 'Topic is required', name: 'Name is required' },
      },
    })
  })

  it('limits names to 200 characters', () => {
    const result = validateRoomForm({ topic: 'Games', name: 'x'.repeat(201), description: '' })
    expect(result.ok).toBe(false)
    if (!result.ok && result.error.kind === 'invalid') {
      expect(result.error.fields).toEqual({ name: 'Name must be at most 200 characters' })
    }
  })
})

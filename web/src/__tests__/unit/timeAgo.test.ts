import { describe, it, expect } from 'vitest'
import { timeAgo } from '@/lib/time'

const NOW = new Date('2026-03-10T12:00:00Z')

function ago(seconds: number) {
  return new Date(NOW.getTime() - seconds * 1000)
}

describe('timeAgo', () => {
  it('returns "just now" under a minute', () => {
    expect(timeAgo(ago(59), NOW)).toBe('just now')
  })

  it('counts minutes, hours and days', () => {
    expect(timeAgo(ago(60), NOW)).toBe('1m ago')
    expect(timeAgo(ago(2 * 3600 + 5), NOW)).toBe('2h ago')
    expect(timeAgo(ago(3 * 86400), NOW)).toBe('3d ago')
  })

  it('falls back to a date after 30 days', () => {
    const date = ago(31 * 86400)
    expect(timeAgo(date, NOW)).toBe(date.toLocaleDateString('en-US'))
  })
})

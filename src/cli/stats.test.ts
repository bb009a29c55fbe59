import { describe, expect, it } from 'vitest'
import { formatDate, formatParticipants, StatsCollector } from './stats.js'

describe('StatsCollector', () => {
  it('counts messages, senders and the date range', () => {
    const stats = new StatsCollector()
    stats.add({ sender: 'Bob', content: 'b', timestamp: new Date(Date.UTC(2024, 5, 2)) })
    stats.add({ sender: 'Alice', content: 'a', timestamp: new Date(Date.UTC(2024, 0, 1)) })
    stats.add({ sender: 'Bob', content: 'c' })
    stats.addInvalid()

    expect(stats.count).toBe(3)
    expect(stats.result()).toEqual({
      messageCount: 3,
      senders: ['Bob', 'Alice'],
      dateRange: { start: new Date(Date.UTC(2024, 0, 1)), end: new Date(Date.UTC(2024, 5, 2)) },
      invalidCount: 1
    })
  })

  it('has no date range without timestamps', () => {
    const stats = new StatsCollector()
    stats.add({ sender: 'Bob', content: 'b' })
    expect(stats.result().dateRange).toBeUndefined()
  })
})

describe('formatParticipants', () => {
  it('lists up to five names', () => {
    expect(formatParticipants(['A', 'B', 'C'])).toBe('A, B, C')
  })

  it('summarizes the rest', () => {
    expect(formatParticipants(['A', 'B', 'C', 'D', 'E', 'F', 'G'])).toBe(
      'A, B, C, D, E, and 2 others'
    )
  })
})

describe('formatDate', () => {
  it('formats the UTC calendar date', () => {
    expect(formatDate(new Date(Date.UTC(2024, 2, 9, 23, 59)))).toBe('2024-03-09')
  })
})

import { describe, expect, it } from 'vitest'
import type { CanonicalMessage } from '../types/index.js'
import {
  createFilter,
  filterMessages,
  isFilterActive,
  matchesFilter,
  parseFilterDate
} from './filter.js'

function message(sender: string, content: string, day?: string): CanonicalMessage {
  return day === undefined
    ? { sender, content }
    : { sender, content, timestamp: new Date(`${day}T12:00:00Z`) }
}

describe('Message Filters', () => {
  describe('parseFilterDate', () => {
    it('reads the start of a day in UTC', () => {
      expect(parseFilterDate('2024-06-01', 'start')).toEqual(new Date(Date.UTC(2024, 5, 1)))
    })

    it('reads the last second of a day in UTC', () => {
      expect(parseFilterDate('2024-06-01', 'end')).toEqual(
        new Date(Date.UTC(2024, 5, 1, 23, 59, 59))
      )
    })

    it('rejects other layouts and impossible days', () => {
      expect(() => parseFilterDate('01/06/2024', 'start')).toThrow(
        "Invalid date '01/06/2024'. Use YYYY-MM-DD."
      )
      expect(() => parseFilterDate('2024-02-30', 'start')).toThrow(
        "Invalid date '2024-02-30'. Use YYYY-MM-DD."
      )
    })
  })

  describe('createFilter', () => {
    it('is inactive without options', () => {
      expect(isFilterActive(createFilter({}))).toBe(false)
    })

    it('is active with any option', () => {
      expect(isFilterActive(createFilter({ from: 'alice' }))).toBe(true)
      expect(isFilterActive(createFilter({ before: '2024-01-01' }))).toBe(true)
    })

    it('rejects a range that ends before it starts', () => {
      expect(() => createFilter({ after: '2024-06-02', before: '2024-06-01' })).toThrow(
        'Start date 2024-06-02 is after end date 2024-06-01'
      )
    })

    it('accepts a single-day range', () => {
      const filter = createFilter({ after: '2024-06-01', before: '2024-06-01' })
      expect(matchesFilter(message('Alice', 'noon', '2024-06-01'), filter)).toBe(true)
    })
  })

  describe('matchesFilter', () => {
    it('matches the sender ignoring case', () => {
      const filter = createFilter({ from: 'alice' })
      expect(matchesFilter(message('Alice', 'hi'), filter)).toBe(true)
      expect(matchesFilter(message('Bob', 'hi'), filter)).toBe(false)
    })

    it('includes both ends of the date range', () => {
      const filter = createFilter({ after: '2024-06-01', before: '2024-06-30' })
      expect(matchesFilter(message('A', 'x', '2024-05-31'), filter)).toBe(false)
      expect(matchesFilter(message('A', 'x', '2024-06-01'), filter)).toBe(true)
      expect(matchesFilter(message('A', 'x', '2024-06-30'), filter)).toBe(true)
      expect(matchesFilter(message('A', 'x', '2024-07-01'), filter)).toBe(false)
    })

    it('drops undated messages only when a date filter is set', () => {
      expect(matchesFilter(message('A', 'x'), createFilter({ after: '2024-01-01' }))).toBe(false)
      expect(matchesFilter(message('A', 'x'), createFilter({ from: 'a' }))).toBe(true)
    })
  })

  describe('filterMessages', () => {
    it('combines filters with AND', () => {
      const messages = [
        message('Alice', 'old', '2024-01-01'),
        message('Alice', 'new', '2024-06-15'),
        message('Bob', 'new too', '2024-06-16')
      ]

      const filtered = filterMessages(messages, createFilter({ after: '2024-06-01', from: 'ALICE' }))

      expect(filtered.map((m) => m.content)).toEqual(['new'])
    })

    it('returns every message when no filter is active', () => {
      const messages = [message('Alice', 'a'), message('Bob', 'b')]
      expect(filterMessages(messages, createFilter({}))).toEqual(messages)
    })
  })
})

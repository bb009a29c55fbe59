import { describe, expect, it } from 'vitest'
import { ConsecutiveMerger, mergeConsecutive, reductionPercent } from './merge.js'

describe('Consecutive Message Merging', () => {
  describe('mergeConsecutive', () => {
    it('joins runs from the same sender', () => {
      const merged = mergeConsecutive([
        { sender: 'Alice', content: 'Hi' },
        { sender: 'Alice', content: 'How are you?' },
        { sender: 'Bob', content: 'Fine' },
        { sender: 'Bob', content: 'Thanks' },
        { sender: 'Alice', content: 'Great!' }
      ])

      expect(merged).toEqual([
        { sender: 'Alice', content: 'Hi\nHow are you?' },
        { sender: 'Bob', content: 'Fine\nThanks' },
        { sender: 'Alice', content: 'Great!' }
      ])
    })

    it('keeps the first message of a run for its other fields', () => {
      const merged = mergeConsecutive([
        { sender: 'Alice', content: 'one', id: 1n, timestamp: new Date(Date.UTC(2024, 0, 1)) },
        { sender: 'Alice', content: 'two', id: 2n, timestamp: new Date(Date.UTC(2024, 0, 2)) }
      ])

      expect(merged).toEqual([
        {
          sender: 'Alice',
          content: 'one\ntwo',
          id: 1n,
          timestamp: new Date(Date.UTC(2024, 0, 1))
        }
      ])
    })

    it('handles empty and single-message input', () => {
      expect(mergeConsecutive([])).toEqual([])
      expect(mergeConsecutive([{ sender: 'Alice', content: 'Hi' }])).toEqual([
        { sender: 'Alice', content: 'Hi' }
      ])
    })

    it('compares senders exactly', () => {
      const merged = mergeConsecutive([
        { sender: 'Alice', content: 'a' },
        { sender: 'alice', content: 'b' }
      ])
      expect(merged).toHaveLength(2)
    })
  })

  describe('ConsecutiveMerger', () => {
    it('hands back a run when the sender changes', () => {
      const merger = new ConsecutiveMerger()
      expect(merger.push({ sender: 'Alice', content: 'a' })).toBeNull()
      expect(merger.push({ sender: 'Alice', content: 'b' })).toBeNull()
      expect(merger.push({ sender: 'Bob', content: 'c' })).toEqual({
        sender: 'Alice',
        content: 'a\nb'
      })
      expect(merger.flush()).toEqual({ sender: 'Bob', content: 'c' })
      expect(merger.flush()).toBeNull()
    })

    it('starts a new run instead of growing past the size limit', () => {
      const merger = new ConsecutiveMerger(10)
      expect(merger.push({ sender: 'Alice', content: 'abc' })).toBeNull()
      expect(merger.push({ sender: 'Alice', content: 'def' })).toBeNull()
      expect(merger.push({ sender: 'Alice', content: 'ghij' })).toEqual({
        sender: 'Alice',
        content: 'abc\ndef'
      })
      expect(merger.flush()).toEqual({ sender: 'Alice', content: 'ghij' })
    })
  })

  describe('reductionPercent', () => {
    it('reports the share of entries saved', () => {
      expect(reductionPercent(100, 50)).toBe(50)
      expect(reductionPercent(4, 3)).toBe(25)
    })

    it('is zero for no input', () => {
      expect(reductionPercent(0, 0)).toBe(0)
    })
  })
})

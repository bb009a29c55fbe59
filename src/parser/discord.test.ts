import { describe, expect, it } from 'vitest'
import {
  buildDiscordContent,
  type DiscordRawRecord,
  decodeDiscordRecord,
  discordToMessage,
  isJsonlLine
} from './discord.js'

function record(overrides: Partial<DiscordRawRecord> = {}): DiscordRawRecord {
  return {
    id: '1100000000000000001',
    timestamp: '2024-03-01T12:00:00+00:00',
    content: 'hello',
    author: { name: 'alice', nickname: 'Ali' },
    ...overrides
  }
}

describe('Discord decoder', () => {
  describe('buildDiscordContent', () => {
    it('uses only the attachment tag when the text is empty', () => {
      const content = buildDiscordContent(
        record({ content: '', attachments: [{ fileName: 'photo.jpg' }] })
      )
      expect(content).toBe('[Attachment: photo.jpg]')
    })

    it('puts attachments then stickers on their own lines', () => {
      const content = buildDiscordContent(
        record({
          content: 'look',
          attachments: [{ fileName: 'a.png' }, { fileName: 'b.png' }],
          stickers: [{ name: 'wave' }]
        })
      )
      expect(content).toBe('look\n[Attachment: a.png]\n[Attachment: b.png]\n[Sticker: wave]')
    })

    it('leaves tags out when attachments are disabled', () => {
      const content = buildDiscordContent(
        record({ content: '', attachments: [{ fileName: 'photo.jpg' }] }),
        false
      )
      expect(content).toBe('')
    })
  })

  describe('discordToMessage', () => {
    it('keeps snowflake ids exact', () => {
      const message = discordToMessage(
        record({ id: '1234567890123456789', reference: { messageId: '1234567890123456788' } })
      )
      expect(message.id).toBe(1234567890123456789n)
      expect(message.replyTo).toBe(1234567890123456788n)
    })

    it('prefers the nickname by default', () => {
      expect(discordToMessage(record()).sender).toBe('Ali')
      expect(discordToMessage(record(), { preferNickname: false }).sender).toBe('alice')
    })

    it('falls back to the name when the nickname is empty', () => {
      expect(discordToMessage(record({ author: { name: 'alice', nickname: '' } })).sender).toBe(
        'alice'
      )
    })

    it('reads timestamps with offsets', () => {
      const message = discordToMessage(
        record({
          timestamp: '2024-03-01T14:00:00.000+02:00',
          timestampEdited: '2024-03-01T12:05:00Z'
        })
      )
      expect(message.timestamp).toEqual(new Date(Date.UTC(2024, 2, 1, 12, 0, 0)))
      expect(message.edited).toEqual(new Date(Date.UTC(2024, 2, 1, 12, 5, 0)))
    })

    it('leaves an unreadable timestamp undefined', () => {
      expect(discordToMessage(record({ timestamp: 'last tuesday' })).timestamp).toBeUndefined()
    })
  })

  describe('decodeDiscordRecord', () => {
    it('rejects a record without an author', () => {
      expect(() =>
        decodeDiscordRecord('{"id":"1","timestamp":"2024-03-01T12:00:00Z","content":"x"}')
      ).toThrow('Decode error: author:')
    })
  })

  describe('isJsonlLine', () => {
    it('accepts a complete record object', () => {
      expect(isJsonlLine('{"id":"1","content":"x"}')).toBe(true)
    })

    it('rejects an export document on one line', () => {
      expect(isJsonlLine('{"guild":{},"messages":[]}')).toBe(false)
    })

    it('rejects the first line of a pretty-printed document', () => {
      expect(isJsonlLine('{')).toBe(false)
      expect(isJsonlLine('[{"id":"1"}]')).toBe(false)
    })
  })
})

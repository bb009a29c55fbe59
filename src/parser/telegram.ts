/**
 * Telegram Export Decoder
 *
 * Telegram Desktop's "Export chat history" writes result.json with a
 * top-level `messages` array. Service entries (joins, pins, calls) carry
 * `type: "service"` and are dropped here.
 */

import { z } from 'zod'
import type { DecodedMessage } from '../types/index.js'
import { decodeJson, parseUnixSeconds, toUnsigned } from './decode.js'

export const TelegramRawRecordSchema = z.object({
  id: z.number().optional(),
  type: z.string(),
  date_unixtime: z.string().nullish(),
  from: z.string().nullish(),
  // Plain string, or a list of strings and { type, text } runs
  text: z.unknown().optional(),
  reply_to_message_id: z.number().nullish(),
  edited_unixtime: z.string().nullish()
})

export type TelegramRawRecord = z.infer<typeof TelegramRawRecordSchema>

/**
 * Flatten Telegram's rich text into plain text. Runs are concatenated in
 * order with nothing in between; entries that are neither strings nor
 * objects with a string `text` contribute nothing.
 */
export function extractText(value: unknown): string {
  if (typeof value === 'string') return value
  if (!Array.isArray(value)) return ''

  const entries: unknown[] = value
  let text = ''
  for (const entry of entries) {
    if (typeof entry === 'string') {
      text += entry
    } else if (typeof entry === 'object' && entry !== null && 'text' in entry) {
      const run = entry.text
      if (typeof run === 'string') text += run
    }
  }
  return text
}

export function telegramToMessage(record: TelegramRawRecord): DecodedMessage | null {
  if (record.type !== 'message') return null

  return {
    sender: record.from ?? undefined,
    content: extractText(record.text),
    timestamp: parseUnixSeconds(record.date_unixtime),
    id: toUnsigned(record.id),
    replyTo: toUnsigned(record.reply_to_message_id),
    edited: parseUnixSeconds(record.edited_unixtime)
  }
}

/** Decode one carved object. Null for entries that are not messages. */
export function decodeTelegramRecord(text: string): DecodedMessage | null {
  return telegramToMessage(decodeJson(text, TelegramRawRecordSchema))
}

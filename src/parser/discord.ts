/**
 * Discord Export Decoder
 *
 * Reads records in the DiscordChatExporter layout, either as a JSON document
 * with a `messages` array or as JSON Lines with one record per line.
 */

import { z } from 'zod'
import type { DecodedMessage, DiscordOptions } from '../types/index.js'
import { decodeJson, parseRfc3339, parseUnsigned } from './decode.js'

export const DiscordRawRecordSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  timestampEdited: z.string().nullish(),
  content: z.string(),
  author: z.object({
    name: z.string(),
    nickname: z.string().nullish()
  }),
  reference: z
    .object({
      messageId: z.string().nullish()
    })
    .nullish(),
  attachments: z.array(z.object({ fileName: z.string() })).nullish(),
  stickers: z.array(z.object({ name: z.string() })).nullish()
})

export type DiscordRawRecord = z.infer<typeof DiscordRawRecordSchema>

/**
 * Text body followed by one tag per attachment and then per sticker. A tag
 * goes on its own line unless it is the first thing in the content.
 */
export function buildDiscordContent(record: DiscordRawRecord, includeAttachments = true): string {
  let content = record.content
  if (!includeAttachments) return content

  const tags = [
    ...(record.attachments ?? []).map((a) => `[Attachment: ${a.fileName}]`),
    ...(record.stickers ?? []).map((s) => `[Sticker: ${s.name}]`)
  ]
  for (const tag of tags) {
    content = content.length > 0 ? `${content}\n${tag}` : tag
  }
  return content
}

export function discordToMessage(
  record: DiscordRawRecord,
  options: DiscordOptions = {}
): DecodedMessage {
  const preferNickname = options.preferNickname ?? true
  const nickname = record.author.nickname
  const sender = preferNickname && nickname ? nickname : record.author.name

  return {
    sender,
    content: buildDiscordContent(record, options.includeAttachments ?? true),
    timestamp: parseRfc3339(record.timestamp),
    id: parseUnsigned(record.id),
    replyTo: parseUnsigned(record.reference?.messageId),
    edited: parseRfc3339(record.timestampEdited)
  }
}

export function decodeDiscordRecord(text: string, options: DiscordOptions = {}): DecodedMessage {
  return discordToMessage(decodeJson(text, DiscordRawRecordSchema), options)
}

/**
 * True when a line is a complete JSON object that is not itself a Discord
 * export document, i.e. the file is JSON Lines.
 */
export function isJsonlLine(line: string): boolean {
  const trimmed = line.trim()
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) return false
  try {
    const value: unknown = JSON.parse(trimmed)
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !('messages' in value)
  } catch {
    return false
  }
}

/**
 * Instagram Export Decoder
 *
 * Meta's data download writes message_N.json files whose strings are UTF-8
 * bytes escaped one byte per code point ("ðŸ˜€" for 😀). fixMojibake undoes
 * that.
 */

import { z } from 'zod'
import type { DecodedMessage, InstagramOptions } from '../types/index.js'
import { decodeJson, parseEpochMillis } from './decode.js'

export const InstagramRawRecordSchema = z.object({
  sender_name: z.string(),
  timestamp_ms: z.number(),
  content: z.string().nullish(),
  share: z
    .object({
      share_text: z.string().nullish(),
      link: z.string().nullish()
    })
    .nullish()
})

export type InstagramRawRecord = z.infer<typeof InstagramRawRecordSchema>

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Reinterpret each code point as one byte and decode the bytes as UTF-8.
 * Text that is plain ASCII, holds code points above U+00FF, or does not
 * decode is returned unchanged.
 */
export function fixMojibake(text: string): string {
  if (/^[\x00-\x7F]*$/.test(text)) return text

  const bytes = new Uint8Array(text.length)
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i)
    if (code > 0xff) return text
    bytes[i] = code
  }

  try {
    return utf8.decode(bytes)
  } catch {
    return text
  }
}

export function instagramToMessage(
  record: InstagramRawRecord,
  options: InstagramOptions = {}
): DecodedMessage {
  const fixEncoding = options.fixEncoding ?? true
  const repair = (text: string): string => (fixEncoding ? fixMojibake(text) : text)

  const content = record.content ?? record.share?.share_text ?? ''

  return {
    sender: repair(record.sender_name),
    content: repair(content),
    timestamp: parseEpochMillis(record.timestamp_ms)
  }
}

export function decodeInstagramRecord(text: string, options: InstagramOptions = {}): DecodedMessage {
  return instagramToMessage(decodeJson(text, InstagramRawRecordSchema), options)
}

/**
 * Parser Module
 *
 * Per-platform record decoders, the WhatsApp line parser, and detection of
 * which platform an export file came from.
 */

import { open } from 'node:fs/promises'
import { extname } from 'node:path'
import type { Platform } from '../types/index.js'
import { detectFormat } from './whatsapp-formats.js'

export { decodeJson, parseEpochMillis, parseRfc3339, parseUnixSeconds, parseUnsigned } from './decode.js'
export {
  buildDiscordContent,
  decodeDiscordRecord,
  type DiscordRawRecord,
  DiscordRawRecordSchema,
  discordToMessage,
  isJsonlLine
} from './discord.js'
export {
  decodeInstagramRecord,
  fixMojibake,
  type InstagramRawRecord,
  InstagramRawRecordSchema,
  instagramToMessage
} from './instagram.js'
export { normalizeMessage } from './normalize.js'
export {
  defaultExtension,
  displayName,
  PLATFORM_NAMES,
  PLATFORMS,
  parsePlatform
} from './platform.js'
export {
  decodeTelegramRecord,
  extractText,
  type TelegramRawRecord,
  TelegramRawRecordSchema,
  telegramToMessage
} from './telegram.js'
export { expandTwoDigitYear, parseTimestamp, parseWithTemplate } from './timestamp.js'
export {
  isSystemMessage,
  matchHeader,
  normalizeApostrophes,
  WhatsAppLineParser
} from './whatsapp.js'
export {
  DETECTION_SAMPLE_SIZE,
  detectFormat,
  type FormatDescriptor,
  type FormatScore,
  getFormat,
  scoreFormats,
  WHATSAPP_FORMATS
} from './whatsapp-formats.js'

// Chat kinds Telegram Desktop writes in result.json
const TELEGRAM_CHAT_TYPE =
  /"type"\s*:\s*"(personal_chat|private_group|private_supergroup|public_supergroup|private_channel|public_channel|saved_messages|bot_chat)"/

// An object, or an array of objects; iOS WhatsApp lines open with "[1/15/24"
const JSON_START = /^(\{|\[\s*[{\]])/

/** Bytes read from the head of a file for platform detection. */
export const DETECTION_HEAD_BYTES = 4096

/**
 * Detect the platform from the first few KB of an export.
 * JSON exports are told apart by their field names; anything else is
 * WhatsApp if one of its line grammars matches.
 */
export function detectPlatformFromContent(head: string): Platform | undefined {
  const text = head.replace(/^\uFEFF/, '').trimStart()

  if (JSON_START.test(text)) {
    if (text.includes('"sender_name"') && text.includes('"timestamp_ms"')) {
      return 'instagram'
    }
    if (text.includes('"date_unixtime"') || TELEGRAM_CHAT_TYPE.test(text)) {
      return 'telegram'
    }
    if (text.includes('"guild"') || (text.includes('"author"') && text.includes('"timestampEdited"'))) {
      return 'discord'
    }
    return undefined
  }

  return detectFormat(text.split('\n').map((line) => line.replace(/\r$/, ''))) ? 'whatsapp' : undefined
}

/**
 * Read up to `bytes` bytes from the start of a file as UTF-8 text.
 */
export async function readHead(path: string, bytes = DETECTION_HEAD_BYTES): Promise<string> {
  const handle = await open(path, 'r')
  try {
    const buffer = Buffer.alloc(bytes)
    const { bytesRead } = await handle.read(buffer, 0, bytes, 0)
    return buffer.toString('utf8', 0, bytesRead)
  } finally {
    await handle.close()
  }
}

/**
 * Detect the platform of a file on disk. A `.txt` file that no WhatsApp
 * grammar matches is still reported as WhatsApp, since no other platform
 * exports plain text.
 */
export async function detectPlatform(path: string): Promise<Platform | undefined> {
  const detected = detectPlatformFromContent(await readHead(path))
  if (detected) return detected
  return extname(path).toLowerCase() === '.txt' ? 'whatsapp' : undefined
}

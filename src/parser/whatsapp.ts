/**
 * WhatsApp Chat Parser
 *
 * Line-at-a-time parser for WhatsApp text exports. Each header line opens a
 * message; lines that match no header belong to the message above them.
 *
 * iOS (US locale): [1/15/24, 10:30:45 AM] Sender: Message
 * Android (EU):    15/01/2024, 10:30 - Sender: Message
 */

import { bufferOverflow } from '../streaming/errors.js'
import { byteLength } from '../streaming/reader.js'
import type { DecodedMessage, WhatsAppOptions } from '../types/index.js'
import { parseTimestamp } from './timestamp.js'
import { type FormatDescriptor, stripLeftToRightMark } from './whatsapp-formats.js'

// Group notices and banners. English entries match case-insensitively.
const SYSTEM_INDICATORS_EN: readonly string[] = [
  'Messages and calls are end-to-end encrypted',
  'created group',
  'added',
  'removed',
  'left',
  'changed the subject',
  "changed this group's icon",
  'changed the group description',
  "deleted this group's icon",
  'changed their phone number',
  "joined using this group's invite link",
  'security code changed',
  "You're now an admin",
  'is now an admin',
  'disappeared',
  'turned on disappearing messages',
  'turned off disappearing messages'
].map((indicator) => indicator.toLowerCase())

const SYSTEM_INDICATORS_RU: readonly string[] = [
  'Сообщения и звонки защищены сквозным шифрованием',
  'создал(а) группу',
  'добавил',
  'удалил',
  'вышел',
  'покинул',
  'изменил тему',
  'изменил иконку группы',
  'изменил описание группы',
  'удалил иконку группы',
  'изменил номер телефона',
  'присоединился по ссылке',
  'код безопасности изменён',
  'теперь администратор',
  'включил исчезающие сообщения',
  'выключил исчезающие сообщения',
  'Подробнее'
]

/**
 * Normalize apostrophe variants to straight apostrophe (U+0027).
 * iOS exports write "You’re now an admin" with a curly one.
 */
export function normalizeApostrophes(text: string): string {
  return text.replace(/[\u2018\u2019\u02BC\u2032]/g, "'")
}

/**
 * Check whether a message is a WhatsApp notice rather than something a
 * participant wrote: a known phrase in the content, or a blank or
 * WhatsApp/system sender.
 */
export function isSystemMessage(sender: string, content: string): boolean {
  const contentLower = normalizeApostrophes(content).toLowerCase()
  if (SYSTEM_INDICATORS_EN.some((indicator) => contentLower.includes(indicator))) {
    return true
  }
  if (SYSTEM_INDICATORS_RU.some((indicator) => content.includes(indicator))) {
    return true
  }

  const senderLower = sender.toLowerCase()
  return sender.trim() === '' || senderLower.includes('whatsapp') || senderLower.includes('system')
}

interface MessageHeader {
  timestamp: Date | undefined
  sender: string
  content: string
}

interface MessageBuilder extends MessageHeader {
  /** UTF-8 bytes of the content, counted on after the text is dropped */
  size: number
  oversized: boolean
}

function createBuilderFromMatch(
  match: RegExpExecArray,
  format: FormatDescriptor
): MessageHeader {
  const [, dateStr = '', timeStr = '', sender = '', content = ''] = match
  return {
    timestamp: parseTimestamp(`${dateStr}, ${timeStr}`, format.templates),
    sender: sender.trim(),
    content
  }
}

function startBuilder(header: MessageHeader, maxSize: number): MessageBuilder {
  const size = byteLength(header.content)
  const oversized = size > maxSize
  return { ...header, content: oversized ? '' : header.content, size, oversized }
}

function appendToBuilder(builder: MessageBuilder, line: string, maxSize: number): void {
  const text = line.trimEnd()
  builder.size += 1 + byteLength(text)
  if (builder.oversized) return
  if (builder.size > maxSize) {
    builder.oversized = true
    builder.content = ''
    return
  }
  builder.content += `\n${text}`
}

/**
 * Parse a single line against a grammar. Returns the header fields when the
 * line opens a message.
 */
export function matchHeader(
  line: string,
  format: FormatDescriptor
): MessageHeader | null {
  const match = format.pattern.exec(stripLeftToRightMark(line))
  return match ? createBuilderFromMatch(match, format) : null
}

export interface WhatsAppParserOptions extends WhatsAppOptions {
  /** Largest message in UTF-8 bytes, continuation lines included */
  readonly maxMessageSize?: number | undefined
}

/**
 * Incremental WhatsApp parser. Feed it lines in file order; it hands back a
 * message each time one is complete.
 */
export class WhatsAppLineParser {
  private current: MessageBuilder | null = null
  private readonly skipSystemMessages: boolean
  private readonly maxMessageSize: number

  constructor(
    readonly format: FormatDescriptor,
    options: WhatsAppParserOptions = {}
  ) {
    this.skipSystemMessages = options.skipSystemMessages ?? true
    this.maxMessageSize = options.maxMessageSize ?? Number.POSITIVE_INFINITY
  }

  /**
   * Consume one line. Returns the previous message when this line starts a
   * new one and the previous one is kept, else null. Lines before the first
   * header are dropped.
   *
   * A message that grew past maxMessageSize is thrown as a size_limit error
   * in its place; the parser has already moved on to the new line.
   */
  push(line: string): DecodedMessage | null {
    const header = matchHeader(line, this.format)

    if (header) {
      const finished = this.current
      this.current = startBuilder(header, this.maxMessageSize)
      return finished ? this.finalize(finished) : null
    }

    if (this.current) {
      appendToBuilder(this.current, line, this.maxMessageSize)
    }
    return null
  }

  /** Finish the message in progress, if any. */
  flush(): DecodedMessage | null {
    const finished = this.current
    this.current = null
    return finished ? this.finalize(finished) : null
  }

  private finalize(builder: MessageBuilder): DecodedMessage | null {
    if (builder.oversized) {
      throw bufferOverflow(this.maxMessageSize, builder.size)
    }
    if (this.skipSystemMessages && isSystemMessage(builder.sender, builder.content)) {
      return null
    }
    return {
      sender: builder.sender === '' ? undefined : builder.sender,
      content: builder.content.trim(),
      timestamp: builder.timestamp
    }
  }
}

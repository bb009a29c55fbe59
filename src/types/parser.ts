/**
 * Parser Types
 *
 * Types for chat platforms and the canonical message representation.
 */

export type Platform = 'telegram' | 'whatsapp' | 'instagram' | 'discord'

export type WhatsAppFormatName =
  | 'us'
  | 'eu_dot_bracketed'
  | 'eu_dot_no_bracket'
  | 'eu_slash'
  | 'eu_slash_bracketed'

/**
 * Dialect-independent message that every platform converges to.
 * `content.trim()` is never empty on a message handed to the caller.
 */
export interface CanonicalMessage {
  readonly sender: string
  readonly content: string
  readonly timestamp?: Date | undefined
  /** Platform message id (Discord snowflakes need more than 53 bits) */
  readonly id?: bigint | undefined
  readonly replyTo?: bigint | undefined
  readonly edited?: Date | undefined
}

/**
 * Best-effort output of a dialect decoder, before the keep/drop decision.
 */
export interface DecodedMessage {
  readonly sender?: string | undefined
  readonly content: string
  readonly timestamp?: Date | undefined
  readonly id?: bigint | undefined
  readonly replyTo?: bigint | undefined
  readonly edited?: Date | undefined
}

export interface DiscordOptions {
  /** Use the server nickname as sender when present (default: true) */
  readonly preferNickname?: boolean | undefined
  /** Append [Attachment: ...] and [Sticker: ...] tags (default: true) */
  readonly includeAttachments?: boolean | undefined
}

export interface InstagramOptions {
  /** Repair Meta's latin-1 mojibake in sender and content (default: true) */
  readonly fixEncoding?: boolean | undefined
}

export interface WhatsAppOptions {
  /** Drop group notices, encryption banners and similar (default: true) */
  readonly skipSystemMessages?: boolean | undefined
  /** Force a grammar instead of detecting one */
  readonly format?: WhatsAppFormatName | 'auto' | undefined
}

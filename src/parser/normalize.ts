/**
 * Message Normalizer
 *
 * The single keep/drop decision for every dialect: a message needs a sender
 * and content that is not blank. Decoders synthesize attachment and sticker
 * placeholders before this runs.
 */

import type { CanonicalMessage, DecodedMessage } from '../types/index.js'

export function normalizeMessage(decoded: DecodedMessage): CanonicalMessage | null {
  const { sender, content } = decoded
  if (sender === undefined || content.trim().length === 0) {
    return null
  }

  return {
    sender,
    content,
    timestamp: decoded.timestamp,
    id: decoded.id,
    replyTo: decoded.replyTo,
    edited: decoded.edited
  }
}

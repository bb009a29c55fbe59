/**
 * Record Sources
 *
 * A record source turns raw input into decoded units for MessageStream.
 * Each call produces one unit: a decoded message, `null` for an entry the
 * dialect filters out (Telegram service entries, WhatsApp notices), or an
 * error. `undefined` means the input is exhausted.
 */

import type { DecodedMessage, Result } from '../types/index.js'
import { err, ok } from '../types/index.js'
import { type StreamingError, toStreamingError } from './errors.js'

export type UnitResult = Result<DecodedMessage | null, StreamingError>

export interface RecordSource {
  next(): Promise<UnitResult | undefined>
}

export type RecordDecoder = (text: string) => DecodedMessage | null

/**
 * Run one pull, turning anything thrown into an error unit.
 */
export async function pull(
  read: () => Promise<DecodedMessage | null | undefined>
): Promise<UnitResult | undefined> {
  try {
    const unit = await read()
    return unit === undefined ? undefined : ok(unit)
  } catch (error) {
    return err(toStreamingError(error))
  }
}

/**
 * Streaming Types
 *
 * Configuration and progress shapes shared by every streaming reader.
 */

import type { StreamingError } from '../streaming/errors.js'
import type { DiscordOptions, InstagramOptions, WhatsAppOptions } from './parser.js'

export interface StreamingConfig {
  /** Read-ahead size in bytes (default: 64 KiB) */
  readonly bufferSize: number
  /** Largest single record in bytes before it is rejected (default: 10 MiB) */
  readonly maxRecordSize: number
  /** Drop per-record failures instead of yielding them (default: true) */
  readonly skipInvalid: boolean
  /** Emitted messages between onProgress calls (default: 10000) */
  readonly progressInterval: number
}

export interface ProgressSnapshot {
  readonly bytesProcessed: number
  readonly totalBytes?: number | undefined
  readonly itemsProcessed: number
  /** bytesProcessed / totalBytes × 100, or undefined when the total is unknown */
  readonly percentage?: number | undefined
}

export type ProgressCallback = (progress: ProgressSnapshot) => void

export type StreamState = 'not_started' | 'active' | 'finished'

export interface StreamOptions
  extends Partial<StreamingConfig>,
    DiscordOptions,
    InstagramOptions,
    WhatsAppOptions {
  readonly onProgress?: ProgressCallback | undefined
  /** Called with each per-record failure dropped under skipInvalid */
  readonly onSkip?: ((error: StreamingError) => void) | undefined
}

/**
 * chat-ingest Core Library
 *
 * Stream Telegram, WhatsApp, Instagram and Discord exports into one
 * canonical message shape, in memory bounded by the largest single record.
 *
 * Design principle: the library never logs or exits. Failures come back as
 * values on the stream; progress goes to the caller's callback.
 *
 * @license AGPL-3.0
 */

// Filtering and merging
export * from './core/index.js'
// Parser module
export * from './parser/index.js'
// Progress tracking
export {
  isComplete,
  itemsPercentage,
  ProgressTracker,
  percentage,
  remainingBytes
} from './progress/index.js'
// Streaming module
export {
  bufferOverflow,
  decodeError,
  invalidFormat,
  ioError,
  StreamingError,
  type StreamingErrorType,
  toStreamingError,
  unexpectedEof
} from './streaming/errors.js'
export { byteLength, LineReader, TextSource } from './streaming/reader.js'
export { ARRAY_SEARCH_LIMIT, RecordScanner, type ScannerOptions } from './streaming/scanner.js'
export {
  DEFAULT_STREAMING_CONFIG,
  MessageStream,
  openMessageStream,
  resolveConfig,
  type StreamItem,
  streamingPreset
} from './streaming/stream.js'
// Types
export * from './types/index.js'

export const VERSION = '0.1.0'

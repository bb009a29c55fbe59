/**
 * Message Streams
 *
 * Pull-based iteration over an export file: each `next()` reads just enough
 * input to produce one canonical message (or one error). Memory stays at
 * one read buffer plus one record, whatever the file size.
 *
 * @example
 * const stream = openMessageStream('result.json', 'telegram')
 * for await (const item of stream) {
 *   if (item.ok) console.log(item.value.sender, item.value.content)
 * }
 */

import { type FileHandle, open } from 'node:fs/promises'
import { decodeDiscordRecord, isJsonlLine } from '../parser/discord.js'
import { decodeInstagramRecord } from '../parser/instagram.js'
import { normalizeMessage } from '../parser/normalize.js'
import { decodeTelegramRecord } from '../parser/telegram.js'
import { ProgressTracker } from '../progress/index.js'
import type {
  CanonicalMessage,
  Platform,
  ProgressSnapshot,
  Result,
  StreamingConfig,
  StreamOptions,
  StreamState
} from '../types/index.js'
import { err, ok } from '../types/index.js'
import { ArrayRecordSource } from './array.js'
import { type StreamingError, toStreamingError } from './errors.js'
import { JsonlRecordSource } from './jsonl.js'
import { LineReader, TextSource } from './reader.js'
import { RecordScanner } from './scanner.js'
import type { RecordSource, UnitResult } from './source.js'
import { WhatsAppRecordSource } from './whatsapp.js'

export type StreamItem = Result<CanonicalMessage, StreamingError>

export const DEFAULT_STREAMING_CONFIG: StreamingConfig = Object.freeze({
  bufferSize: 64 * 1024,
  maxRecordSize: 10 * 1024 * 1024,
  skipInvalid: true,
  progressInterval: 10_000
})

/** Larger read buffer for multi-gigabyte exports. */
export function streamingPreset(overrides: Partial<StreamingConfig> = {}): StreamingConfig {
  return resolveConfig({ ...DEFAULT_STREAMING_CONFIG, bufferSize: 256 * 1024, ...overrides })
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

/** Fill in defaults and check the numeric settings. */
export function resolveConfig(options: Partial<StreamingConfig> = {}): StreamingConfig {
  return Object.freeze({
    bufferSize: positiveInteger('bufferSize', options.bufferSize ?? DEFAULT_STREAMING_CONFIG.bufferSize),
    maxRecordSize: positiveInteger(
      'maxRecordSize',
      options.maxRecordSize ?? DEFAULT_STREAMING_CONFIG.maxRecordSize
    ),
    skipInvalid: options.skipInvalid ?? DEFAULT_STREAMING_CONFIG.skipInvalid,
    progressInterval: positiveInteger(
      'progressInterval',
      options.progressInterval ?? DEFAULT_STREAMING_CONFIG.progressInterval
    )
  })
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined }

/**
 * One pass over one file. Not restartable: open a new stream to read the
 * file again. Meant for a single consumer awaiting each `next()` in turn.
 */
export class MessageStream implements AsyncIterableIterator<StreamItem> {
  readonly config: StreamingConfig
  private current: StreamState = 'not_started'
  private tracker = new ProgressTracker()
  private handle: FileHandle | null = null
  private source: RecordSource | null = null

  constructor(
    readonly path: string,
    readonly platform: Platform,
    private readonly options: StreamOptions = {}
  ) {
    this.config = resolveConfig(options)
  }

  get state(): StreamState {
    return this.current
  }

  progress(): ProgressSnapshot {
    return this.tracker.snapshot()
  }

  async next(): Promise<IteratorResult<StreamItem, undefined>> {
    if (this.current === 'finished') return DONE

    if (this.current === 'not_started') {
      this.current = 'active'
      try {
        this.source = await this.start()
      } catch (error) {
        return this.fail(toStreamingError(error))
      }
    }

    const source = this.source
    if (!source) return DONE

    while (true) {
      let unit: UnitResult | undefined
      try {
        unit = await source.next()
      } catch (error) {
        return this.fail(toStreamingError(error))
      }

      if (unit === undefined) {
        this.tracker.complete()
        await this.finish()
        this.options.onProgress?.(this.tracker.snapshot())
        return DONE
      }

      if (!unit.ok) {
        if (unit.error.fatal) return this.fail(unit.error)
        if (this.config.skipInvalid) {
          this.options.onSkip?.(unit.error)
          continue
        }
        return { done: false, value: err(unit.error) }
      }

      if (unit.value === null) continue
      const message = normalizeMessage(unit.value)
      if (!message) continue

      this.tracker.addItem()
      if (this.tracker.itemsProcessed % this.config.progressInterval === 0) {
        this.options.onProgress?.(this.tracker.snapshot())
      }
      return { done: false, value: ok(message) }
    }
  }

  /** Stop early and release the file. */
  async return(): Promise<IteratorResult<StreamItem, undefined>> {
    await this.finish()
    return DONE
  }

  close(): Promise<void> {
    return this.finish()
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  private async start(): Promise<RecordSource> {
    const handle = await open(this.path, 'r')
    this.handle = handle
    const { size } = await handle.stat()
    this.tracker = new ProgressTracker(size)
    return this.createSource(handle)
  }

  private async createSource(handle: FileHandle): Promise<RecordSource> {
    const { bufferSize, maxRecordSize } = this.config
    const text = () => new TextSource(handle, bufferSize)
    const scan = () =>
      new RecordScanner(text(), this.tracker, { arrayKey: 'messages', maxRecordSize })

    switch (this.platform) {
      case 'telegram':
        return new ArrayRecordSource(scan(), decodeTelegramRecord)
      case 'instagram':
        return new ArrayRecordSource(scan(), (record) => decodeInstagramRecord(record, this.options))
      case 'discord': {
        const decode = (record: string) => decodeDiscordRecord(record, this.options)
        if (await isJsonlFile(handle, bufferSize, maxRecordSize)) {
          return new JsonlRecordSource(new LineReader(text(), this.tracker, maxRecordSize), decode)
        }
        return new ArrayRecordSource(scan(), decode)
      }
      case 'whatsapp':
        return new WhatsAppRecordSource(
          new LineReader(text(), this.tracker, maxRecordSize),
          maxRecordSize,
          this.options
        )
    }
  }

  /** Fatal errors end the stream after being handed out once. */
  private async fail(error: StreamingError): Promise<IteratorResult<StreamItem, undefined>> {
    await this.finish()
    return { done: false, value: err(error) }
  }

  private async finish(): Promise<void> {
    this.current = 'finished'
    this.source = null
    const handle = this.handle
    this.handle = null
    if (handle) {
      await handle.close()
    }
  }
}

/**
 * Whether a Discord export is JSON Lines: its first non-blank line is a
 * whole JSON object of its own. Reads from the start with a separate reader
 * and leaves no trace on the stream's progress.
 */
async function isJsonlFile(handle: FileHandle, bufferSize: number, maxLineSize: number): Promise<boolean> {
  const lines = new LineReader(new TextSource(handle, bufferSize), new ProgressTracker(), maxLineSize)
  while (true) {
    let line: string | null
    try {
      line = await lines.next()
    } catch (error) {
      // An oversized first line is a single-line document, not JSON Lines
      if (toStreamingError(error).type === 'size_limit') return false
      throw error
    }
    if (line === null) return false
    if (line.trim().length > 0) return isJsonlLine(line)
  }
}

/**
 * Open an export for streaming. The file itself is opened on the first
 * pull; an unreadable file shows up as a single `io` error item.
 */
export function openMessageStream(
  path: string,
  platform: Platform,
  options: StreamOptions = {}
): MessageStream {
  return new MessageStream(path, platform, options)
}

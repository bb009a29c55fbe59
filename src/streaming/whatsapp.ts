/**
 * WhatsApp line source
 *
 * Buffers the head of the file until it has enough non-empty lines to pick
 * a grammar, then replays those lines through the parser before reading on.
 * Runs of blank lines in the head are kept as a count.
 */

import {
  DETECTION_SAMPLE_SIZE,
  detectFormat,
  type FormatDescriptor,
  getFormat
} from '../parser/whatsapp-formats.js'
import { WhatsAppLineParser } from '../parser/whatsapp.js'
import type { DecodedMessage, WhatsAppOptions } from '../types/index.js'
import { err, ok } from '../types/index.js'
import { invalidFormat, type StreamingError, toStreamingError } from './errors.js'
import type { LineReader } from './reader.js'
import type { RecordSource, UnitResult } from './source.js'

// Lines, or errors (oversized lines) to replay in place
type SampleEntry = string | StreamingError

interface BlankRun {
  blankLines: number
}

type ReplayEntry = SampleEntry | BlankRun

export class WhatsAppRecordSource implements RecordSource {
  private parser: WhatsAppLineParser | null = null
  private readonly replay: ReplayEntry[] = []
  private ended = false
  private flushed = false

  constructor(
    private readonly lines: LineReader,
    private readonly maxRecordSize: number,
    private readonly options: WhatsAppOptions = {}
  ) {}

  async next(): Promise<UnitResult | undefined> {
    if (!this.parser) {
      const failure = await this.start()
      if (failure) return err(failure)
    }
    const parser = this.parser
    if (!parser) return undefined

    while (true) {
      const entry = await this.nextEntry()

      if (entry === null) {
        if (this.flushed) return undefined
        this.flushed = true
        return this.feed(() => parser.flush()) ?? undefined
      }

      if (typeof entry !== 'string') {
        if (entry.fatal) {
          this.ended = true
          this.flushed = true
        }
        return err(entry)
      }

      const unit = this.feed(() => parser.push(entry))
      if (unit !== null) return unit
    }
  }

  /** A finished message or an oversized one's error; null when neither. */
  private feed(step: () => DecodedMessage | null): UnitResult | null {
    try {
      const message = step()
      return message ? ok(message) : null
    } catch (error) {
      return err(toStreamingError(error))
    }
  }

  private createParser(format: FormatDescriptor): WhatsAppLineParser {
    return new WhatsAppLineParser(format, { ...this.options, maxMessageSize: this.maxRecordSize })
  }

  /**
   * Pick the grammar: the forced one, or the one the sample detects. A file
   * with no non-empty lines gets the first grammar, which then sees nothing
   * but blank lines.
   */
  private async start(): Promise<StreamingError | null> {
    const forced = this.options.format
    if (forced !== undefined && forced !== 'auto') {
      this.parser = this.createParser(getFormat(forced))
      return null
    }

    const sample: string[] = []
    while (sample.length < DETECTION_SAMPLE_SIZE) {
      const entry = await this.readEntry()
      if (entry === null) break
      if (typeof entry !== 'string') {
        if (entry.fatal) return entry
        this.replay.push(entry)
        continue
      }
      if (entry.trim().length > 0) {
        sample.push(entry)
        this.replay.push(entry)
      } else {
        this.pushBlank()
      }
    }

    if (sample.length === 0) {
      this.parser = this.createParser(getFormat('us'))
      return null
    }

    const format = detectFormat(sample)
    if (!format) {
      this.ended = true
      this.replay.length = 0
      return invalidFormat('unrecognized WhatsApp format')
    }

    this.parser = this.createParser(format)
    return null
  }

  private pushBlank(): void {
    const last = this.replay[this.replay.length - 1]
    if (last !== undefined && typeof last === 'object' && 'blankLines' in last) {
      last.blankLines++
    } else {
      this.replay.push({ blankLines: 1 })
    }
  }

  private async nextEntry(): Promise<SampleEntry | null> {
    const buffered = this.replay[0]
    if (buffered === undefined) return this.readEntry()
    if (typeof buffered === 'object' && 'blankLines' in buffered) {
      buffered.blankLines--
      if (buffered.blankLines === 0) this.replay.shift()
      return ''
    }
    this.replay.shift()
    return buffered
  }

  private async readEntry(): Promise<SampleEntry | null> {
    if (this.ended) return null
    try {
      const line = await this.lines.next()
      if (line === null) this.ended = true
      return line
    } catch (error) {
      return toStreamingError(error)
    }
  }
}

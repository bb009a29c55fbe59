/**
 * Incremental Record Scanner
 *
 * Carves the source text of each object in a named JSON array, one object
 * per call, without parsing or buffering the surrounding document.
 *
 * Depth tracking counts `{` and `}` outside string literals only, so braces
 * inside message text cannot move a record boundary. Anything else about the
 * object (its validity as JSON, its shape) is left to the decoder.
 */

import type { ProgressTracker } from '../progress/index.js'
import { bufferOverflow, invalidFormat, unexpectedEof } from './errors.js'
import { byteLength, type TextSource } from './reader.js'

/** Give up looking for the array after this much input. */
export const ARRAY_SEARCH_LIMIT = 10 * 1024 * 1024

/** Text kept between chunks so a key split across two reads still matches. */
const SEARCH_OVERLAP = 256

const QUOTE = 0x22
const BACKSLASH = 0x5c
const OPEN_BRACE = 0x7b
const CLOSE_BRACE = 0x7d

export interface ScannerOptions {
  /** Key of the array to stream (e.g. "messages") */
  readonly arrayKey: string
  readonly maxRecordSize: number
  readonly searchLimit?: number | undefined
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export class RecordScanner {
  private chunk = ''
  private index = 0
  private located = false
  private finished = false

  // Cursor state for the record being carved
  private depth = 0
  private inString = false
  private escaped = false

  private readonly arrayStart: RegExp
  /** `"key"` and optional `:` at the end of the window, waiting on more input */
  private readonly pendingKey: RegExp
  private readonly searchLimit: number

  constructor(
    private readonly source: TextSource,
    private readonly tracker: ProgressTracker,
    private readonly options: ScannerOptions
  ) {
    const key = escapeRegExp(options.arrayKey)
    this.arrayStart = new RegExp(`"${key}"\\s*:\\s*\\[`)
    this.pendingKey = new RegExp(`"${key}"\\s*(?::\\s*)?$`)
    this.searchLimit = options.searchLimit ?? ARRAY_SEARCH_LIMIT
  }

  get isFinished(): boolean {
    return this.finished
  }

  /**
   * Consume input up to and including the array's opening bracket.
   * Throws invalid_format when the array is missing or too far in.
   */
  async locate(): Promise<void> {
    if (this.located) return

    let window = ''
    let searched = 0

    while (true) {
      const text = await this.source.read()
      if (text === null) {
        this.tracker.addBytes(byteLength(window))
        this.finished = true
        throw invalidFormat(`could not find '${this.options.arrayKey}' array`)
      }
      window += text

      const match = this.arrayStart.exec(window)
      if (match) {
        const end = match.index + match[0].length
        this.tracker.addBytes(byteLength(window.slice(0, end)))
        this.chunk = window.slice(end)
        this.index = 0
        this.located = true
        return
      }

      const pending = this.pendingKey.exec(window)
      const keepFrom = Math.min(
        pending ? pending.index : window.length,
        Math.max(0, window.length - SEARCH_OVERLAP)
      )
      const dropped = byteLength(window.slice(0, keepFrom))
      this.tracker.addBytes(dropped)
      searched += dropped
      window = window.slice(keepFrom)

      if (searched + byteLength(window) > this.searchLimit) {
        this.finished = true
        throw invalidFormat(
          `header too large or '${this.options.arrayKey}' array not found in first ${this.searchLimit} bytes`
        )
      }
    }
  }

  /**
   * Carve the next object's text, or null once the array (or input) ends.
   *
   * A record larger than maxRecordSize is read through to its end without
   * being kept, then reported as size_limit; the next call carries on with
   * the following record.
   */
  async next(): Promise<string | null> {
    if (this.finished) return null
    if (!this.located) await this.locate()

    const startFound = await this.skipToRecord()
    if (!startFound) return null

    this.depth = 0
    this.inString = false
    this.escaped = false

    const parts: string[] = []
    let size = 0
    let oversized = false

    while (true) {
      if (this.index >= this.chunk.length && !(await this.fill())) {
        this.finished = true
        throw unexpectedEof()
      }

      const start = this.index
      const end = this.scanObject()
      const segment = this.chunk.slice(start, end)
      this.index = end

      const segmentBytes = byteLength(segment)
      this.tracker.addBytes(segmentBytes)
      size += segmentBytes

      if (!oversized && size > this.options.maxRecordSize) {
        oversized = true
        parts.length = 0
      }
      if (!oversized) {
        parts.push(segment)
      }

      if (this.depth === 0) {
        if (oversized) {
          throw bufferOverflow(this.options.maxRecordSize, size)
        }
        return parts.join('')
      }
    }
  }

  /**
   * Skip separators up to the next `{`. Returns false when `]` or the end
   * of input comes first.
   */
  private async skipToRecord(): Promise<boolean> {
    while (true) {
      if (this.index >= this.chunk.length && !(await this.fill())) {
        this.finished = true
        return false
      }

      let i = this.index
      while (i < this.chunk.length) {
        const ch = this.chunk[i]
        if (ch === '{') break
        if (ch === ']') {
          this.tracker.addBytes(byteLength(this.chunk.slice(this.index, i + 1)))
          this.index = i + 1
          this.finished = true
          return false
        }
        i++
      }

      this.tracker.addBytes(byteLength(this.chunk.slice(this.index, i)))
      this.index = i
      if (i < this.chunk.length) return true
    }
  }

  /**
   * Advance through the current chunk, updating depth and string state.
   * Returns the index just past the closing brace, or the chunk length
   * when the object continues in the next chunk.
   */
  private scanObject(): number {
    const text = this.chunk
    for (let i = this.index; i < text.length; i++) {
      const code = text.charCodeAt(i)

      if (this.inString) {
        if (this.escaped) {
          this.escaped = false
        } else if (code === BACKSLASH) {
          this.escaped = true
        } else if (code === QUOTE) {
          this.inString = false
        }
        continue
      }

      if (code === QUOTE) {
        this.inString = true
      } else if (code === OPEN_BRACE) {
        this.depth++
      } else if (code === CLOSE_BRACE) {
        this.depth--
        if (this.depth === 0) return i + 1
      }
    }
    return text.length
  }

  private async fill(): Promise<boolean> {
    const text = await this.source.read()
    if (text === null) return false
    this.chunk = text
    this.index = 0
    return true
  }
}

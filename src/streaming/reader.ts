/**
 * Buffered Readers
 *
 * TextSource turns a file handle into decoded UTF-8 chunks of at most
 * `bufferSize` bytes. LineReader splits those chunks into lines with a
 * per-line size cap. Neither ever holds more than one chunk plus one line.
 */

import type { FileHandle } from 'node:fs/promises'
import { StringDecoder } from 'node:string_decoder'
import type { ProgressTracker } from '../progress/index.js'
import { bufferOverflow } from './errors.js'

const BYTE_ORDER_MARK = '\uFEFF'

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8')
}

export class TextSource {
  private readonly buffer: Buffer
  private readonly decoder = new StringDecoder('utf8')
  private position: number
  private ended = false
  private first = true

  constructor(
    private readonly handle: FileHandle,
    bufferSize: number,
    start = 0
  ) {
    this.buffer = Buffer.alloc(Math.max(1, bufferSize))
    this.position = start
  }

  /**
   * Read the next chunk of text, or null at end of input.
   * A leading byte order mark is dropped.
   */
  async read(): Promise<string | null> {
    while (!this.ended) {
      const { bytesRead } = await this.handle.read(this.buffer, 0, this.buffer.length, this.position)
      if (bytesRead === 0) {
        this.ended = true
        const tail = this.decoder.end()
        return tail.length > 0 ? tail : null
      }
      this.position += bytesRead
      const text = this.decoder.write(this.buffer.subarray(0, bytesRead))
      if (text.length > 0) {
        return this.stripBom(text)
      }
    }
    return null
  }

  private stripBom(text: string): string {
    if (!this.first) return text
    this.first = false
    return text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text
  }
}

export class LineReader {
  private chunk = ''
  private index = 0
  private pending: string[] = []
  private pendingBytes = 0
  private oversized = false
  private ended = false

  constructor(
    private readonly source: TextSource,
    private readonly tracker: ProgressTracker,
    private readonly maxLineSize: number
  ) {}

  /**
   * Next line without its terminator (`\n` or `\r\n`), or null at end of
   * input. A line longer than maxLineSize is skipped whole and reported as
   * a size_limit error, so the following call starts on the next line.
   */
  async next(): Promise<string | null> {
    while (true) {
      if (this.index >= this.chunk.length) {
        if (this.ended) return null
        const text = await this.source.read()
        if (text === null) {
          this.ended = true
          if (this.pendingBytes === 0 && !this.oversized) return null
          return this.takeLine(0)
        }
        this.chunk = text
        this.index = 0
      }

      const newline = this.chunk.indexOf('\n', this.index)
      const end = newline === -1 ? this.chunk.length : newline
      this.append(this.chunk.slice(this.index, end))
      this.index = end

      if (newline !== -1) {
        this.index = newline + 1
        return this.takeLine(1)
      }
    }
  }

  private append(piece: string): void {
    if (piece.length === 0) return
    this.pendingBytes += byteLength(piece)
    if (this.pendingBytes > this.maxLineSize) {
      this.oversized = true
      this.pending = []
    }
    if (!this.oversized) {
      this.pending.push(piece)
    }
  }

  private takeLine(terminatorBytes: number): string {
    const size = this.pendingBytes
    const oversized = this.oversized
    const text = this.pending.join('')
    this.tracker.addBytes(size + terminatorBytes)
    this.pending = []
    this.pendingBytes = 0
    this.oversized = false

    if (oversized) {
      throw bufferOverflow(this.maxLineSize, size)
    }
    return text.endsWith('\r') ? text.slice(0, -1) : text
  }
}

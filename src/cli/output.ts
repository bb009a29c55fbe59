/**
 * Message Output
 *
 * JSON Lines: one canonical message per line. Ids are written as decimal
 * strings since Discord snowflakes don't fit in a JSON number; dates as
 * ISO 8601.
 *
 * CSV: semicolon-delimited, Sender and Content always, other columns on
 * request. Dates as `YYYY-MM-DD HH:MM:SS` UTC.
 */

import { once } from 'node:events'
import { createWriteStream } from 'node:fs'
import { dirname } from 'node:path'
import type { Writable } from 'node:stream'
import { finished } from 'node:stream/promises'
import { stringify } from 'csv-stringify/sync'
import type { CanonicalMessage } from '../types/index.js'
import { ensureDir } from './io.js'

export interface JsonMessage {
  readonly sender: string
  readonly content: string
  readonly timestamp?: string
  readonly id?: string
  readonly replyTo?: string
  readonly edited?: string
}

export function toJsonMessage(message: CanonicalMessage): JsonMessage {
  return {
    sender: message.sender,
    content: message.content,
    ...(message.timestamp && { timestamp: message.timestamp.toISOString() }),
    ...(message.id !== undefined && { id: message.id.toString() }),
    ...(message.replyTo !== undefined && { replyTo: message.replyTo.toString() }),
    ...(message.edited && { edited: message.edited.toISOString() })
  }
}

export function formatJsonLine(message: CanonicalMessage): string {
  return `${JSON.stringify(toJsonMessage(message))}\n`
}

export interface CsvColumns {
  readonly ids?: boolean | undefined
  readonly timestamps?: boolean | undefined
  readonly replies?: boolean | undefined
  readonly edited?: boolean | undefined
}

const CSV_DELIMITER = ';'

function formatCsvDate(date: Date | undefined): string {
  return date ? date.toISOString().slice(0, 19).replace('T', ' ') : ''
}

export function csvHeader(columns: CsvColumns): string[] {
  return [
    ...(columns.ids ? ['ID'] : []),
    ...(columns.timestamps ? ['Timestamp'] : []),
    'Sender',
    'Content',
    ...(columns.replies ? ['ReplyTo'] : []),
    ...(columns.edited ? ['Edited'] : [])
  ]
}

export function csvRow(message: CanonicalMessage, columns: CsvColumns): string[] {
  return [
    ...(columns.ids ? [message.id?.toString() ?? ''] : []),
    ...(columns.timestamps ? [formatCsvDate(message.timestamp)] : []),
    message.sender,
    message.content,
    ...(columns.replies ? [message.replyTo?.toString() ?? ''] : []),
    ...(columns.edited ? [formatCsvDate(message.edited)] : [])
  ]
}

export function formatCsvLine(fields: readonly string[]): string {
  return stringify([fields], { delimiter: CSV_DELIMITER })
}

export type OutputFormat =
  | { readonly kind: 'jsonl' }
  | { readonly kind: 'csv'; readonly columns: CsvColumns }

export interface MessageWriter {
  write(message: CanonicalMessage): Promise<void>
  close(): Promise<void>
}

async function openTarget(target: string): Promise<Writable> {
  if (target === 'stdout') return process.stdout
  await ensureDir(dirname(target))
  const file = createWriteStream(target, { encoding: 'utf8' })
  // Rejects with the open error (EACCES, EISDIR, ...)
  await once(file, 'open')
  return file
}

/**
 * Writer for `target`: 'stdout' or a file path (parent directories are
 * created). Waits for the stream to drain when its buffer is full. A write
 * error is rethrown from the next `write` or `close`.
 */
export async function openMessageWriter(
  target: string,
  format: OutputFormat = { kind: 'jsonl' }
): Promise<MessageWriter> {
  const stream = await openTarget(target)
  const toStdout = stream === process.stdout

  let failure: Error | null = null
  const onError = (error: Error) => {
    failure = error
  }
  stream.on('error', onError)

  const send = async (text: string) => {
    if (failure) throw failure
    if (!stream.write(text)) {
      await once(stream, 'drain')
    }
  }

  if (format.kind === 'csv') {
    await send(formatCsvLine(csvHeader(format.columns)))
  }

  const formatLine = (message: CanonicalMessage) =>
    format.kind === 'csv' ? formatCsvLine(csvRow(message, format.columns)) : formatJsonLine(message)

  return {
    async write(message) {
      await send(formatLine(message))
    },
    async close() {
      if (toStdout) {
        stream.off('error', onError)
      } else {
        stream.end()
        await finished(stream)
      }
      if (failure) throw failure
    }
  }
}

/**
 * Consecutive Message Merging
 *
 * Joins runs of messages from the same sender into one entry, content
 * separated by newlines. The merged entry keeps the first message's
 * timestamp, id, reply link and edit time.
 */

import { byteLength } from '../streaming/reader.js'
import type { CanonicalMessage } from '../types/index.js'

interface PendingRun {
  readonly first: CanonicalMessage
  readonly parts: string[]
  size: number
}

/**
 * Streaming merger: push messages in order, get back each run once the next
 * sender shows up. A run that would grow past `maxSize` UTF-8 bytes is
 * closed and a new one started with the same sender.
 */
export class ConsecutiveMerger {
  private pending: PendingRun | null = null

  constructor(private readonly maxSize = Number.POSITIVE_INFINITY) {}

  push(message: CanonicalMessage): CanonicalMessage | null {
    const run = this.pending
    if (run && run.first.sender === message.sender) {
      const added = 1 + byteLength(message.content)
      if (run.size + added <= this.maxSize) {
        run.parts.push(message.content)
        run.size += added
        return null
      }
    }

    this.pending = { first: message, parts: [message.content], size: byteLength(message.content) }
    return run ? toMessage(run) : null
  }

  flush(): CanonicalMessage | null {
    const run = this.pending
    this.pending = null
    return run ? toMessage(run) : null
  }
}

function toMessage(run: PendingRun): CanonicalMessage {
  if (run.parts.length === 1) return run.first
  return { ...run.first, content: run.parts.join('\n') }
}

export function mergeConsecutive(messages: readonly CanonicalMessage[]): CanonicalMessage[] {
  const merger = new ConsecutiveMerger()
  const merged: CanonicalMessage[] = []
  for (const message of messages) {
    const done = merger.push(message)
    if (done) merged.push(done)
  }
  const last = merger.flush()
  if (last) merged.push(last)
  return merged
}

/** Share of entries saved by merging, as a percentage. 0 for no input. */
export function reductionPercent(before: number, after: number): number {
  if (before === 0) return 0
  return (1 - after / before) * 100
}

/**
 * Parse Statistics
 *
 * Running totals over a message stream, kept in constant memory apart from
 * the set of distinct senders.
 *
 * This is an orchestrator concern (CLI), not core library.
 */

import type { CanonicalMessage } from '../types/index.js'

export interface ParseStats {
  readonly messageCount: number
  /** Senders in order of first appearance */
  readonly senders: readonly string[]
  readonly dateRange: { readonly start: Date; readonly end: Date } | undefined
  /** Records skipped or reported as malformed */
  readonly invalidCount: number
}

export class StatsCollector {
  private messageCount = 0
  private invalidCount = 0
  private readonly senders = new Set<string>()
  private earliest: Date | undefined
  private latest: Date | undefined

  add(message: CanonicalMessage): void {
    this.messageCount++
    this.senders.add(message.sender)

    const { timestamp } = message
    if (timestamp) {
      if (!this.earliest || timestamp < this.earliest) this.earliest = timestamp
      if (!this.latest || timestamp > this.latest) this.latest = timestamp
    }
  }

  addInvalid(): void {
    this.invalidCount++
  }

  get count(): number {
    return this.messageCount
  }

  result(): ParseStats {
    return {
      messageCount: this.messageCount,
      senders: [...this.senders],
      dateRange:
        this.earliest && this.latest ? { start: this.earliest, end: this.latest } : undefined,
      invalidCount: this.invalidCount
    }
  }
}

/**
 * Format participant list, showing top 5 + "and N others" if more.
 */
export function formatParticipants(senders: readonly string[]): string {
  if (senders.length <= 5) {
    return senders.join(', ')
  }
  const top5 = senders.slice(0, 5).join(', ')
  const remaining = senders.length - 5
  return `${top5}, and ${remaining} others`
}

export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0] ?? date.toISOString()
}

/**
 * Message Filters
 *
 * Date-range and sender filters applied to messages as they come off a
 * stream. All active filters must match. A message without a timestamp
 * never passes a date filter.
 */

import { parseWithTemplate } from '../parser/timestamp.js'
import type { CanonicalMessage } from '../types/index.js'

export interface FilterOptions {
  /** Keep messages on or after this day (YYYY-MM-DD, UTC) */
  readonly after?: string | undefined
  /** Keep messages on or before this day (YYYY-MM-DD, UTC) */
  readonly before?: string | undefined
  /** Keep messages from this sender, ignoring case */
  readonly from?: string | undefined
}

export interface MessageFilter {
  readonly after?: Date | undefined
  readonly before?: Date | undefined
  readonly from?: string | undefined
}

const END_OF_DAY_MS = (23 * 3600 + 59 * 60 + 59) * 1000

/**
 * Read a YYYY-MM-DD day as its first second (`start`) or last second
 * (`end`) in UTC.
 */
export function parseFilterDate(value: string, edge: 'start' | 'end'): Date {
  const day = parseWithTemplate(value.trim(), '%Y-%m-%d')
  if (!day) {
    throw new Error(`Invalid date '${value}'. Use YYYY-MM-DD.`)
  }
  return edge === 'start' ? day : new Date(day.getTime() + END_OF_DAY_MS)
}

export function createFilter(options: FilterOptions): MessageFilter {
  const after = options.after === undefined ? undefined : parseFilterDate(options.after, 'start')
  const before = options.before === undefined ? undefined : parseFilterDate(options.before, 'end')
  if (after && before && after > before) {
    throw new Error(`Start date ${options.after} is after end date ${options.before}`)
  }
  return { after, before, from: options.from }
}

export function isFilterActive(filter: MessageFilter): boolean {
  return filter.after !== undefined || filter.before !== undefined || filter.from !== undefined
}

export function matchesFilter(message: CanonicalMessage, filter: MessageFilter): boolean {
  if (filter.from !== undefined && message.sender.toLowerCase() !== filter.from.toLowerCase()) {
    return false
  }

  if (filter.after || filter.before) {
    const { timestamp } = message
    if (!timestamp) return false
    if (filter.after && timestamp < filter.after) return false
    if (filter.before && timestamp > filter.before) return false
  }

  return true
}

export function filterMessages(
  messages: readonly CanonicalMessage[],
  filter: MessageFilter
): CanonicalMessage[] {
  if (!isFilterActive(filter)) return [...messages]
  return messages.filter((message) => matchesFilter(message, filter))
}

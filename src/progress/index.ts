/**
 * Progress Tracking
 *
 * Byte and item accounting for a running stream. Pure bookkeeping: the
 * tracker never touches the file itself.
 */

import type { ProgressSnapshot } from '../types/index.js'

/**
 * Percentage of bytes processed. Undefined when the total is unknown,
 * 100 for an empty input, and never above 100.
 */
export function percentage(bytesProcessed: number, totalBytes: number | undefined): number | undefined {
  if (totalBytes === undefined) return undefined
  if (totalBytes === 0) return 100
  return Math.min(100, (bytesProcessed / totalBytes) * 100)
}

export function isComplete(progress: ProgressSnapshot): boolean {
  return progress.totalBytes !== undefined && progress.bytesProcessed >= progress.totalBytes
}

export function remainingBytes(progress: ProgressSnapshot): number | undefined {
  if (progress.totalBytes === undefined) return undefined
  return Math.max(0, progress.totalBytes - progress.bytesProcessed)
}

export function itemsPercentage(progress: ProgressSnapshot, totalItems: number): number {
  if (totalItems === 0) return 100
  return Math.min(100, (progress.itemsProcessed / totalItems) * 100)
}

export class ProgressTracker {
  private bytes = 0
  private items = 0

  constructor(private readonly totalBytes?: number) {}

  /** Record bytes consumed from the input. Negative amounts are ignored. */
  addBytes(count: number): void {
    if (count > 0) {
      this.bytes += count
    }
  }

  addItem(): void {
    this.items++
  }

  /** Mark the whole input as consumed (trailing bytes after the last record). */
  complete(): void {
    if (this.totalBytes !== undefined && this.bytes < this.totalBytes) {
      this.bytes = this.totalBytes
    }
  }

  get bytesProcessed(): number {
    return this.bytes
  }

  get itemsProcessed(): number {
    return this.items
  }

  snapshot(): ProgressSnapshot {
    return {
      bytesProcessed: this.bytes,
      totalBytes: this.totalBytes,
      itemsProcessed: this.items,
      percentage: percentage(this.bytes, this.totalBytes)
    }
  }
}

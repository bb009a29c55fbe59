/**
 * CLI File I/O
 */

import { mkdir } from 'node:fs/promises'

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Detect Command
 *
 * Report which platform an export came from, and for WhatsApp the date
 * layout its lines use.
 */

import { basename } from 'node:path'
import {
  DETECTION_SAMPLE_SIZE,
  detectFormat,
  detectPlatform,
  readHead,
  scoreFormats
} from '../../parser/index.js'
import { displayName } from '../../parser/platform.js'
import type { CLIArgs } from '../args.js'
import type { Logger } from '../logger.js'

export async function cmdDetect(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }

  const platform = await detectPlatform(args.input)
  if (!platform) {
    throw new Error(`Could not detect the platform of ${basename(args.input)}`)
  }
  logger.success(`${basename(args.input)}: ${displayName(platform)} (${platform})`)

  if (platform !== 'whatsapp') return

  const lines = (await readHead(args.input))
    .split('\n')
    .map((line) => line.replace(/\r$/, ''))
    .filter((line) => line.trim().length > 0)
    .slice(0, DETECTION_SAMPLE_SIZE)

  const format = detectFormat(lines)
  if (!format) {
    logger.warn('No WhatsApp line layout matched the first lines of the file')
    return
  }
  logger.success(`Line layout: ${format.name}`)

  for (const score of scoreFormats(lines)) {
    logger.verbose(`${score.format.name}: ${score.matches} matched, ${score.parsed} parsed`)
  }
}

#!/usr/bin/env node
/**
 * chat-ingest CLI
 *
 * Local front end for the streaming library.
 * Handles platform resolution, settings, progress reporting, and message output.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args.js'
import { cmdConfig } from './cli/commands/config.js'
import { cmdDetect } from './cli/commands/detect.js'
import { cmdParse } from './cli/commands/parse.js'
import { createLogger } from './cli/logger.js'

async function main(): Promise<void> {
  const args = parseCliArgs()
  // Messages on stdout: keep every log line off it
  const logger = createLogger(
    args.quiet,
    args.verbose,
    args.jsonOutput === 'stdout' || args.csvOutput === 'stdout'
  )

  try {
    switch (args.command) {
      case 'parse':
        await cmdParse(args, logger)
        break

      case 'detect':
        await cmdDetect(args, logger)
        break

      case 'config':
        await cmdConfig(args, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'chat-ingest --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()

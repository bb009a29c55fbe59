/**
 * Parse Command
 *
 * Stream a chat export, report what it contains, and optionally write the
 * messages out as JSON Lines or CSV after filtering and merging.
 */

import { basename } from 'node:path'
import { createFilter, isFilterActive, matchesFilter } from '../../core/filter.js'
import { ConsecutiveMerger, reductionPercent } from '../../core/merge.js'
import { detectPlatform } from '../../parser/index.js'
import { displayName, parsePlatform } from '../../parser/platform.js'
import { openMessageStream } from '../../streaming/stream.js'
import type { CanonicalMessage, Platform, StreamOptions } from '../../types/index.js'
import { VERSION } from '../../index.js'
import type { CLIArgs } from '../args.js'
import { type Config, loadConfig } from '../config.js'
import type { Logger } from '../logger.js'
import { type MessageWriter, openMessageWriter } from '../output.js'
import { formatDate, formatParticipants, StatsCollector } from '../stats.js'

/**
 * Pick the platform: --platform, then detection, then the configured default.
 */
export async function resolvePlatform(
  input: string,
  requested: string | undefined,
  config: Config
): Promise<Platform> {
  if (requested) {
    const parsed = parsePlatform(requested)
    if (!parsed.ok) throw new Error(parsed.error)
    return parsed.value
  }

  const detected = await detectPlatform(input)
  if (detected) return detected

  if (config.defaultPlatform) {
    const fallback = parsePlatform(config.defaultPlatform)
    if (fallback.ok) return fallback.value
  }

  throw new Error(`Could not detect the platform of ${basename(input)}. Pass --platform <name>.`)
}

/**
 * Merge command-line flags over config file settings. Callbacks are added
 * by the caller.
 */
export function buildStreamOptions(args: CLIArgs, config: Config): StreamOptions {
  return {
    bufferSize: args.bufferSize ?? config.bufferSize,
    maxRecordSize: args.maxRecordSize ?? config.maxRecordSize,
    skipInvalid: args.strict ? false : config.skipInvalid,
    progressInterval: config.progressInterval,
    fixEncoding: config.fixEncoding,
    skipSystemMessages: config.skipSystemMessages,
    preferNickname: config.preferNickname,
    includeAttachments: config.includeAttachments
  }
}

/**
 * Open the --json and --csv writers that were asked for.
 */
export async function openWriters(args: CLIArgs): Promise<MessageWriter[]> {
  if (args.jsonOutput === 'stdout' && args.csvOutput === 'stdout') {
    throw new Error('Only one of --json and --csv can write to stdout')
  }
  const writers: MessageWriter[] = []
  try {
    if (args.jsonOutput) {
      writers.push(await openMessageWriter(args.jsonOutput))
    }
    if (args.csvOutput) {
      const columns = {
        ids: args.ids,
        timestamps: args.timestamps,
        replies: args.replies,
        edited: args.edited
      }
      writers.push(await openMessageWriter(args.csvOutput, { kind: 'csv', columns }))
    }
  } catch (error) {
    await closeWriters(writers)
    throw error
  }
  return writers
}

async function closeWriters(writers: readonly MessageWriter[]): Promise<void> {
  const results = await Promise.allSettled(writers.map((writer) => writer.close()))
  for (const result of results) {
    if (result.status === 'rejected') {
      const reason: unknown = result.reason
      throw reason
    }
  }
}

export async function cmdParse(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input) {
    throw new Error('No input file specified')
  }
  const filter = createFilter(args)

  logger.log(`\nchat-ingest v${VERSION}`)

  const config = (await loadConfig(args.configFile)) ?? {}
  const platform = await resolvePlatform(args.input, args.platform, config)
  logger.log(`\n📝 Parsing ${basename(args.input)} as ${displayName(platform)}...`)

  const stats = new StatsCollector()
  const writers = await openWriters(args)

  const stream = openMessageStream(args.input, platform, {
    ...buildStreamOptions(args, config),
    onProgress: (progress) => {
      if (progress.percentage !== undefined) {
        const pct = Math.floor(progress.percentage)
        logger.progress(`${progress.itemsProcessed.toLocaleString()} messages`, pct, 100)
      }
    },
    onSkip: (error) => {
      stats.addInvalid()
      logger.verbose(`Skipped record: ${error.message}`)
    }
  })

  const merger = args.merge ? new ConsecutiveMerger(stream.config.maxRecordSize) : null
  let kept = 0
  let entries = 0
  const emit = async (message: CanonicalMessage) => {
    entries++
    for (const writer of writers) {
      await writer.write(message)
    }
  }

  try {
    for await (const item of stream) {
      if (!item.ok) {
        if (item.error.fatal) throw item.error
        stats.addInvalid()
        logger.warn(item.error.message)
        continue
      }
      stats.add(item.value)
      if (!matchesFilter(item.value, filter)) continue
      kept++
      const merged = merger ? merger.push(item.value) : item.value
      if (merged) await emit(merged)
    }
    const last = merger?.flush()
    if (last) await emit(last)
  } finally {
    await stream.close()
    await closeWriters(writers)
  }

  const result = stats.result()
  if (result.messageCount === 0) {
    throw new Error('No messages found - invalid or empty export')
  }

  logger.success(`Valid ${displayName(platform)} export`)
  logger.success(`${result.messageCount.toLocaleString()} messages`)
  if (result.dateRange) {
    logger.success(`Date range: ${formatDate(result.dateRange.start)} to ${formatDate(result.dateRange.end)}`)
  }
  logger.success(
    `${result.senders.length} participant${result.senders.length !== 1 ? 's' : ''}: ${formatParticipants(result.senders)}`
  )
  if (result.invalidCount > 0) {
    const verb = args.strict ? 'reported' : 'skipped'
    logger.log(`  ${result.invalidCount.toLocaleString()} malformed record${result.invalidCount !== 1 ? 's' : ''} ${verb}`)
  }

  if (isFilterActive(filter)) {
    logger.log(`  ${kept.toLocaleString()} message${kept !== 1 ? 's' : ''} after filtering`)
  }
  if (merger) {
    logger.log(
      `  Merged into ${entries.toLocaleString()} entr${entries !== 1 ? 'ies' : 'y'} (${reductionPercent(kept, entries).toFixed(1)}% reduction)`
    )
  }

  for (const target of [args.jsonOutput, args.csvOutput]) {
    if (target && target !== 'stdout') {
      logger.success(`Saved to ${target}`)
    }
  }
}

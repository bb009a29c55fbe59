/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, InvalidArgumentError } from 'commander'
import { parseFilterDate } from '../core/filter.js'
import { VERSION } from '../index.js'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config.js'

export interface CLIArgs {
  command: string
  input: string
  /** Platform name or alias from --platform */
  platform: string | undefined
  /** 'stdout', a file path, or undefined when --json wasn't given */
  jsonOutput: string | undefined
  /** 'stdout', a file path, or undefined when --csv wasn't given */
  csvOutput: string | undefined
  /** Keep messages on or after this day (YYYY-MM-DD) */
  after: string | undefined
  /** Keep messages on or before this day (YYYY-MM-DD) */
  before: string | undefined
  /** Keep messages from this sender */
  from: string | undefined
  /** Join consecutive messages from one sender (off with --no-merge) */
  merge: boolean
  /** CSV columns beyond Sender and Content */
  timestamps: boolean
  replies: boolean
  ids: boolean
  edited: boolean
  /** Report malformed records instead of skipping them */
  strict: boolean
  maxRecordSize: number | undefined
  bufferSize: number | undefined
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
  /** For config command: action (list, set, unset) */
  configAction: 'list' | 'set' | 'unset'
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Stream chat exports into a single normalized message format.

Supported formats:
  • Telegram (result.json)
  • WhatsApp (.txt export, US and European date layouts)
  • Instagram (message_N.json)
  • Discord (DiscordChatExporter .json or .jsonl)

Examples:
  $ chat-ingest parse result.json
  $ chat-ingest parse "WhatsApp Chat.txt" --json messages.jsonl
  $ chat-ingest parse export.jsonl --platform dc --strict
  $ chat-ingest parse result.json --csv chat.csv -t --after 2024-01-01
  $ chat-ingest detect message_1.json`

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024
}

/**
 * Parse a byte size such as "65536", "64k" or "10m" (binary units).
 */
export function parseByteSize(value: string): number {
  const match = /^(\d+)\s*([kmg]?)i?b?$/i.exec(value.trim())
  const unit = SIZE_UNITS[match?.[2]?.toLowerCase() ?? '']
  if (!match?.[1] || unit === undefined) {
    throw new InvalidArgumentError(`Expected a size in bytes (e.g. 65536, 64k, 10m), got "${value}"`)
  }
  const bytes = Number.parseInt(match[1], 10) * unit
  if (bytes < 1) {
    throw new InvalidArgumentError('Size must be at least 1 byte')
  }
  return bytes
}

/**
 * Check a YYYY-MM-DD date option, keeping it as written.
 */
export function parseDateArgument(value: string): string {
  try {
    parseFilterDate(value, 'start')
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error))
  }
  return value
}

function createProgram(): Command {
  const program = new Command()
    .name('chat-ingest')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set CHAT_INGEST_CONFIG)')

  // ============ PARSE ============
  program
    .command('parse')
    .description('Stream a chat export: count messages, list participants, optionally write JSON Lines or CSV')
    .argument('<input>', 'Chat export file (.json, .jsonl or .txt)')
    .option('-p, --platform <name>', 'Platform: telegram (tg), whatsapp (wa), instagram (ig), discord (dc)')
    .option('--json [file]', 'Write messages as JSON Lines (to file if specified, otherwise stdout)')
    .option('--csv [file]', 'Write messages as CSV (to file if specified, otherwise stdout)')
    .option('--after <date>', 'Only messages on or after this day (YYYY-MM-DD)', parseDateArgument)
    .option('--before <date>', 'Only messages on or before this day (YYYY-MM-DD)', parseDateArgument)
    .option('--from <sender>', 'Only messages from this sender (case-insensitive)')
    .option('--no-merge', 'Keep consecutive messages from one sender separate')
    .option('-t, --timestamps', 'CSV: add a Timestamp column')
    .option('-r, --replies', 'CSV: add a ReplyTo column')
    .option('--ids', 'CSV: add an ID column')
    .option('--edited', 'CSV: add an Edited column')
    .option('--strict', 'Report malformed records instead of skipping them')
    .option('--max-record-size <bytes>', 'Largest single record (e.g. 10m)', parseByteSize)
    .option('--buffer-size <bytes>', 'Read buffer size (e.g. 64k)', parseByteSize)

  // ============ DETECT ============
  program
    .command('detect')
    .description('Detect which platform (and WhatsApp date layout) an export comes from')
    .argument('<input>', 'Chat export file')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), set, unset')
    .argument('[key]', 'Config key to set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  chat-ingest config                              List current settings
  chat-ingest config set maxRecordSize 20971520   Accept records up to 20 MiB
  chat-ingest config set skipSystemMessages false Keep WhatsApp notices
  chat-ingest config unset bufferSize             Back to the default buffer`
    )

  return program
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/** `--flag [file]`: true means stdout */
function outputTarget(value: unknown): string | undefined {
  return value === true ? 'stdout' : optionalString(value)
}

function buildCLIArgs(commandName: string, input: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    input,
    platform: optionalString(opts.platform),
    jsonOutput: outputTarget(opts.json),
    csvOutput: outputTarget(opts.csv),
    after: optionalString(opts.after),
    before: optionalString(opts.before),
    from: optionalString(opts.from),
    merge: opts.merge !== false,
    timestamps: opts.timestamps === true,
    replies: opts.replies === true,
    ids: opts.ids === true,
    edited: opts.edited === true,
    strict: opts.strict === true,
    maxRecordSize: optionalNumber(opts.maxRecordSize),
    bufferSize: optionalNumber(opts.bufferSize),
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: optionalString(opts.configFile),
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): 'list' | 'set' | 'unset' {
  if (action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

function buildConfigCLIArgs(
  action: string | undefined,
  key: string | undefined,
  value: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  const base = buildCLIArgs('config', '', opts)
  return {
    ...base,
    configAction: parseConfigAction(action),
    configKey: key,
    configValue: value
  }
}

/**
 * Attach action handlers that capture the parsed args.
 * optsWithGlobals() includes global options from the parent program.
 */
function captureArgs(program: Command, capture: (args: CLIArgs) => void): void {
  for (const cmd of program.commands) {
    if (cmd.name() === 'config') {
      cmd.action((action?: string, key?: string, value?: string) => {
        capture(buildConfigCLIArgs(action, key, value, cmd.optsWithGlobals()))
      })
    } else {
      cmd.action((input: string) => {
        capture(buildCLIArgs(cmd.name(), input, cmd.optsWithGlobals()))
      })
    }
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  const captured: { args?: CLIArgs } = {}
  captureArgs(program, (args) => {
    captured.args = args
  })

  program.parse()

  return captured.args ?? program.help()
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    // Subcommands were created before this point, so they need it too
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => {}, writeErr: () => {} })
    }
  }

  const captured: { args?: CLIArgs } = {}
  captureArgs(program, (args) => {
    captured.args = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help, version and invalid input
    if (exitOnHelp) throw error
  }

  return captured.args ?? buildCLIArgs('help', '', {})
}

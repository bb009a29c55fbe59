/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/chat-ingest/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or CHAT_INGEST_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { PLATFORM_NAMES, parsePlatform } from '../parser/platform.js'

const positiveInt = z.number().int().positive()

/**
 * All persistable CLI settings. Flags given on the command line win over
 * these; these win over the built-in defaults.
 */
export const ConfigSchema = z.object({
  /** Platform used when detection finds nothing */
  defaultPlatform: z
    .string()
    .refine((name) => parsePlatform(name).ok, 'unknown platform')
    .optional(),
  /** Read buffer size in bytes */
  bufferSize: positiveInt.optional(),
  /** Largest record accepted, in bytes */
  maxRecordSize: positiveInt.optional(),
  /** Drop bad records instead of reporting them */
  skipInvalid: z.boolean().optional(),
  /** Messages between progress updates */
  progressInterval: positiveInt.optional(),
  /** Repair Instagram mojibake */
  fixEncoding: z.boolean().optional(),
  /** Drop WhatsApp system notices */
  skipSystemMessages: z.boolean().optional(),
  /** Use Discord server nicknames */
  preferNickname: z.boolean().optional(),
  /** Tag Discord attachments and stickers */
  includeAttachments: z.boolean().optional(),
  /** When settings were last updated */
  updatedAt: z.string().optional()
})

export type Config = z.infer<typeof ConfigSchema>

/** Valid config keys for type-safe access */
export type ConfigKey = keyof Omit<Config, 'updatedAt'>

export type ConfigValue = string | boolean | number

/** Config keys that accept string values */
const STRING_KEYS: ConfigKey[] = ['defaultPlatform']
/** Config keys that accept boolean values */
const BOOLEAN_KEYS: ConfigKey[] = [
  'skipInvalid',
  // Dialect options
  'fixEncoding',
  'skipSystemMessages',
  'preferNickname',
  'includeAttachments'
]
/** Config keys that accept number values */
const NUMBER_KEYS: ConfigKey[] = ['bufferSize', 'maxRecordSize', 'progressInterval']

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  defaultPlatform: `Platform to assume when detection fails (${PLATFORM_NAMES.join(', ')})`,
  bufferSize: 'Read buffer size in bytes (default: 65536)',
  maxRecordSize: 'Largest single record in bytes (default: 10485760)',
  skipInvalid: 'Skip malformed records instead of reporting them (default: true)',
  progressInterval: 'Messages between progress updates (default: 10000)',
  fixEncoding: 'Repair mojibake in Instagram exports (default: true)',
  skipSystemMessages: 'Drop WhatsApp system notices (default: true)',
  preferNickname: 'Use Discord server nicknames as sender (default: true)',
  includeAttachments: 'Append Discord attachment and sticker tags (default: true)'
}

/**
 * Get the type of a config key (derived from key arrays).
 * Returns user-friendly type names for CLI help.
 */
export function getConfigType(key: ConfigKey): string {
  if (BOOLEAN_KEYS.includes(key)) return 'boolean'
  if (NUMBER_KEYS.includes(key)) return 'number'
  return 'string'
}

export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for chat-ingest.
 * Uses ~/.config/chat-ingest on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'chat-ingest')
}

/**
 * Get the config file path.
 * Priority: configFile arg > CHAT_INGEST_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.CHAT_INGEST_CONFIG) {
    return process.env.CHAT_INGEST_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist or isn't JSON. Throws when the JSON
 * holds a setting of the wrong type.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }

  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'))
  } catch {
    return null
  }

  const result = ConfigSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid settings'
    throw new Error(`Invalid config file ${path} (${where})`)
  }
  return result.data
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the appropriate type for a config key.
 * Throws on a number that is not a positive integer or an unknown platform.
 */
export function parseConfigValue(key: ConfigKey, value: string): ConfigValue {
  if (BOOLEAN_KEYS.includes(key)) {
    return value === 'true' || value === '1' || value === 'yes'
  }
  if (NUMBER_KEYS.includes(key)) {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`Invalid value for ${key}: ${value} (expected a positive integer)`)
    }
    return parsed
  }
  if (key === 'defaultPlatform') {
    const platform = parsePlatform(value)
    if (!platform.ok) throw new Error(platform.error)
    return platform.value
  }
  return value
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return String(value)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...BOOLEAN_KEYS, ...NUMBER_KEYS].sort()
}

const VALID_KEYS: readonly string[] = getValidConfigKeys()

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return VALID_KEYS.includes(key)
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  await saveConfig(ConfigSchema.parse({ ...config, [key]: value }), configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config: Config = { ...((await loadConfig(configFile)) ?? {}) }
  delete config[key]
  await saveConfig(config, configFile)
}

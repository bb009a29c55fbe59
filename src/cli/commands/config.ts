/**
 * Config Command
 *
 * Manage persistent CLI settings stored in ~/.config/chat-ingest/config.json.
 * Supports list, set, and unset operations.
 */

import type { CLIArgs } from '../args.js'
import {
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config.js'
import type { Logger } from '../logger.js'

/**
 * Execute the config command.
 */
export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const configFile = args.configFile

  switch (args.configAction) {
    case 'list':
      await listConfig(configFile, logger)
      break
    case 'set':
      await setConfig(args.configKey, args.configValue, configFile, logger)
      break
    case 'unset':
      await unsetConfig(args.configKey, configFile, logger)
      break
  }
}

async function listConfig(configFile: string | undefined, logger: Logger): Promise<void> {
  const config = await loadConfig(configFile)
  const path = getConfigPath(configFile)

  logger.log(`\nConfig file: ${path}\n`)

  const setKeys = getValidConfigKeys().filter((key) => config?.[key] !== undefined)
  if (setKeys.length === 0) {
    logger.log('No settings configured. Run `chat-ingest config --help` for available settings.')
  } else {
    for (const key of setKeys) {
      logger.log(`  ${key}: ${formatConfigValue(config?.[key])}`)
    }
  }
}

function validateConfigKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new Error(`Missing key. Usage: ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new Error(`Invalid key: ${key}. Valid keys: ${getValidConfigKeys().join(', ')}`)
  }
  return key
}

async function setConfig(
  key: string | undefined,
  value: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'chat-ingest config set <key> <value>')
  if (value === undefined) {
    throw new Error('Missing value. Usage: chat-ingest config set <key> <value>')
  }
  const parsedValue = parseConfigValue(validKey, value)
  await setConfigValue(validKey, parsedValue, configFile)
  logger.log(`Set ${validKey}=${formatConfigValue(parsedValue)}`)
}

async function unsetConfig(
  key: string | undefined,
  configFile: string | undefined,
  logger: Logger
): Promise<void> {
  const validKey = validateConfigKey(key, 'chat-ingest config unset <key>')
  await unsetConfigValue(validKey, configFile)
  logger.log(`Unset ${validKey}`)
}

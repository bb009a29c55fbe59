/**
 * Tests for CLI Configuration
 */

import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { readFile, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  formatConfigValue,
  getConfigDescription,
  getConfigPath,
  getConfigType,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  saveConfig,
  setConfigValue,
  unsetConfigValue
} from './config.js'

describe('config', () => {
  let tempDir: string
  let configPath: string
  let originalEnv: string | undefined

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'chat-ingest-config-test-'))
    configPath = join(tempDir, 'config.json')
    originalEnv = process.env.CHAT_INGEST_CONFIG
    delete process.env.CHAT_INGEST_CONFIG
  })

  afterEach(() => {
    if (tempDir && existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
    if (originalEnv !== undefined) {
      process.env.CHAT_INGEST_CONFIG = originalEnv
    } else {
      delete process.env.CHAT_INGEST_CONFIG
    }
  })

  describe('getConfigPath', () => {
    it('returns explicit config file path when provided', () => {
      expect(getConfigPath('/custom/path/config.json')).toBe('/custom/path/config.json')
    })

    it('returns env var path when set', () => {
      process.env.CHAT_INGEST_CONFIG = '/env/config.json'
      expect(getConfigPath()).toBe('/env/config.json')
    })

    it('returns default XDG path when no override', () => {
      const path = getConfigPath()
      expect(path).toContain(join('.config', 'chat-ingest', 'config.json'))
    })

    it('explicit path takes precedence over env var', () => {
      process.env.CHAT_INGEST_CONFIG = '/env/config.json'
      expect(getConfigPath('/explicit/config.json')).toBe('/explicit/config.json')
    })
  })

  describe('loadConfig', () => {
    it('returns null for non-existent file', async () => {
      const config = await loadConfig(configPath)
      expect(config).toBeNull()
    })

    it('loads valid config file', async () => {
      await writeFile(configPath, JSON.stringify({ defaultPlatform: 'telegram' }))
      const config = await loadConfig(configPath)
      expect(config).toEqual({ defaultPlatform: 'telegram' })
    })

    it('returns null for invalid JSON', async () => {
      await writeFile(configPath, 'not valid json')
      const config = await loadConfig(configPath)
      expect(config).toBeNull()
    })

    it('loads all config fields', async () => {
      const fullConfig = {
        defaultPlatform: 'discord',
        bufferSize: 262144,
        maxRecordSize: 1048576,
        skipInvalid: false,
        progressInterval: 500,
        fixEncoding: true,
        skipSystemMessages: false,
        preferNickname: false,
        includeAttachments: true,
        updatedAt: '2025-01-01T00:00:00.000Z'
      }
      await writeFile(configPath, JSON.stringify(fullConfig))
      const config = await loadConfig(configPath)
      expect(config).toEqual(fullConfig)
    })

    it('rejects a setting of the wrong type', async () => {
      await writeFile(configPath, JSON.stringify({ bufferSize: 'big' }))
      await expect(loadConfig(configPath)).rejects.toThrow(/bufferSize/)
    })

    it('rejects an unknown default platform', async () => {
      await writeFile(configPath, JSON.stringify({ defaultPlatform: 'myspace' }))
      await expect(loadConfig(configPath)).rejects.toThrow('unknown platform')
    })
  })

  describe('saveConfig', () => {
    it('saves config to file', async () => {
      await saveConfig({ defaultPlatform: 'whatsapp' }, configPath)
      const content = await readFile(configPath, 'utf-8')
      const saved = JSON.parse(content)
      expect(saved.defaultPlatform).toBe('whatsapp')
      expect(saved.updatedAt).toBeDefined()
    })

    it('creates parent directories', async () => {
      const nestedPath = join(tempDir, 'nested', 'dir', 'config.json')
      await saveConfig({ bufferSize: 4096 }, nestedPath)
      expect(existsSync(nestedPath)).toBe(true)
    })
  })

  describe('setConfigValue', () => {
    it('sets a new value in empty config', async () => {
      await setConfigValue('maxRecordSize', 2048, configPath)
      const config = await loadConfig(configPath)
      expect(config?.maxRecordSize).toBe(2048)
    })

    it('preserves other values when setting', async () => {
      await saveConfig({ defaultPlatform: 'telegram', bufferSize: 4096 }, configPath)
      await setConfigValue('skipInvalid', false, configPath)
      const config = await loadConfig(configPath)
      expect(config?.defaultPlatform).toBe('telegram')
      expect(config?.bufferSize).toBe(4096)
      expect(config?.skipInvalid).toBe(false)
    })

    it('refuses a value of the wrong type', async () => {
      await expect(setConfigValue('bufferSize', 'large', configPath)).rejects.toThrow()
      expect(existsSync(configPath)).toBe(false)
    })
  })

  describe('unsetConfigValue', () => {
    it('removes a value from config', async () => {
      await saveConfig({ defaultPlatform: 'telegram', bufferSize: 4096 }, configPath)
      await unsetConfigValue('defaultPlatform', configPath)
      const config = await loadConfig(configPath)
      expect(config?.defaultPlatform).toBeUndefined()
      expect(config?.bufferSize).toBe(4096)
    })

    it('creates config file if it does not exist', async () => {
      await unsetConfigValue('bufferSize', configPath)
      expect(existsSync(configPath)).toBe(true)
    })
  })

  describe('parseConfigValue', () => {
    it('parses boolean values', () => {
      expect(parseConfigValue('skipInvalid', 'true')).toBe(true)
      expect(parseConfigValue('skipInvalid', '1')).toBe(true)
      expect(parseConfigValue('skipInvalid', 'yes')).toBe(true)
      expect(parseConfigValue('skipInvalid', 'false')).toBe(false)
      expect(parseConfigValue('skipInvalid', '0')).toBe(false)
      expect(parseConfigValue('skipInvalid', 'no')).toBe(false)
    })

    it('parses positive integers', () => {
      expect(parseConfigValue('bufferSize', '65536')).toBe(65536)
      expect(parseConfigValue('progressInterval', '1')).toBe(1)
    })

    it('rejects numbers that are not positive integers', () => {
      expect(() => parseConfigValue('bufferSize', '0')).toThrow(
        'Invalid value for bufferSize: 0 (expected a positive integer)'
      )
      expect(() => parseConfigValue('maxRecordSize', '1.5')).toThrow('expected a positive integer')
      expect(() => parseConfigValue('maxRecordSize', 'ten')).toThrow('expected a positive integer')
    })

    it('resolves platform aliases', () => {
      expect(parseConfigValue('defaultPlatform', 'tg')).toBe('telegram')
      expect(parseConfigValue('defaultPlatform', 'WA')).toBe('whatsapp')
    })

    it('rejects unknown platforms', () => {
      expect(() => parseConfigValue('defaultPlatform', 'myspace')).toThrow(
        "Unknown platform: 'myspace'"
      )
    })
  })

  describe('formatConfigValue', () => {
    it('formats booleans and numbers', () => {
      expect(formatConfigValue(true)).toBe('true')
      expect(formatConfigValue(false)).toBe('false')
      expect(formatConfigValue(4096)).toBe('4096')
      expect(formatConfigValue('discord')).toBe('discord')
    })
  })

  describe('config keys', () => {
    it('lists every key in alphabetical order', () => {
      expect(getValidConfigKeys()).toEqual([
        'bufferSize',
        'defaultPlatform',
        'fixEncoding',
        'includeAttachments',
        'maxRecordSize',
        'preferNickname',
        'progressInterval',
        'skipInvalid',
        'skipSystemMessages'
      ])
    })

    it('validates keys', () => {
      expect(isValidConfigKey('bufferSize')).toBe(true)
      expect(isValidConfigKey('updatedAt')).toBe(false)
      expect(isValidConfigKey('homeCountry')).toBe(false)
    })

    it('reports key types and descriptions', () => {
      expect(getConfigType('skipInvalid')).toBe('boolean')
      expect(getConfigType('bufferSize')).toBe('number')
      expect(getConfigType('defaultPlatform')).toBe('string')
      expect(getConfigDescription('bufferSize')).toBe('Read buffer size in bytes (default: 65536)')
    })
  })
})

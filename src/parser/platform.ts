/**
 * Platform Registry
 */

import type { Platform, Result } from '../types/index.js'
import { err, ok } from '../types/index.js'

export const PLATFORMS: readonly Platform[] = ['telegram', 'whatsapp', 'instagram', 'discord']

const ALIASES = new Map<string, Platform>([
  ['telegram', 'telegram'],
  ['tg', 'telegram'],
  ['whatsapp', 'whatsapp'],
  ['wa', 'whatsapp'],
  ['instagram', 'instagram'],
  ['ig', 'instagram'],
  ['discord', 'discord'],
  ['dc', 'discord']
])

/** Every accepted platform name, aliases included. */
export const PLATFORM_NAMES: readonly string[] = [...ALIASES.keys()]

const DISPLAY_NAMES: Record<Platform, string> = {
  telegram: 'Telegram',
  whatsapp: 'WhatsApp',
  instagram: 'Instagram',
  discord: 'Discord'
}

/** Parse a platform name or alias, case-insensitively. */
export function parsePlatform(name: string): Result<Platform, string> {
  const platform = ALIASES.get(name.trim().toLowerCase())
  if (platform === undefined) {
    return err(`Unknown platform: '${name}'. Expected one of: ${PLATFORM_NAMES.join(', ')}`)
  }
  return ok(platform)
}

export function displayName(platform: Platform): string {
  return DISPLAY_NAMES[platform]
}

export function defaultExtension(platform: Platform): 'txt' | 'json' {
  return platform === 'whatsapp' ? 'txt' : 'json'
}

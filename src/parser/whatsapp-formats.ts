/**
 * WhatsApp Line Grammars
 *
 * The five locale layouts WhatsApp uses for exported text, and detection of
 * which one a file is written in.
 *
 *   us                  [1/15/24, 10:30:45 AM] Sender: Message
 *   eu_dot_bracketed    [15.01.24, 10:30:45] Sender: Message
 *   eu_dot_no_bracket   15.01.24, 10:30 - Sender: Message
 *   eu_slash            15/01/2024, 10:30 - Sender: Message
 *   eu_slash_bracketed  [15/01/2024, 10:30:45] Sender: Message
 */

import type { WhatsAppFormatName } from '../types/index.js'
import { parseTimestamp } from './timestamp.js'

export interface FormatDescriptor {
  readonly name: WhatsAppFormatName
  /** Captures date, time, sender and the inline message text */
  readonly pattern: RegExp
  /** Timestamp templates tried in order against "<date>, <time>" */
  readonly templates: readonly string[]
}

export const LEFT_TO_RIGHT_MARK = '\u200E'

const US_TEMPLATES = [
  '%m/%d/%y, %I:%M:%S %p',
  '%m/%d/%y, %I:%M %p',
  '%m/%d/%Y, %I:%M:%S %p',
  '%m/%d/%Y, %I:%M %p',
  '%m/%d/%y, %H:%M:%S',
  '%m/%d/%y, %H:%M',
  '%m/%d/%Y, %H:%M:%S',
  '%m/%d/%Y, %H:%M'
] as const

const EU_DOT_TEMPLATES = [
  '%d.%m.%y, %H:%M:%S',
  '%d.%m.%y, %H:%M',
  '%d.%m.%Y, %H:%M:%S',
  '%d.%m.%Y, %H:%M'
] as const

const EU_SLASH_TEMPLATES = [
  '%d/%m/%y, %H:%M:%S',
  '%d/%m/%y, %H:%M',
  '%d/%m/%Y, %H:%M:%S',
  '%d/%m/%Y, %H:%M'
] as const

/** Detection priority: on a full tie the earlier entry wins. */
const FORMATS: FormatDescriptor[] = [
  {
    name: 'us',
    pattern:
      /^\[(\d{1,2}\/\d{1,2}\/\d{2,4}),\s(\d{1,2}:\d{2}(?::\d{2})?(?:\s?[APap][Mm])?)\]\s([^:]+):\s?(.*)/,
    templates: US_TEMPLATES
  },
  {
    name: 'eu_dot_bracketed',
    pattern: /^\[(\d{2}\.\d{2}\.\d{2,4}),\s(\d{2}:\d{2}(?::\d{2})?)\]\s([^:]+):\s?(.*)/,
    templates: EU_DOT_TEMPLATES
  },
  {
    name: 'eu_dot_no_bracket',
    pattern: /^(\d{2}\.\d{2}\.\d{2,4}),\s(\d{2}:\d{2}(?::\d{2})?)\s-\s([^:]+):\s?(.*)/,
    templates: EU_DOT_TEMPLATES
  },
  {
    name: 'eu_slash',
    pattern: /^(\d{2}\/\d{2}\/\d{2,4}),\s(\d{2}:\d{2}(?::\d{2})?)\s-\s([^:]+):\s?(.*)/,
    templates: EU_SLASH_TEMPLATES
  },
  {
    name: 'eu_slash_bracketed',
    pattern: /^\[(\d{2}\/\d{2}\/\d{2,4}),\s(\d{2}:\d{2}(?::\d{2})?)\]\s([^:]+):\s?(.*)/,
    templates: EU_SLASH_TEMPLATES
  }
]

export const WHATSAPP_FORMATS: readonly FormatDescriptor[] = Object.freeze(
  FORMATS.map((format) => Object.freeze(format))
)

/** Number of non-empty head lines the detector looks at. */
export const DETECTION_SAMPLE_SIZE = 20

export function getFormat(name: WhatsAppFormatName): FormatDescriptor {
  const format = WHATSAPP_FORMATS.find((f) => f.name === name)
  if (!format) {
    throw new Error(`Unknown WhatsApp format: ${name}`)
  }
  return format
}

export function stripLeftToRightMark(line: string): string {
  return line.startsWith(LEFT_TO_RIGHT_MARK) ? line.slice(1) : line
}

export interface FormatScore {
  readonly format: FormatDescriptor
  /** Sample lines the boundary pattern matched */
  readonly matches: number
  /** Matched lines whose timestamp one of the templates could read */
  readonly parsed: number
}

export function scoreFormats(lines: readonly string[]): FormatScore[] {
  return WHATSAPP_FORMATS.map((format) => {
    let matches = 0
    let parsed = 0
    for (const raw of lines) {
      const match = format.pattern.exec(stripLeftToRightMark(raw))
      if (!match) continue
      matches++
      if (parseTimestamp(`${match[1]}, ${match[2]}`, format.templates)) {
        parsed++
      }
    }
    return { format, matches, parsed }
  })
}

/**
 * Pick the grammar that matches the most sample lines.
 *
 * This is not a strict priority-order pick. `us` and `eu_slash_bracketed`
 * share a line shape, so on equal match counts the grammar that can read
 * more of the matched timestamps wins even when it comes later in priority
 * order: `[15/01/24, 10:30:45] Anna: Hola` selects `eu_slash_bracketed`
 * over `us`, since month 15 does not exist. Priority order only settles a
 * tie on both counts. Returns undefined when no grammar matches any line.
 */
export function detectFormat(lines: readonly string[]): FormatDescriptor | undefined {
  const sample = lines.filter((line) => line.trim().length > 0).slice(0, DETECTION_SAMPLE_SIZE)

  let best: FormatScore | undefined
  for (const score of scoreFormats(sample)) {
    if (score.matches === 0) continue
    if (
      !best ||
      score.matches > best.matches ||
      (score.matches === best.matches && score.parsed > best.parsed)
    ) {
      best = score
    }
  }
  return best?.format
}

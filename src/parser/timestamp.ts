/**
 * Timestamp Templates
 *
 * A small strftime-style reader for chat export timestamps. Supported
 * directives: %d %m %y %Y %H %I %M %S %p. A space in a template matches any
 * run of whitespace (including the narrow no-break space some exports put
 * before AM/PM). Results are UTC.
 */

interface CompiledTemplate {
  readonly pattern: RegExp
  readonly fields: readonly string[]
}

const DIRECTIVES: Record<string, string> = {
  d: '(\\d{1,2})',
  m: '(\\d{1,2})',
  y: '(\\d{2})',
  Y: '(\\d{4})',
  H: '(\\d{1,2})',
  I: '(\\d{1,2})',
  M: '(\\d{1,2})',
  S: '(\\d{1,2})',
  p: '([AaPp][Mm])'
}

const compiled = new Map<string, CompiledTemplate>()

function escapeLiteral(ch: string): string {
  if (/\s/.test(ch)) return '\\s*'
  return ch.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&')
}

function compileTemplate(template: string): CompiledTemplate {
  const cached = compiled.get(template)
  if (cached) return cached

  let source = '^'
  const fields: string[] = []

  for (let i = 0; i < template.length; i++) {
    const ch = template.charAt(i)
    if (ch === '%' && i + 1 < template.length) {
      const directive = template.charAt(i + 1)
      const group = DIRECTIVES[directive]
      if (group === undefined) {
        throw new Error(`Unsupported timestamp directive: %${directive}`)
      }
      source += group
      fields.push(directive)
      i++
    } else {
      source += escapeLiteral(ch)
    }
  }

  const result = { pattern: new RegExp(`${source}$`), fields }
  compiled.set(template, result)
  return result
}

/** Two-digit years: 00-68 are 20xx, 69-99 are 19xx. */
export function expandTwoDigitYear(year: number): number {
  return year <= 68 ? 2000 + year : 1900 + year
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

/**
 * Read `text` with a single template. Returns undefined when the text does
 * not fit the template or names an impossible date or time.
 */
export function parseWithTemplate(text: string, template: string): Date | undefined {
  const { pattern, fields } = compileTemplate(template)
  const match = pattern.exec(text)
  if (!match) return undefined

  let year: number | undefined
  let month: number | undefined
  let day: number | undefined
  let hour = 0
  let hour12: number | undefined
  let minute = 0
  let second = 0
  let meridiem: 'am' | 'pm' | undefined

  for (const [index, field] of fields.entries()) {
    const raw = match[index + 1] ?? ''
    const value = Number.parseInt(raw, 10)
    switch (field) {
      case 'd':
        day = value
        break
      case 'm':
        month = value
        break
      case 'y':
        year = expandTwoDigitYear(value)
        break
      case 'Y':
        year = value
        break
      case 'H':
        hour = value
        break
      case 'I':
        hour12 = value
        break
      case 'M':
        minute = value
        break
      case 'S':
        second = value
        break
      case 'p':
        meridiem = raw.toLowerCase() === 'pm' ? 'pm' : 'am'
        break
    }
  }

  if (year === undefined || month === undefined || day === undefined) return undefined

  if (hour12 !== undefined) {
    if (meridiem === undefined || hour12 < 1 || hour12 > 12) return undefined
    hour = hour12 % 12
    if (meridiem === 'pm') hour += 12
  } else if (meridiem !== undefined) {
    return undefined
  }

  if (month < 1 || month > 12) return undefined
  if (day < 1 || day > daysInMonth(year, month)) return undefined
  if (hour > 23 || minute > 59 || second > 59) return undefined

  return new Date(Date.UTC(year, month - 1, day, hour, minute, second))
}

/** Try each template in order; the first that reads the text wins. */
export function parseTimestamp(text: string, templates: readonly string[]): Date | undefined {
  for (const template of templates) {
    const date = parseWithTemplate(text, template)
    if (date) return date
  }
  return undefined
}

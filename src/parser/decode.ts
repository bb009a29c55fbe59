/**
 * Record decoding helpers shared by the JSON dialects.
 */

import type { z } from 'zod'
import { decodeError } from '../streaming/errors.js'

function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0]
  if (!issue) return 'invalid record'
  const path = issue.path.length > 0 ? issue.path.join('.') : 'record'
  return `${path}: ${issue.message}`
}

/**
 * Parse one carved unit of JSON text against a record schema.
 * Throws a decode StreamingError when the text is not JSON or has the wrong shape.
 */
export function decodeJson<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    throw decodeError(error)
  }

  const result = schema.safeParse(value)
  if (!result.success) {
    throw decodeError(describeIssues(result.error))
  }
  return result.data
}

/** Epoch seconds written as a decimal string. */
export function parseUnixSeconds(value: string | null | undefined): Date | undefined {
  if (value === null || value === undefined || !/^-?\d+$/.test(value.trim())) return undefined
  const date = new Date(Number(value.trim()) * 1000)
  return Number.isNaN(date.getTime()) ? undefined : date
}

export function parseEpochMillis(value: number): Date | undefined {
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? undefined : date
}

const RFC3339 =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:[Zz]|[+-]\d{2}:\d{2})$/

export function parseRfc3339(value: string | null | undefined): Date | undefined {
  if (value === null || value === undefined || !RFC3339.test(value)) return undefined
  const date = new Date(value.replace(' ', 'T'))
  return Number.isNaN(date.getTime()) ? undefined : date
}

const MAX_U64 = (1n << 64n) - 1n

/** Unsigned 64-bit integer from its decimal text, or undefined. */
export function parseUnsigned(value: string | null | undefined): bigint | undefined {
  if (value === null || value === undefined || !/^\d+$/.test(value)) return undefined
  const parsed = BigInt(value)
  return parsed <= MAX_U64 ? parsed : undefined
}

export function toUnsigned(value: number | null | undefined): bigint | undefined {
  if (value === null || value === undefined) return undefined
  if (!Number.isSafeInteger(value) || value < 0) return undefined
  return BigInt(value)
}

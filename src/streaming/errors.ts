/**
 * Streaming Errors
 *
 * One error class for every failure a stream can report. `fatal` errors end
 * the stream; the rest concern a single record and follow the skip policy.
 */

export type StreamingErrorType =
  | 'io'
  | 'invalid_format'
  | 'size_limit'
  | 'unexpected_eof'
  | 'decode'

interface StreamingErrorInit {
  readonly maxSize?: number | undefined
  readonly actualSize?: number | undefined
  readonly cause?: unknown
}

export class StreamingError extends Error {
  readonly type: StreamingErrorType
  readonly maxSize: number | undefined
  readonly actualSize: number | undefined

  constructor(type: StreamingErrorType, message: string, init: StreamingErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause })
    this.name = 'StreamingError'
    this.type = type
    this.maxSize = init.maxSize
    this.actualSize = init.actualSize
  }

  /** Fatal errors are produced at most once, as the last item of a stream. */
  get fatal(): boolean {
    return this.type === 'io' || this.type === 'invalid_format'
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

export function ioError(cause: unknown): StreamingError {
  return new StreamingError('io', `IO error: ${describe(cause)}`, { cause })
}

export function invalidFormat(message: string): StreamingError {
  return new StreamingError('invalid_format', `Invalid format: ${message}`)
}

export function bufferOverflow(maxSize: number, actualSize: number): StreamingError {
  return new StreamingError(
    'size_limit',
    `Record too large: ${actualSize} bytes (max: ${maxSize})`,
    { maxSize, actualSize }
  )
}

export function unexpectedEof(): StreamingError {
  return new StreamingError('unexpected_eof', 'Unexpected end of input')
}

export function decodeError(cause: unknown): StreamingError {
  return new StreamingError('decode', `Decode error: ${describe(cause)}`, { cause })
}

/**
 * Wrap anything thrown while reading into a StreamingError, keeping ones
 * that already are.
 */
export function toStreamingError(error: unknown): StreamingError {
  return error instanceof StreamingError ? error : ioError(error)
}

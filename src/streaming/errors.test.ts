import { describe, expect, it } from 'vitest'
import {
  bufferOverflow,
  decodeError,
  invalidFormat,
  ioError,
  StreamingError,
  toStreamingError,
  unexpectedEof
} from './errors.js'

describe('StreamingError', () => {
  it('marks io and invalid_format as fatal', () => {
    expect(ioError(new Error('EACCES')).fatal).toBe(true)
    expect(invalidFormat('no array').fatal).toBe(true)
  })

  it('marks per-record errors as recoverable', () => {
    expect(bufferOverflow(10, 20).fatal).toBe(false)
    expect(unexpectedEof().fatal).toBe(false)
    expect(decodeError('bad').fatal).toBe(false)
  })

  it('carries sizes for size_limit', () => {
    const error = bufferOverflow(1024, 4096)
    expect(error.type).toBe('size_limit')
    expect(error.maxSize).toBe(1024)
    expect(error.actualSize).toBe(4096)
    expect(error.message).toBe('Record too large: 4096 bytes (max: 1024)')
  })

  it('formats messages from causes', () => {
    expect(ioError(new Error('no such file')).message).toBe('IO error: no such file')
    expect(decodeError('id: Required').message).toBe('Decode error: id: Required')
    expect(invalidFormat('missing array').message).toBe('Invalid format: missing array')
  })

  it('keeps the cause', () => {
    const cause = new Error('disk')
    expect(ioError(cause).cause).toBe(cause)
  })

  it('wraps unknown throwables as io errors', () => {
    const existing = unexpectedEof()
    expect(toStreamingError(existing)).toBe(existing)

    const wrapped = toStreamingError(new Error('boom'))
    expect(wrapped).toBeInstanceOf(StreamingError)
    expect(wrapped.type).toBe('io')
  })
})

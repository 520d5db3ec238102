import {describe, expect, it} from 'vitest'
import {abortedError, classifyError, cleanErrorText, TurnError} from '../src/core/errors.js'

describe('classifyError', () => {
  it('maps provider failures onto kinds', () => {
    expect(classifyError(new Error('429 Too Many Requests')).kind).toBe('rate_limited')
    expect(classifyError(new Error('401 Unauthorized')).kind).toBe('auth_failed')
    expect(classifyError(new Error('403 permission_error')).kind).toBe('permission_denied')
    expect(classifyError(new Error('404 model not found: gpt-x')).kind).toBe('model_not_found')
    expect(classifyError(new Error('Request timed out.')).kind).toBe('timeout')
    expect(classifyError(new Error('context deadline exceeded')).kind).toBe('timeout')
    expect(classifyError(new Error("This model's maximum context length is 8192 tokens")).kind).toBe(
      'context_too_long'
    )
    expect(classifyError(new Error('Function calling is not enabled for this model')).kind).toBe(
      'unsupported_tool_calling'
    )
  })

  it('checks rate limiting before model-not-found', () => {
    const classified = classifyError(new Error('404 Not Found: upstream answered 429 Too Many Requests'))
    expect(classified).toEqual({
      kind: 'rate_limited',
      message: 'Rate limit exceeded. Please wait a moment and try again, or ask your provider to raise your limit.'
    })
  })

  it('returns fixed user-facing messages', () => {
    expect(classifyError(new Error('401 Unauthorized')).message).toBe(
      'Authentication failed. Please check your API key configuration.'
    )
    expect(classifyError(new Error('404 Not Found')).message).toBe(
      'Model not found. Please check your model configuration.'
    )
  })

  it('reports cancellation when the signal was aborted', () => {
    const controller = new AbortController()
    controller.abort()
    expect(classifyError(new Error('429 Too Many Requests'), controller.signal)).toEqual({
      kind: 'cancelled',
      message: 'Request cancelled.'
    })
  })

  it('reports a timeout when the signal was aborted by its deadline', () => {
    const signal = AbortSignal.abort(new DOMException('The operation was aborted due to timeout', 'TimeoutError'))
    expect(classifyError(new Error('This operation was aborted'), signal)).toEqual({
      kind: 'timeout',
      message: 'Request timed out. The AI provider took too long to respond. Please try again.'
    })
  })

  it('reports a timeout when the error itself is a TimeoutError', () => {
    const error = new DOMException('The operation was aborted due to timeout', 'TimeoutError')
    expect(classifyError(error).kind).toBe('timeout')
  })

  it('recognises abort errors by name', () => {
    const error = new Error('This operation was aborted')
    error.name = 'AbortError'
    expect(classifyError(error).kind).toBe('cancelled')
  })

  it('falls back to cleaned text', () => {
    expect(classifyError(new Error('failed to send message: socket hang up (Request-ID: req_123)'))).toEqual({
      kind: 'generic',
      message: 'socket hang up'
    })
    expect(classifyError('plain failure')).toEqual({kind: 'generic', message: 'plain failure'})
  })
})

describe('abortedError', () => {
  it('tells a deadline apart from a user cancellation', () => {
    expect(abortedError(AbortSignal.abort()).kind).toBe('cancelled')
    expect(abortedError(AbortSignal.abort(new DOMException('timed out', 'TimeoutError'))).kind).toBe('timeout')
    expect(abortedError().kind).toBe('cancelled')
  })
})

describe('cleanErrorText', () => {
  it('strips the request line and the JSON error body', () => {
    expect(
      cleanErrorText('POST "https://api.example.com/v1/messages": 500 Internal Server Error {"type":"error","error":{}}')
    ).toBe('500 Internal Server Error')
  })

  it('strips wrapper prefixes', () => {
    expect(cleanErrorText('failed to send messages with history and tools: overloaded')).toBe('overloaded')
  })
})

describe('TurnError', () => {
  it('carries the kind', () => {
    const error = new TurnError({kind: 'timeout', message: 'Request timed out.'})
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('TurnError')
    expect(error.kind).toBe('timeout')
    expect(error.message).toBe('Request timed out.')
  })
})

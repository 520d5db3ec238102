export type ErrorKind =
  | 'unsupported_tool_calling'
  | 'rate_limited'
  | 'auth_failed'
  | 'permission_denied'
  | 'model_not_found'
  | 'timeout'
  | 'context_too_long'
  | 'cancelled'
  | 'empty_response'
  | 'generic'

export type ClassifiedError = {
  kind: ErrorKind
  message: string
}

export class TurnError extends Error {
  readonly kind: ErrorKind

  constructor(classified: ClassifiedError) {
    super(classified.message)
    this.name = 'TurnError'
    this.kind = classified.kind
  }
}

const TIMEOUT_MESSAGE = 'Request timed out. The AI provider took too long to respond. Please try again.'

const includesAny = (text: string, needles: string[]) => needles.some((needle) => text.includes(needle))

type Rule = {
  kind: ErrorKind
  message: string
  matches: (text: string) => boolean
}

// Checked in order: one raw message can match several rules (a 404 body that mentions 429 is rate limiting).
const RULES: Rule[] = [
  {
    kind: 'unsupported_tool_calling',
    message:
      "This model doesn't support function calling (tool use). Switch to a model that supports tools and try again.",
    matches: (text) =>
      text.includes('Function calling is not enabled') ||
      (text.includes('function calling') && includesAny(text, ['not enabled', 'not supported']))
  },
  {
    kind: 'rate_limited',
    message: 'Rate limit exceeded. Please wait a moment and try again, or ask your provider to raise your limit.',
    matches: (text) => includesAny(text, ['429', 'Too Many Requests', 'rate_limit_error'])
  },
  {
    kind: 'auth_failed',
    message: 'Authentication failed. Please check your API key configuration.',
    matches: (text) => includesAny(text, ['401', 'Unauthorized', 'authentication_error'])
  },
  {
    kind: 'permission_denied',
    message: 'Permission denied. Your API key may not have access to this model or feature.',
    matches: (text) => includesAny(text, ['403', 'Forbidden', 'permission_error'])
  },
  {
    kind: 'model_not_found',
    message: 'Model not found. Please check your model configuration.',
    matches: (text) => includesAny(text, ['404', 'Not Found', 'model not found'])
  },
  {
    kind: 'timeout',
    message: TIMEOUT_MESSAGE,
    matches: (text) => includesAny(text.toLowerCase(), ['timeout', 'timed out', 'deadline exceeded'])
  },
  {
    kind: 'context_too_long',
    message: 'Context length exceeded. The conversation is too long; start a new session or lower the history limits.',
    matches: (text) => includesAny(text, ['context_length_exceeded', 'maximum context length'])
  }
]

const WRAPPER_PREFIXES = [
  'failed to send message: ',
  'failed to send message with tools: ',
  'failed to send messages with history: ',
  'failed to send messages with history and tools: '
]

function cutAt(text: string, marker: string): string {
  const index = text.indexOf(marker)
  return index === -1 ? text : text.slice(0, index).trim()
}

/** Strips request ids, JSON error bodies, `METHOD "url": ` prefixes and wrapper prefixes. */
export function cleanErrorText(raw: string): string {
  let text = cutAt(cutAt(raw, '(Request-ID:'), '(request-id:')
  text = cutAt(text, '{"type":"error"')

  if (/^(POST|GET|PUT|DELETE) /.test(text)) {
    const index = text.indexOf('":')
    if (index !== -1) text = text.slice(index + 2).trim()
  }

  for (const prefix of WRAPPER_PREFIXES) {
    if (text.startsWith(prefix)) text = text.slice(prefix.length)
  }

  return text
}

function errorText(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError')
}

function isTimeoutReason(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'name' in value && value.name === 'TimeoutError'
}

export function cancelledError(): ClassifiedError {
  return {kind: 'cancelled', message: 'Request cancelled.'}
}

export function timeoutError(): ClassifiedError {
  return {kind: 'timeout', message: TIMEOUT_MESSAGE}
}

/** Outcome for an aborted signal: a deadline (`AbortSignal.timeout`) is a timeout, anything else a cancellation. */
export function abortedError(signal?: AbortSignal): ClassifiedError {
  return isTimeoutReason(signal?.reason) ? timeoutError() : cancelledError()
}

export function emptyResponseError(): ClassifiedError {
  return {
    kind: 'empty_response',
    message: 'Received an empty response from the AI provider. This usually means rate limiting or truncation.'
  }
}

/** Maps a raw provider/transport error onto the user-facing taxonomy. Never retries. */
export function classifyError(error: unknown, signal?: AbortSignal): ClassifiedError {
  if (signal?.aborted) return abortedError(signal)
  if (isTimeoutReason(error)) return timeoutError()
  if (isAbortError(error)) return cancelledError()

  const text = errorText(error)
  const rule = RULES.find((candidate) => candidate.matches(text))
  if (rule) return {kind: rule.kind, message: rule.message}

  return {kind: 'generic', message: cleanErrorText(text)}
}

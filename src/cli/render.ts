import type {ErrorKind} from '../core/errors.js'
import type {ChatEvent} from '../core/events.js'
import type {TurnFailure} from '../core/orchestrator.js'
import {formatUsage} from '../core/usage.js'

const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m'
}

export function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

export function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

export function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`
}

function now(): string {
  return new Date().toISOString()
}

export function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

/** One progress line per event, or undefined for events the terminal does not show. */
export function eventLine(event: ChatEvent, verboseModel = false): string | undefined {
  switch (event.type) {
    case 'session_start':
      return `[${now()}] ${event.resumed ? 'RESUME' : 'START'} provider=${event.provider} model=${event.model} session=${event.sessionId}`
    case 'provider_switch':
      return `[${now()}] PROVIDER_SWITCH ${event.from} -> ${event.to}`
    case 'model_request':
      return `[${now()}] MODEL_REQUEST step=${event.step} messages=${event.messageCount}`
    case 'model_response':
      if (!verboseModel) return undefined
      return `[${now()}] MODEL_RESPONSE step=${event.step} stop=${event.stopReason ?? '-'} tool_calls=${event.toolCalls}\n${shorten(event.content)}`
    case 'tool_call':
      return `[${now()}] TOOL_CALL step=${event.step} tool=${event.tool} input=${JSON.stringify(event.input)}`
    case 'tool_result':
      return `[${now()}] TOOL_RESULT step=${event.step} tool=${event.tool} ok=${event.ok}`
    case 'action_nudge':
      return `[${now()}] ACTION_NUDGE step=${event.step}`
    case 'history_compacted':
      return `[${now()}] HISTORY_COMPACTED provider=${event.provider} messages=${event.compacted} kept=${event.kept} summary=${event.usedModel ? 'model' : 'simple'}`
    case 'persist_failed':
      return `[${now()}] PERSIST_FAILED ${event.error}`
    case 'turn_start':
    case 'turn_done':
    case 'turn_failed':
    case 'message':
    case 'session_end':
      return undefined
  }
}

export function usageFooter(usage: Parameters<typeof formatUsage>[0]): string | undefined {
  const text = formatUsage(usage)
  return text ? dim(text) : undefined
}

/** `undefined` for user-initiated cancellation, which needs no error text. */
export function failureText(failure: TurnFailure): string | undefined {
  if (failure.error.kind === 'cancelled') return undefined
  return failure.error.message
}

/** Shell convention: 130 after an interrupt, 1 for every other failed turn. */
export function exitCodeFor(kind: ErrorKind): number {
  return kind === 'cancelled' ? 130 : 1
}

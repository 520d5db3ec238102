import type {Usage} from '../../providers/types.js'
import type {ErrorKind} from '../errors.js'
import type {ChatEvent} from '../events.js'
import {combineUsage} from '../usage.js'

export type SessionStats = {
  sessionId: string
  startedAtMs: number
  turns: number
  failures: Partial<Record<ErrorKind, number>>
  toolCalls: number
  toolErrors: number
  nudges: number
  usage?: Usage
}

/** Per-session counters built from the event stream. */
export class UsageSubscriber {
  private readonly states = new Map<string, SessionStats>()

  constructor(private readonly onSummary?: (stats: SessionStats & {totalMs: number}) => void) {}

  handle(event: ChatEvent): void {
    if (event.type === 'session_start') {
      this.states.set(event.sessionId, {
        sessionId: event.sessionId,
        startedAtMs: Date.now(),
        turns: 0,
        failures: {},
        toolCalls: 0,
        toolErrors: 0,
        nudges: 0
      })
      return
    }

    const state = this.states.get(event.sessionId)
    if (!state) return

    switch (event.type) {
      case 'turn_done':
        state.turns += 1
        state.usage = combineUsage(state.usage, event.usage)
        break
      case 'turn_failed':
        state.turns += 1
        state.failures[event.kind] = (state.failures[event.kind] ?? 0) + 1
        break
      case 'tool_result':
        state.toolCalls += 1
        if (!event.ok) state.toolErrors += 1
        break
      case 'action_nudge':
        state.nudges += 1
        break
      case 'session_end':
        this.onSummary?.({...state, totalMs: Date.now() - state.startedAtMs})
        this.states.delete(event.sessionId)
        break
    }
  }

  stats(sessionId: string): SessionStats | undefined {
    const state = this.states.get(sessionId)
    return state ? {...state, failures: {...state.failures}} : undefined
  }
}

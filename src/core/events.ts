import type {Role, StopReason, ToolInput, Usage} from '../providers/types.js'
import type {ErrorKind} from './errors.js'

export type ChatEvent =
  | {type: 'session_start'; sessionId: string; provider: string; model: string; resumed: boolean}
  | {type: 'session_end'; sessionId: string}
  | {type: 'provider_switch'; sessionId: string; from: string; to: string}
  | {type: 'turn_start'; sessionId: string; provider: string; historySize: number}
  | {type: 'model_request'; sessionId: string; step: number; messageCount: number}
  | {
      type: 'model_response'
      sessionId: string
      step: number
      stopReason?: StopReason
      toolCalls: number
      content: string
      usage?: Usage
    }
  | {type: 'tool_call'; sessionId: string; step: number; tool: string; input: ToolInput}
  | {type: 'tool_result'; sessionId: string; step: number; tool: string; ok: boolean; output: string}
  | {type: 'action_nudge'; sessionId: string; step: number}
  | {type: 'turn_done'; sessionId: string; toolRounds: number; nudged: boolean; usage?: Usage}
  | {type: 'turn_failed'; sessionId: string; kind: ErrorKind; message: string}
  | {type: 'message'; sessionId: string; role: Role; provider?: string; content: string}
  | {type: 'persist_failed'; sessionId: string; error: string}
  | {
      type: 'history_compacted'
      sessionId: string
      provider: string
      summaryId: string
      compacted: number
      kept: number
      usedModel: boolean
      tokenCount: number
      fallbackReason?: string
    }

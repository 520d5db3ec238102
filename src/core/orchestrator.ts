import type {
  Message,
  ProviderClient,
  ProviderResponse,
  ToolCall,
  ToolDescriptor,
  ToolResult,
  Usage
} from '../providers/types.js'
import type {ToolExecutor} from '../tools/types.js'
import {detectActionIntent} from './action-intent.js'
import {abortedError, classifyError, emptyResponseError, type ClassifiedError} from './errors.js'
import type {EventBus} from './event-bus.js'
import type {ChatEvent} from './events.js'
import {renderToolNarrative, renderToolResultsPrompt} from './tool-output.js'
import {combineUsage} from './usage.js'

export const DEFAULT_MAX_TOOL_ROUNDS = 10

export const CORRECTIVE_NUDGE =
  'Please use the available tools to perform that action now, rather than just describing what you would do.'

export const DEFAULT_TOOL_INSTRUCTION = [
  'You are an AI assistant for infrastructure management. You have access to tools that allow you to perform actions.',
  '',
  'IMPORTANT: When you need to perform an action (read files, search, execute commands, etc.), you MUST use the available tools.',
  'Do NOT just describe what you would do - actually use the tools to do it.',
  '',
  'Always take action using tools rather than describing what action you would take.'
].join('\n')

const NARRATIVE_SEPARATOR = '\n\n---\n\n'
const EMPTY_REPLY_NOTE = '*Note: AI response was empty. This might indicate rate limiting or a timeout.*'

function toolRoundLimitNote(limit: number): string {
  return `*Note: stopped after ${limit} tool rounds in one turn. Ask again to let the assistant continue.*`
}

export type TurnSuccess = {
  ok: true
  content: string
  usage?: Usage
  toolRounds: number
  nudged: boolean
}

export type TurnFailure = {
  ok: false
  error: ClassifiedError
}

export type TurnOutcome = TurnSuccess | TurnFailure

export type TurnOrchestratorOptions = {
  client: ProviderClient
  executor?: ToolExecutor
  bus?: EventBus<ChatEvent>
  sessionId?: string
  maxToolRounds?: number
  /** Ephemeral system instruction sent with tool-enabled requests. Never persisted. */
  instruction?: string
  detectIntent?: (text: string) => boolean
}

export type RunTurnOptions = {
  signal?: AbortSignal
}

type SendResult = {ok: true; response: ProviderResponse | undefined} | TurnFailure

function joinText(...parts: string[]): string {
  return parts.filter((part) => part.length > 0).join('\n\n')
}

function composeFinal(accumulated: string, ...parts: string[]): string {
  const text = joinText(...parts)
  if (!accumulated) return text
  return text ? `${accumulated}${NARRATIVE_SEPARATOR}${text}` : accumulated
}

function failedResult(error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error)
  return {success: false, output: `Error: ${message}`, error: message}
}

/**
 * Drives one user turn: provider call, sequential tool rounds, at most one
 * corrective nudge, then a final answer or a classified failure.
 */
export class TurnOrchestrator {
  private readonly client: ProviderClient
  private readonly executor?: ToolExecutor
  private readonly bus?: EventBus<ChatEvent>
  private readonly sessionId: string
  private readonly maxToolRounds: number
  private readonly instruction: string
  private readonly detectIntent: (text: string) => boolean
  private running = false

  constructor(options: TurnOrchestratorOptions) {
    this.client = options.client
    this.executor = options.executor
    this.bus = options.bus
    this.sessionId = options.sessionId ?? 'default'
    this.maxToolRounds = Math.max(1, options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS)
    this.instruction = options.instruction ?? DEFAULT_TOOL_INSTRUCTION
    this.detectIntent = options.detectIntent ?? detectActionIntent
  }

  async runTurn(history: Message[], options: RunTurnOptions = {}): Promise<TurnOutcome> {
    if (this.running) throw new Error('A turn is already in progress for this session.')
    this.running = true
    this.publish({type: 'turn_start', sessionId: this.sessionId, provider: this.client.name, historySize: history.length})

    try {
      const outcome = await this.drive(history, options.signal)
      if (outcome.ok) {
        this.publish({
          type: 'turn_done',
          sessionId: this.sessionId,
          toolRounds: outcome.toolRounds,
          nudged: outcome.nudged,
          usage: outcome.usage
        })
      } else {
        this.publish({
          type: 'turn_failed',
          sessionId: this.sessionId,
          kind: outcome.error.kind,
          message: outcome.error.message
        })
      }
      return outcome
    } finally {
      this.running = false
    }
  }

  private async drive(history: Message[], signal?: AbortSignal): Promise<TurnOutcome> {
    if (signal?.aborted) return {ok: false, error: abortedError(signal)}

    const tools = this.executor?.listTools() ?? []
    if (tools.length === 0) return this.runWithoutTools(history, signal)

    const messages: Message[] = [{role: 'system', content: this.instruction}, ...history]
    let usage: Usage | undefined
    let accumulated = ''
    let held = ''
    let nudged = false
    let toolRounds = 0

    for (let step = 0; ; step += 1) {
      const sent = await this.send(messages, tools, step, signal)
      if (!sent.ok) return sent
      const response = sent.response
      usage = combineUsage(usage, response?.usage)

      const wantsTools = response?.stopReason === 'tool_use' && response.toolCalls.length > 0
      if (!response || (!wantsTools && !response.content)) {
        if (!accumulated && !held) return {ok: false, error: emptyResponseError()}
        return {ok: true, content: composeFinal(accumulated, held, EMPTY_REPLY_NOTE), usage, toolRounds, nudged}
      }

      if (wantsTools) {
        if (toolRounds >= this.maxToolRounds) {
          const content = composeFinal(accumulated, held, response.content, toolRoundLimitNote(this.maxToolRounds))
          return {ok: true, content, usage, toolRounds, nudged}
        }

        toolRounds += 1
        const results = await this.executeAll(response.toolCalls, step, signal)
        accumulated = joinText(accumulated, renderToolNarrative(response.content, response.toolCalls, results))
        held = ''
        if (response.content) messages.push({role: 'assistant', content: response.content})
        messages.push({role: 'user', content: renderToolResultsPrompt(response.toolCalls, results)})
        continue
      }

      if (!nudged && response.stopReason === 'end_turn' && this.detectIntent(response.content)) {
        nudged = true
        held = response.content
        this.publish({type: 'action_nudge', sessionId: this.sessionId, step})
        messages.push({role: 'assistant', content: response.content}, {role: 'user', content: CORRECTIVE_NUDGE})
        continue
      }

      return {ok: true, content: composeFinal(accumulated, held, response.content), usage, toolRounds, nudged}
    }
  }

  private async runWithoutTools(history: Message[], signal?: AbortSignal): Promise<TurnOutcome> {
    this.publish({type: 'model_request', sessionId: this.sessionId, step: 0, messageCount: history.length})
    let text: string
    try {
      text = await this.client.sendWithHistory(history, signal)
    } catch (error) {
      return {ok: false, error: classifyError(error, signal)}
    }

    this.publish({type: 'model_response', sessionId: this.sessionId, step: 0, toolCalls: 0, content: text})
    if (!text.trim()) return {ok: false, error: emptyResponseError()}
    return {ok: true, content: text, toolRounds: 0, nudged: false}
  }

  private async send(
    messages: Message[],
    tools: ToolDescriptor[],
    step: number,
    signal?: AbortSignal
  ): Promise<SendResult> {
    if (signal?.aborted) return {ok: false, error: abortedError(signal)}

    this.publish({type: 'model_request', sessionId: this.sessionId, step, messageCount: messages.length})
    let response: ProviderResponse | undefined
    try {
      response = await this.client.sendWithToolsAndHistory([...messages], tools, signal)
    } catch (error) {
      return {ok: false, error: classifyError(error, signal)}
    }

    this.publish({
      type: 'model_response',
      sessionId: this.sessionId,
      step,
      stopReason: response?.stopReason,
      toolCalls: response?.toolCalls.length ?? 0,
      content: response?.content ?? '',
      usage: response?.usage
    })
    return {ok: true, response}
  }

  // Sequential: a read followed by an edit must see the read's effects.
  private async executeAll(calls: ToolCall[], step: number, signal?: AbortSignal): Promise<ToolResult[]> {
    const results: ToolResult[] = []
    for (const call of calls) {
      this.publish({type: 'tool_call', sessionId: this.sessionId, step, tool: call.name, input: call.input})
      let result: ToolResult
      try {
        result = this.executor
          ? await this.executor.execute(call.name, call.input, signal)
          : {success: false, output: '', error: 'no tool executor configured'}
      } catch (error) {
        result = failedResult(error)
      }
      this.publish({
        type: 'tool_result',
        sessionId: this.sessionId,
        step,
        tool: call.name,
        ok: result.success,
        output: result.output || result.error || ''
      })
      results.push(result)
    }
    return results
  }

  private publish(event: ChatEvent): void {
    this.bus?.publish(event)
  }
}

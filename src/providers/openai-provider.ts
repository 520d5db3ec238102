import OpenAI from 'openai'
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {z} from 'zod'
import type {
  Message,
  ProviderClient,
  ProviderResponse,
  StopReason,
  ToolCall,
  ToolDescriptor,
  ToolInput,
  ToolInputValue,
  Usage
} from './types.js'

type OpenAIProviderOptions = {
  apiKey: string
  model: string
  /** Provider identity used for history isolation; defaults to `openai`. */
  name?: string
  baseUrl?: string
  timeoutMs?: number
  maxTokens?: number
  fetch?: typeof fetch
}

const toolInputValueSchema: z.ZodType<ToolInputValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(toolInputValueSchema),
    z.record(z.string(), toolInputValueSchema)
  ])
)

const toolInputSchema = z.record(z.string(), toolInputValueSchema)

export function parseToolArguments(raw: string): ToolInput {
  if (!raw.trim()) return {}
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch {
    return {}
  }
  const parsed = toolInputSchema.safeParse(json)
  return parsed.success ? parsed.data : {}
}

export function normalizeStopReason(finishReason: string | null | undefined): StopReason {
  switch (finishReason) {
    case 'tool_calls':
    case 'function_call':
      return 'tool_use'
    case 'length':
      return 'max_tokens'
    default:
      return 'end_turn'
  }
}

function extractUsage(completion: ChatCompletion): Usage | undefined {
  const usage = completion.usage
  if (!usage) return undefined
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
    cacheReadTokens: usage.prompt_tokens_details?.cached_tokens ?? 0,
    cacheCreationTokens: 0
  }
}

function extractToolCalls(completion: ChatCompletion): ToolCall[] {
  const rawCalls = completion.choices[0]?.message.tool_calls ?? []
  const calls: ToolCall[] = []
  rawCalls.forEach((call, index) => {
    if (call.type !== 'function' || !call.function.name) return
    calls.push({
      id: call.id || `call_${index}`,
      name: call.function.name,
      input: parseToolArguments(call.function.arguments)
    })
  })
  return calls
}

function mapMessages(messages: Message[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return {role: 'system', content: message.content}
      case 'assistant':
        return {role: 'assistant', content: message.content}
      case 'user':
        return {role: 'user', content: message.content}
    }
  })
}

function mapTools(tools: ToolDescriptor[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema
    }
  }))
}

export class OpenAIProvider implements ProviderClient {
  readonly name: string
  readonly model: string
  private readonly client: OpenAI
  private readonly timeoutMs: number
  private readonly maxTokens?: number

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name ?? 'openai'
    this.model = options.model
    this.timeoutMs = options.timeoutMs ?? 120_000
    this.maxTokens = options.maxTokens
    const rawBaseUrl = options.baseUrl ?? 'https://api.openai.com/v1'
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: rawBaseUrl.replace(/\/+$/, ''),
      // Retrying is the caller's decision; the turn is bounded as a whole.
      maxRetries: 0,
      ...(options.fetch ? {fetch: options.fetch} : {})
    })
  }

  private async complete(
    messages: Message[],
    tools: ToolDescriptor[],
    signal?: AbortSignal
  ): Promise<ChatCompletion> {
    const mappedTools = mapTools(tools)
    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: mapMessages(messages),
      ...(this.maxTokens ? {max_tokens: this.maxTokens} : {}),
      ...(mappedTools.length > 0 ? {tools: mappedTools, tool_choice: 'auto' as const} : {})
    }

    return this.client.chat.completions.create(request, {signal, timeout: this.timeoutMs})
  }

  async sendWithToolsAndHistory(
    messages: Message[],
    tools: ToolDescriptor[],
    signal?: AbortSignal
  ): Promise<ProviderResponse | undefined> {
    const completion = await this.complete(messages, tools, signal)
    const choice = completion.choices[0]
    const content = choice?.message.content ?? ''
    const toolCalls = extractToolCalls(completion)
    if (!content.trim() && toolCalls.length === 0) return undefined

    return {
      content,
      toolCalls,
      stopReason: toolCalls.length > 0 ? 'tool_use' : normalizeStopReason(choice?.finish_reason),
      usage: extractUsage(completion)
    }
  }

  async sendWithHistory(messages: Message[], signal?: AbortSignal): Promise<string> {
    const completion = await this.complete(messages, [], signal)
    return completion.choices[0]?.message.content ?? ''
  }
}

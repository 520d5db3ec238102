export type Role = 'system' | 'user' | 'assistant'

export type Message = {
  role: Role
  content: string
  /** Backend that produced (assistant) or received (user) this turn. Never set on system messages. */
  provider?: string
}

export type ToolInputValue = string | number | boolean | null | ToolInputValue[] | {[key: string]: ToolInputValue}

export type ToolInput = Record<string, ToolInputValue>

export type ToolDescriptor = {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

export type ToolCall = {
  id: string
  name: string
  input: ToolInput
}

export type ToolResult = {
  success: boolean
  output: string
  error?: string
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens'

export type Usage = {
  inputTokens: number
  outputTokens: number
  totalTokens: number
  cacheReadTokens: number
  cacheCreationTokens: number
}

export type ProviderResponse = {
  content: string
  toolCalls: ToolCall[]
  stopReason: StopReason
  usage?: Usage
}

export interface ProviderClient {
  readonly name: string
  readonly model: string
  /** Resolves `undefined` when the backend produced neither text nor tool calls. */
  sendWithToolsAndHistory(
    messages: Message[],
    tools: ToolDescriptor[],
    signal?: AbortSignal
  ): Promise<ProviderResponse | undefined>
  sendWithHistory(messages: Message[], signal?: AbortSignal): Promise<string>
}

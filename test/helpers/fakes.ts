import type {
  Message,
  ProviderClient,
  ProviderResponse,
  ToolCall,
  ToolDescriptor,
  ToolInput,
  ToolResult,
  Usage
} from '../../src/providers/types.js'
import type {ToolExecutor} from '../../src/tools/types.js'

type Scripted = ProviderResponse | undefined | Error

export function usage(inputTokens: number, outputTokens: number): Usage {
  return {inputTokens, outputTokens, totalTokens: inputTokens + outputTokens, cacheReadTokens: 0, cacheCreationTokens: 0}
}

export function reply(content: string, extra: Partial<ProviderResponse> = {}): ProviderResponse {
  return {content, toolCalls: [], stopReason: 'end_turn', ...extra}
}

export function toolUse(content: string, toolCalls: ToolCall[], extra: Partial<ProviderResponse> = {}): ProviderResponse {
  return {content, toolCalls, stopReason: 'tool_use', ...extra}
}

/** Provider that plays back scripted responses and records every request. */
export class ScriptedProvider implements ProviderClient {
  readonly model = 'scripted-model'
  readonly toolRequests: Message[][] = []
  readonly plainRequests: Message[][] = []
  private readonly script: Scripted[]
  private readonly plainReplies: string[]

  constructor(
    readonly name: string,
    script: Scripted[] = [],
    plainReplies: string[] = []
  ) {
    this.script = [...script]
    this.plainReplies = [...plainReplies]
  }

  async sendWithToolsAndHistory(messages: Message[], _tools: ToolDescriptor[]): Promise<ProviderResponse | undefined> {
    this.toolRequests.push(messages)
    if (this.script.length === 0) throw new Error('script exhausted')
    const next = this.script.shift()
    if (next instanceof Error) throw next
    return next
  }

  async sendWithHistory(messages: Message[]): Promise<string> {
    this.plainRequests.push(messages)
    return this.plainReplies.shift() ?? `${this.name} reply ${this.plainRequests.length}`
  }
}

export type ToolHandler = (name: string, input: ToolInput, signal?: AbortSignal) => Promise<ToolResult>

export class FakeExecutor implements ToolExecutor {
  readonly calls: {name: string; input: ToolInput}[] = []

  constructor(private readonly handler: ToolHandler = async () => ({success: true, output: 'ok'})) {}

  listTools(): ToolDescriptor[] {
    return [
      {
        name: 'read_file',
        description: 'Read a file.',
        inputSchema: {type: 'object', properties: {path: {type: 'string'}}, required: ['path']}
      }
    ]
  }

  async execute(name: string, input: ToolInput, signal?: AbortSignal): Promise<ToolResult> {
    this.calls.push({name, input})
    return this.handler(name, input, signal)
  }
}

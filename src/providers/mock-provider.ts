import type {Message, ProviderClient, ProviderResponse, ToolDescriptor} from './types.js'

function lastUserText(messages: Message[]): string | undefined {
  return messages.findLast((message) => message.role === 'user')?.content
}

/** Offline provider that echoes the latest user message. */
export class MockProvider implements ProviderClient {
  readonly model = 'echo'

  constructor(readonly name = 'mock') {}

  async sendWithToolsAndHistory(messages: Message[], _tools: ToolDescriptor[]): Promise<ProviderResponse> {
    return {content: await this.sendWithHistory(messages), toolCalls: [], stopReason: 'end_turn'}
  }

  async sendWithHistory(messages: Message[]): Promise<string> {
    const last = lastUserText(messages)
    if (last === undefined) return 'No input provided.'
    return `Mock response: ${last}`
  }
}

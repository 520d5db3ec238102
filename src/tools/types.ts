import type {ToolDescriptor, ToolInput, ToolResult} from '../providers/types.js'

export interface ToolExecutor {
  listTools(): ToolDescriptor[]
  /** Failures should come back as `{success: false}`; a rejection is folded into one by the orchestrator. */
  execute(name: string, input: ToolInput, signal?: AbortSignal): Promise<ToolResult>
}

export type SensitiveActionRequest = {
  tool: string
  command: string
}

export type SensitiveActionHandler = (request: SensitiveActionRequest) => Promise<boolean> | boolean

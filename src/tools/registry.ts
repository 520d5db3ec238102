import {z} from 'zod'
import type {ToolDescriptor, ToolInput, ToolResult} from '../providers/types.js'
import type {ToolExecutor} from './types.js'

export type ToolDefinition<TSchema extends z.ZodTypeAny> = {
  name: string
  description: string
  /** JSON schema advertised to the model. */
  inputSchema: Record<string, unknown>
  /** Validates what the model actually sent. */
  schema: TSchema
  run(input: z.infer<TSchema>, signal?: AbortSignal): Promise<ToolResult>
}

type RegisteredTool = {
  descriptor: ToolDescriptor
  execute(input: ToolInput, signal?: AbortSignal): Promise<ToolResult>
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ')
}

export class ToolRegistry implements ToolExecutor {
  private readonly tools = new Map<string, RegisteredTool>()

  register<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool already registered: ${definition.name}`)
    }

    this.tools.set(definition.name, {
      descriptor: {
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema
      },
      execute: async (input, signal) => {
        const parsed = definition.schema.safeParse(input)
        if (!parsed.success) {
          const message = `invalid input for ${definition.name}: ${formatIssues(parsed.error)}`
          return {success: false, output: '', error: message}
        }
        return definition.run(parsed.data, signal)
      }
    })
    return this
  }

  listTools(): ToolDescriptor[] {
    return [...this.tools.values()].map((tool) => ({...tool.descriptor}))
  }

  async execute(name: string, input: ToolInput, signal?: AbortSignal): Promise<ToolResult> {
    const tool = this.tools.get(name)
    if (!tool) return {success: false, output: '', error: `unknown tool: ${name}`}

    try {
      return await tool.execute(input, signal)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return {success: false, output: '', error: message}
    }
  }
}

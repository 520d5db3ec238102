import type {ToolCall, ToolInputValue, ToolResult} from '../providers/types.js'

export type OutputFormat = 'json' | 'yaml' | 'hcl' | 'text'

const HCL_MARKERS = ['resource "', 'data "', 'module "', 'variable "']

/** Code-fence language for a tool's output. */
export function detectOutputFormat(output: string): OutputFormat {
  const trimmed = output.trim()
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) return 'json'

  const lines = trimmed.split('\n')
  const yamlLines = lines.slice(0, 11).filter((line) => {
    const text = line.trim()
    return text.includes(': ') || text.startsWith('- ')
  }).length
  if (yamlLines >= 3) return 'yaml'

  if (HCL_MARKERS.some((marker) => trimmed.includes(marker))) return 'hcl'

  // Pipe tables read better unhighlighted.
  return 'text'
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text
}

function stringInput(call: ToolCall, key: string): string | undefined {
  const value = call.input[key]
  return typeof value === 'string' ? value : undefined
}

function valueText(value: ToolInputValue): string {
  if (typeof value === 'string') return value
  if (value === null || typeof value !== 'object') return String(value)
  return JSON.stringify(value)
}

export function formatToolParameters(call: ToolCall): string {
  const entries = Object.entries(call.input)
  if (entries.length === 0) return ''

  switch (call.name) {
    case 'execute_bash': {
      const command = stringInput(call, 'command')
      if (command !== undefined) return `**Command:** \`${truncate(command, 80)}\``
      break
    }
    case 'read_file':
    case 'edit_file':
    case 'write_file':
    case 'list_files': {
      const path = stringInput(call, 'path')
      if (path !== undefined) return `**Path:** \`${path}\``
      break
    }
    case 'search_files': {
      const pattern = stringInput(call, 'pattern')
      if (pattern !== undefined) return `**Pattern:** \`${pattern}\``
      break
    }
  }

  const params = entries.map(([key, value]) => `${key}=\`${truncate(valueText(value), 50)}\``)
  return `**Parameters:** ${params.join(', ')}`
}

function displayOutput(result: ToolResult): string {
  if (result.output) return result.output
  if (result.error) return `Error: ${result.error}`
  return 'No output returned'
}

/** User-visible narrative: reasoning, then each tool with its parameters and fenced output. */
export function renderToolNarrative(reasoning: string, calls: ToolCall[], results: ToolResult[]): string {
  const blocks = calls.map((call, index) => {
    const result = results[index] ?? {success: false, output: '', error: 'tool was not executed'}
    const output = displayOutput(result)
    const params = formatToolParameters(call)
    const header = params ? `**Tool:** \`${call.name}\`\n${params}` : `**Tool:** \`${call.name}\``
    return `${header}\n\n\`\`\`${detectOutputFormat(output)}\n${output}\n\`\`\``
  })

  const body = blocks.join('\n\n')
  return reasoning ? `${reasoning}\n\n${body}` : body
}

/** Compact results block handed back to the model as the next user turn. */
export function renderToolResultsPrompt(calls: ToolCall[], results: ToolResult[]): string {
  const blocks = calls.map((call, index) => {
    const result = results[index] ?? {success: false, output: '', error: 'tool was not executed'}
    return `Tool: ${call.name}\nResult:\n${displayOutput(result)}`
  })

  return `Tool execution results:\n\n${blocks.join('\n\n')}\n\nPlease provide your final response based on these results.`
}

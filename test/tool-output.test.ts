import {describe, expect, it} from 'vitest'
import {
  detectOutputFormat,
  formatToolParameters,
  renderToolNarrative,
  renderToolResultsPrompt
} from '../src/core/tool-output.js'
import type {ToolCall} from '../src/providers/types.js'

const readMain: ToolCall = {id: 'call_1', name: 'read_file', input: {path: 'main.tf'}}
const bucket = 'resource "aws_s3_bucket" "logs" {}'

describe('detectOutputFormat', () => {
  it('sniffs json, yaml and hcl', () => {
    expect(detectOutputFormat('  {"stacks": []}')).toBe('json')
    expect(detectOutputFormat('[1, 2]')).toBe('json')
    expect(detectOutputFormat('name: vpc\nregion: us-east-1\n- subnet-a')).toBe('yaml')
    expect(detectOutputFormat(bucket)).toBe('hcl')
  })

  it('falls back to text', () => {
    expect(detectOutputFormat('| stack | status |\n| vpc | ok |')).toBe('text')
    expect(detectOutputFormat('')).toBe('text')
  })
})

describe('formatToolParameters', () => {
  it('summarises known tools by their main argument', () => {
    expect(formatToolParameters({id: '1', name: 'execute_bash', input: {command: 'ls -la'}})).toBe(
      '**Command:** `ls -la`'
    )
    expect(formatToolParameters(readMain)).toBe('**Path:** `main.tf`')
    expect(formatToolParameters({id: '2', name: 'search_files', input: {pattern: '.tf'}})).toBe('**Pattern:** `.tf`')
  })

  it('truncates long commands to 80 characters', () => {
    const formatted = formatToolParameters({id: '1', name: 'execute_bash', input: {command: 'a'.repeat(100)}})
    expect(formatted).toBe(`**Command:** \`${'a'.repeat(77)}...\``)
  })

  it('lists parameters of other tools', () => {
    expect(formatToolParameters({id: '1', name: 'describe_stack', input: {region: 'us-east-1', count: 3}})).toBe(
      '**Parameters:** region=`us-east-1`, count=`3`'
    )
    expect(formatToolParameters({id: '1', name: 'describe_stack', input: {}})).toBe('')
  })
})

describe('renderToolNarrative', () => {
  it('renders reasoning and fenced output per tool', () => {
    expect(renderToolNarrative('Checking the file.', [readMain], [{success: true, output: bucket}])).toBe(
      `Checking the file.\n\n**Tool:** \`read_file\`\n**Path:** \`main.tf\`\n\n\`\`\`hcl\n${bucket}\n\`\`\``
    )
  })

  it('shows the error when a tool produced no output', () => {
    expect(renderToolNarrative('', [readMain], [{success: false, output: '', error: 'boom'}])).toBe(
      '**Tool:** `read_file`\n**Path:** `main.tf`\n\n```text\nError: boom\n```'
    )
  })
})

describe('renderToolResultsPrompt', () => {
  it('wraps results for the follow-up request', () => {
    expect(
      renderToolResultsPrompt(
        [readMain, {id: 'call_2', name: 'list_files', input: {}}],
        [
          {success: true, output: bucket},
          {success: true, output: ''}
        ]
      )
    ).toBe(
      `Tool execution results:\n\nTool: read_file\nResult:\n${bucket}\n\nTool: list_files\nResult:\nNo output returned\n\nPlease provide your final response based on these results.`
    )
  })
})

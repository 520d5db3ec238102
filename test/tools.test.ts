import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {mkdir, mkdtemp, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {z} from 'zod'
import {ToolRegistry} from '../src/tools/registry.js'
import {looksDestructiveCommand} from '../src/tools/shell.js'
import {createWorkspaceTools} from '../src/tools/workspace-tools.js'

describe('ToolRegistry', () => {
  function echoRegistry(): ToolRegistry {
    return new ToolRegistry().register({
      name: 'echo',
      description: 'Echo the text back.',
      inputSchema: {type: 'object', properties: {text: {type: 'string'}}, required: ['text']},
      schema: z.object({text: z.string()}),
      run: async ({text}) => ({success: true, output: text})
    })
  }

  it('lists descriptors of registered tools', () => {
    expect(echoRegistry().listTools()).toEqual([
      {
        name: 'echo',
        description: 'Echo the text back.',
        inputSchema: {type: 'object', properties: {text: {type: 'string'}}, required: ['text']}
      }
    ])
  })

  it('runs a tool with validated input', async () => {
    await expect(echoRegistry().execute('echo', {text: 'hi'})).resolves.toEqual({success: true, output: 'hi'})
  })

  it('rejects invalid input without running the tool', async () => {
    const result = await echoRegistry().execute('echo', {text: 42})
    expect(result.success).toBe(false)
    expect(result.error).toMatch(/^invalid input for echo: text: /)
  })

  it('reports unknown tools', async () => {
    await expect(echoRegistry().execute('nope', {})).resolves.toEqual({
      success: false,
      output: '',
      error: 'unknown tool: nope'
    })
  })

  it('turns thrown errors into failed results', async () => {
    const registry = new ToolRegistry().register({
      name: 'explode',
      description: 'Always fails.',
      inputSchema: {type: 'object'},
      schema: z.object({}),
      run: async () => {
        throw new Error('kaboom')
      }
    })
    await expect(registry.execute('explode', {})).resolves.toEqual({success: false, output: '', error: 'kaboom'})
  })

  it('refuses duplicate names', () => {
    expect(() =>
      echoRegistry().register({
        name: 'echo',
        description: 'again',
        inputSchema: {},
        schema: z.object({}),
        run: async () => ({success: true, output: ''})
      })
    ).toThrow('Tool already registered: echo')
  })
})

describe('workspace tools', () => {
  let workspace: string

  beforeEach(async () => {
    workspace = await mkdtemp(join(tmpdir(), 'skiff-tools-'))
    await mkdir(join(workspace, 'stacks', 'prod'), {recursive: true})
    await mkdir(join(workspace, 'stacks', 'dev'), {recursive: true})
    await mkdir(join(workspace, 'node_modules', 'pkg'), {recursive: true})
    await writeFile(join(workspace, 'README.md'), '# infra\n')
    await writeFile(join(workspace, 'stacks', 'prod', 'vpc.tf'), 'resource "aws_vpc" "main" {}\n')
    await writeFile(join(workspace, 'stacks', 'dev', 'vpc.tf'), 'resource "aws_vpc" "dev" {}\n')
    await writeFile(join(workspace, 'node_modules', 'pkg', 'vpc.js'), '')
  })

  afterEach(async () => {
    await rm(workspace, {recursive: true, force: true})
  })

  it('advertises the four workspace tools', () => {
    expect(
      createWorkspaceTools(workspace)
        .listTools()
        .map((tool) => tool.name)
    ).toEqual(['read_file', 'list_files', 'search_files', 'execute_bash'])
  })

  it('reads files inside the workspace', async () => {
    const result = await createWorkspaceTools(workspace).execute('read_file', {path: 'stacks/prod/vpc.tf'})
    expect(result).toEqual({success: true, output: 'resource "aws_vpc" "main" {}\n'})
  })

  it('refuses paths outside the workspace', async () => {
    const result = await createWorkspaceTools(workspace).execute('read_file', {path: '../secret.txt'})
    expect(result).toEqual({success: false, output: '', error: "Path '../secret.txt' is outside workspace."})
  })

  it('lists the workspace root by default', async () => {
    const result = await createWorkspaceTools(workspace).execute('list_files', {})
    expect(result).toEqual({success: true, output: 'node_modules/\nREADME.md\nstacks/'})
  })

  it('searches paths and skips dependency folders', async () => {
    const result = await createWorkspaceTools(workspace).execute('search_files', {pattern: 'VPC'})
    expect(result.success).toBe(true)
    expect(result.output.split('\n').sort()).toEqual(['stacks/dev/vpc.tf', 'stacks/prod/vpc.tf'])
  })

  it('reports no matches', async () => {
    await expect(createWorkspaceTools(workspace).execute('search_files', {pattern: 'eks'})).resolves.toEqual({
      success: true,
      output: '(no matches)'
    })
  })

  it('runs shell commands in the workspace', async () => {
    const result = await createWorkspaceTools(workspace).execute('execute_bash', {command: 'echo hello'})
    expect(result).toEqual({success: true, output: 'exit_code=0\nhello'})
  })

  it('reports a non-zero exit as a failure', async () => {
    const result = await createWorkspaceTools(workspace).execute('execute_bash', {command: 'exit 3'})
    expect(result).toEqual({success: false, output: 'exit_code=3\n(no output)', error: 'exit code 3'})
  })

  it('blocks destructive commands unless approved', async () => {
    const denied = await createWorkspaceTools(workspace).execute('execute_bash', {command: 'rm README.md'})
    expect(denied).toEqual({success: false, output: '', error: 'destructive command blocked: rm README.md'})

    const onSensitiveAction = vi.fn(async () => true)
    const approved = await createWorkspaceTools(workspace, {onSensitiveAction}).execute('execute_bash', {
      command: 'rm README.md'
    })
    expect(onSensitiveAction).toHaveBeenCalledWith({tool: 'execute_bash', command: 'rm README.md'})
    expect(approved).toEqual({success: true, output: 'exit_code=0\n(no output)'})
  })
})

describe('looksDestructiveCommand', () => {
  it('flags deletes and infrastructure teardown', () => {
    expect(looksDestructiveCommand('rm -rf build')).toBe(true)
    expect(looksDestructiveCommand('git reset --hard HEAD~1')).toBe(true)
    expect(looksDestructiveCommand('terraform destroy -auto-approve')).toBe(true)
    expect(looksDestructiveCommand('kubectl delete pod api-0')).toBe(true)
  })

  it('leaves read-only commands alone', () => {
    expect(looksDestructiveCommand('terraform plan')).toBe(false)
    expect(looksDestructiveCommand('ls -la')).toBe(false)
  })
})

import {z} from 'zod'
import {listFiles, readTextFile, searchWorkspaceFiles} from './filesystem.js'
import {ToolRegistry} from './registry.js'
import {looksDestructiveCommand, runShell} from './shell.js'
import type {SensitiveActionHandler} from './types.js'

export type WorkspaceToolsOptions = {
  /** Asked before destructive shell commands run. Denied when absent. */
  onSensitiveAction?: SensitiveActionHandler
}

const pathSchema = z.string().trim().min(1)

export function createWorkspaceTools(workspace: string, options: WorkspaceToolsOptions = {}): ToolRegistry {
  const registry = new ToolRegistry()

  registry.register({
    name: 'read_file',
    description: 'Read a text file from the workspace.',
    inputSchema: {
      type: 'object',
      properties: {path: {type: 'string', description: 'Workspace-relative file path'}},
      required: ['path']
    },
    schema: z.object({path: pathSchema}),
    run: async ({path}, signal) => ({success: true, output: await readTextFile(workspace, path, signal)})
  })

  registry.register({
    name: 'list_files',
    description: 'List the entries of a workspace directory. Directories end with "/".',
    inputSchema: {
      type: 'object',
      properties: {path: {type: 'string', description: 'Workspace-relative directory, defaults to the root'}}
    },
    schema: z.object({path: pathSchema.default('.')}),
    run: async ({path}) => {
      const entries = await listFiles(workspace, path)
      return {success: true, output: entries.join('\n') || '(empty directory)'}
    }
  })

  registry.register({
    name: 'search_files',
    description: 'Find workspace files whose relative path contains the pattern (case-insensitive).',
    inputSchema: {
      type: 'object',
      properties: {
        pattern: {type: 'string', description: 'Substring to look for, e.g. "vpc" or "stacks/prod"'},
        path: {type: 'string', description: 'Directory to search from, defaults to the root'}
      },
      required: ['pattern']
    },
    schema: z.object({pattern: z.string().trim().min(1), path: pathSchema.default('.')}),
    run: async ({pattern, path}, signal) => {
      const files = await searchWorkspaceFiles(workspace, pattern, path, signal)
      return {success: true, output: files.join('\n') || '(no matches)'}
    }
  })

  registry.register({
    name: 'execute_bash',
    description: 'Run a shell command in the workspace and return its exit code and output.',
    inputSchema: {
      type: 'object',
      properties: {command: {type: 'string', description: 'Command line to run'}},
      required: ['command']
    },
    schema: z.object({command: z.string().trim().min(1)}),
    run: async ({command}, signal) => {
      if (looksDestructiveCommand(command)) {
        const approved = (await options.onSensitiveAction?.({tool: 'execute_bash', command})) ?? false
        if (!approved) {
          return {success: false, output: '', error: `destructive command blocked: ${command}`}
        }
      }

      const {exitCode, output} = await runShell(command, workspace, signal)
      return exitCode === 0 ? {success: true, output} : {success: false, output, error: `exit code ${exitCode ?? 'unknown'}`}
    }
  })

  return registry
}

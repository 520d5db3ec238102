import {opendir, readFile, readdir} from 'node:fs/promises'
import {relative, resolve, sep} from 'node:path'

const SKIPPED_DIRS = new Set(['.git', 'node_modules', '.terraform'])
const MAX_SEARCH_RESULTS = 200
const MAX_READ_BYTES = 256 * 1024

export function resolveWorkspacePath(workspace: string, inputPath: string): string {
  const workspaceRoot = resolve(workspace)
  const fullPath = resolve(workspaceRoot, inputPath)
  const inWorkspace = fullPath === workspaceRoot || fullPath.startsWith(`${workspaceRoot}${sep}`)
  if (!inWorkspace) {
    throw new Error(`Path '${inputPath}' is outside workspace.`)
  }

  return fullPath
}

export async function readTextFile(workspace: string, path: string, signal?: AbortSignal): Promise<string> {
  const fullPath = resolveWorkspacePath(workspace, path)
  const content = await readFile(fullPath, {encoding: 'utf8', signal})
  if (content.length <= MAX_READ_BYTES) return content
  return `${content.slice(0, MAX_READ_BYTES)}\n...[truncated]`
}

export async function listFiles(workspace: string, path = '.'): Promise<string[]> {
  const fullPath = resolveWorkspacePath(workspace, path)
  const entries = await readdir(fullPath, {withFileTypes: true})
  return entries
    .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
    .sort((a, b) => a.localeCompare(b))
}

/** Case-insensitive substring match on workspace-relative paths. */
export async function searchWorkspaceFiles(
  workspace: string,
  pattern: string,
  path = '.',
  signal?: AbortSignal
): Promise<string[]> {
  const q = pattern.trim().toLowerCase()
  if (!q) return []

  const root = resolveWorkspacePath(workspace, path)
  const workspaceRoot = resolve(workspace)
  const results: string[] = []

  async function walk(dirPath: string): Promise<void> {
    signal?.throwIfAborted()
    const dir = await opendir(dirPath)
    for await (const entry of dir) {
      if (results.length >= MAX_SEARCH_RESULTS) return
      if (entry.isDirectory() && SKIPPED_DIRS.has(entry.name)) continue
      const fullPath = resolve(dirPath, entry.name)
      const relPath = relative(workspaceRoot, fullPath)
      if (relPath.toLowerCase().includes(q)) {
        results.push(relPath)
      }
      if (entry.isDirectory()) {
        await walk(fullPath)
      }
    }
  }

  await walk(root)
  return results
}
